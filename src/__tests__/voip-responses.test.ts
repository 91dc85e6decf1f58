import { describe, expect, it } from "@jest/globals";
import type { LocalAlertState } from "@local-alert/core";
import { escapeXml, GOODBYE_TWIML, statusAgi, statusTwiml } from "../voip-responses.js";

const warning: LocalAlertState = {
	active: true,
	level: "warning",
	reason: "Weather: Rain & \"Wind\"",
	triggeredBy: ["Weather: Rain & \"Wind\""],
	timestamp: 0,
};

describe("escapeXml", () => {
	it("escapes markup characters", () => {
		expect(escapeXml(`a & <b> "c" 'd'`)).toBe("a &amp; &lt;b&gt; &quot;c&quot; &apos;d&apos;");
	});
});

describe("statusTwiml", () => {
	it("speaks the escaped status, then offers the menu", () => {
		const lines = statusTwiml(warning).split("\n");

		expect(lines[0]).toBe(`<?xml version="1.0" encoding="UTF-8"?>`);
		expect(lines[2]).toBe(
			`    <Say voice="alice">Current alert level is WARNING. Weather: Rain &amp; &quot;Wind&quot;. This is a warning. Take appropriate precautions.</Say>`,
		);
		expect(lines[5]).toBe(`    <Gather numDigits="1" action="/voip/menu" method="POST">`);
		expect(lines[lines.length - 1]).toBe("</Response>");
	});

	it("ends the goodbye response with a hang-up", () => {
		expect(GOODBYE_TWIML.split("\n")[3]).toBe("    <Hangup/>");
	});
});

describe("statusAgi", () => {
	it("answers, speaks and hangs up", () => {
		expect(statusAgi(warning)).toBe(
			[
				"ANSWER",
				"WAIT 1",
				"EXEC Set(CHANNEL(language)=en)",
				`EXEC SayText("Current alert level is WARNING. Weather: Rain & 'Wind'. This is a warning. Take appropriate precautions.")`,
				"WAIT 2",
				"HANGUP",
				"",
			].join("\n"),
		);
	});
});
