import { formatStatusSpeech, type LocalAlertState } from "@local-alert/core";

const XML_ESCAPES: Record<string, string> = {
	"&": "&amp;",
	"<": "&lt;",
	">": "&gt;",
	"\"": "&quot;",
	"'": "&apos;",
};

export function escapeXml(text: string): string {
	return text.replace(/[&<>"']/g, (c) => XML_ESCAPES[c] ?? c);
}

/** TwiML read to an inbound caller: status, then a repeat/hang-up menu. */
export function statusTwiml(state: LocalAlertState): string {
	const message = escapeXml(formatStatusSpeech(state));
	return [
		`<?xml version="1.0" encoding="UTF-8"?>`,
		`<Response>`,
		`    <Say voice="alice">${message}</Say>`,
		`    <Pause length="2"/>`,
		`    <Say voice="alice">Press 1 to repeat this message. Press 2 to hang up.</Say>`,
		`    <Gather numDigits="1" action="/voip/menu" method="POST">`,
		`        <Pause length="5"/>`,
		`    </Gather>`,
		`    <Say voice="alice">Goodbye.</Say>`,
		`</Response>`,
	].join("\n");
}

export const GOODBYE_TWIML = [
	`<?xml version="1.0" encoding="UTF-8"?>`,
	`<Response>`,
	`    <Say voice="alice">Goodbye.</Say>`,
	`    <Hangup/>`,
	`</Response>`,
].join("\n");

/** Asterisk AGI commands that speak the status and hang up. */
export function statusAgi(state: LocalAlertState): string {
	const message = formatStatusSpeech(state).replace(/"/g, "'");
	return [
		"ANSWER",
		"WAIT 1",
		"EXEC Set(CHANNEL(language)=en)",
		`EXEC SayText("${message}")`,
		"WAIT 2",
		"HANGUP",
		"",
	].join("\n");
}
