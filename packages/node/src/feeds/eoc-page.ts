import type { AlertLogger, EocSiteState, EocSnapshot, EocState, SnapshotSource } from "@local-alert/core";
import { parse, type HTMLElement } from "node-html-parser";

const PREVIEW_LENGTH = 200;

// Checked in order; the first keyword found decides the state.
const STATE_KEYWORDS: ReadonlyArray<[EocState, readonly string[]]> = [
  ["stand_up", ["stand up", "standup"]],
  ["lean_forward", ["lean forward", "leanforward"]],
  ["stand_down", ["stand down", "standdown"]],
  ["alert", ["status:alert", "status: alert"]],
];

function collapse(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

function parsePage(html: string): HTMLElement {
  const root = parse(html);
  for (const el of root.querySelectorAll("script, style, noscript")) {
    el.remove();
  }
  return root;
}

/** Visible text of an HTML page, whitespace collapsed. */
export function htmlToText(html: string): string {
  return collapse(parsePage(html).text);
}

/**
 * Text of the elements each CSS selector matches, one line per element,
 * in selector order. Empty when nothing matches.
 */
export function selectText(html: string, selectors: Readonly<Record<string, string>>): string {
  const root = parsePage(html);
  const lines: string[] = [];
  for (const selector of Object.values(selectors)) {
    for (const el of root.querySelectorAll(selector)) {
      const text = collapse(el.text);
      if (text) lines.push(text);
    }
  }
  return lines.join("\n");
}

/** EOC state named on a status page; "inactive" when no keyword appears. */
export function detectEocState(text: string): EocState {
  const lower = text.toLowerCase();
  for (const [state, keywords] of STATE_KEYWORDS) {
    if (keywords.some((k) => lower.includes(k))) return state;
  }
  return "inactive";
}

/**
 * A monitored page: its URL, or the URL with a display id and named CSS
 * selectors that narrow the page down to its status block.
 */
export type EocSite = string | { url: string; id?: string; selectors?: Record<string, string> };

type ResolvedSite = { url: string; id: string; selectors: Readonly<Record<string, string>> | null };

function resolveSite(site: EocSite): ResolvedSite {
  if (typeof site === "string") return { url: site, id: site, selectors: null };
  const selectors = site.selectors && Object.keys(site.selectors).length > 0 ? site.selectors : null;
  return { url: site.url, id: site.id ?? site.url, selectors };
}

/**
 * EOC source that reads each site's public status page. A poll fails as a
 * whole when any site cannot be fetched, so a partial snapshot never
 * replaces a complete one.
 */
export class EocStatusPageSource implements SnapshotSource<EocSnapshot> {
  readonly name = "eoc";

  private readonly sites: readonly ResolvedSite[];
  private readonly fetchImpl: typeof fetch;
  private readonly logger: AlertLogger;
  private readonly logPrefix: string;
  private readonly now: () => number;

  constructor(opts: {
    sites: readonly EocSite[];
    fetch?: typeof fetch;
    logger?: AlertLogger;
    logPrefix?: string;
    now?: () => number;
  }) {
    this.sites = opts.sites.map(resolveSite);
    this.fetchImpl = opts.fetch ?? fetch;
    this.logger = opts.logger ?? console;
    this.logPrefix = opts.logPrefix ?? "local-alert";
    this.now = opts.now ?? Date.now;
  }

  get siteCount(): number {
    return this.sites.length;
  }

  async poll(signal: AbortSignal): Promise<EocSnapshot> {
    const entries = await Promise.all(
      this.sites.map(async (site): Promise<[string, EocSiteState]> => [site.id, await this.checkSite(site, signal)]),
    );
    return new Map(entries);
  }

  private async checkSite(site: ResolvedSite, signal: AbortSignal): Promise<EocSiteState> {
    const res = await this.fetchImpl(site.url, { signal });
    if (!res.ok) {
      throw new Error(`EOC page ${res.status}: ${site.url}`);
    }

    const html = await res.text();
    const text = site.selectors ? selectText(html, site.selectors) : htmlToText(html);
    if (site.selectors && !text) {
      this.logger.warn(`${this.logPrefix}: no selector matched on ${site.url}, reading it as inactive`);
    }
    const state = detectEocState(text);
    this.logger.debug?.(`${this.logPrefix}: EOC state for ${site.url}: ${state}`);

    return {
      state,
      activated: state !== "inactive",
      lastCheck: this.now(),
      description: text.slice(0, PREVIEW_LENGTH),
    };
  }
}
