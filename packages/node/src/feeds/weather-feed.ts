import {
  normalizeSeverity,
  type AlertLogger,
  type SnapshotSource,
  type WeatherAlert,
  type WeatherSnapshot,
} from "@local-alert/core";
import { z } from "zod";

// ─── Feed Shape ──────────────────────────────────────────────────────────────
//
// CAP alerts published as GeoJSON (`features[].properties`), the shape used
// by most national warning services' JSON endpoints.

const CapPropertiesSchema = z
  .object({
    id: z.string().optional(),
    identifier: z.string().optional(),
    event: z.string(),
    severity: z.string().default("Unknown"),
    headline: z.string().nullish(),
    areaDesc: z.string().nullish(),
    onset: z.string().nullish(),
    expires: z.string().nullish(),
    messageType: z.string().nullish(),
  })
  .passthrough();

const CapFeatureSchema = z.object({
  id: z.union([z.string(), z.number()]).nullish(),
  properties: CapPropertiesSchema,
});

export const CapFeedSchema = z.object({
  features: z.array(z.unknown()),
});

export type CapProperties = z.infer<typeof CapPropertiesSchema>;

function parseTimestamp(value: string | null | undefined): number | null {
  if (!value) return null;
  const ts = Date.parse(value);
  return Number.isNaN(ts) ? null : ts;
}

export function isCancellation(props: CapProperties): boolean {
  if (props.messageType?.toLowerCase() === "cancel") return true;
  return props.event.toLowerCase().includes("cancellation")
    || (props.headline ?? "").toLowerCase().includes("cancellation");
}

/** Keeps an alert when no keywords are set or its area/headline mentions one. */
export function matchesArea(alert: WeatherAlert, keywords: readonly string[]): boolean {
  if (keywords.length === 0) return true;
  const haystack = `${alert.areas} ${alert.headline}`.toLowerCase();
  return keywords.some((k) => haystack.includes(k.toLowerCase()));
}

export type WeatherFeedOptions = {
  url: string;
  /** Lower-case area names; empty keeps every alert. */
  areaKeywords?: readonly string[];
  /** Written to each alert's `source`. */
  sourceName?: string;
  fetch?: typeof fetch;
  logger?: AlertLogger;
  logPrefix?: string;
};

/**
 * Weather source over a CAP GeoJSON feed. Each poll returns the full set of
 * current alerts; features that fail validation are skipped and logged.
 */
export class CapFeedWeatherSource implements SnapshotSource<WeatherSnapshot> {
  readonly name = "weather";

  private readonly url: string;
  private readonly areaKeywords: readonly string[];
  private readonly sourceName: string;
  private readonly fetchImpl: typeof fetch;
  private readonly logger: AlertLogger;
  private readonly logPrefix: string;

  constructor(opts: WeatherFeedOptions) {
    this.url = opts.url;
    this.areaKeywords = opts.areaKeywords ?? [];
    this.sourceName = opts.sourceName ?? "cap-feed";
    this.fetchImpl = opts.fetch ?? fetch;
    this.logger = opts.logger ?? console;
    this.logPrefix = opts.logPrefix ?? "local-alert";
  }

  async poll(signal: AbortSignal): Promise<WeatherSnapshot> {
    const res = await this.fetchImpl(this.url, {
      headers: { Accept: "application/geo+json, application/json" },
      signal,
    });
    if (!res.ok) {
      throw new Error(`Weather feed ${res.status}: ${this.url}`);
    }

    const feed = CapFeedSchema.parse(await res.json());
    const snapshot = this.toSnapshot(feed.features);
    this.logger.info(`${this.logPrefix}: ${snapshot.size} weather alert(s) from ${feed.features.length} feature(s)`);
    return snapshot;
  }

  /** Exposed for callers that already hold the feed body. */
  toSnapshot(features: readonly unknown[]): Map<string, WeatherAlert> {
    const snapshot = new Map<string, WeatherAlert>();

    features.forEach((raw, index) => {
      const parsed = CapFeatureSchema.safeParse(raw);
      if (!parsed.success) {
        this.logger.debug?.(`${this.logPrefix}: skipping feature ${index}: ${parsed.error.issues[0]?.message ?? "invalid"}`);
        return;
      }

      const props = parsed.data.properties;
      if (isCancellation(props)) {
        this.logger.debug?.(`${this.logPrefix}: skipping cancellation "${props.event}"`);
        return;
      }

      const alert: WeatherAlert = {
        event: props.event,
        severity: normalizeSeverity(props.severity),
        headline: props.headline ?? props.event,
        areas: props.areaDesc ?? "",
        onset: parseTimestamp(props.onset),
        expires: parseTimestamp(props.expires),
        source: this.sourceName,
      };
      if (!matchesArea(alert, this.areaKeywords)) return;

      const id = props.identifier ?? props.id ?? (parsed.data.id == null ? null : String(parsed.data.id));
      snapshot.set(id ?? `${props.event}|${props.onset ?? index}`, alert);
    });

    return snapshot;
  }
}
