import { formatCallMessage, type ActiveAlertLevel, type VoiceCallPort } from "@local-alert/core";

/**
 * Places alert calls through a Home Assistant notify service that fronts a
 * phone system (e.g. `notify.voip_phone`).
 *
 * ```ts
 * new NotifyServiceVoiceCaller(ha, "notify.voip_phone")
 * ```
 */
export class NotifyServiceVoiceCaller implements VoiceCallPort {
  readonly name = "ha_notify";
  private readonly domain: string;
  private readonly service: string;

  constructor(
    private readonly client: { callService(domain: string, service: string, data?: Record<string, unknown>): Promise<unknown> },
    notifyService = "notify.voip_phone",
  ) {
    const [domain, service] = notifyService.includes(".")
      ? [notifyService.slice(0, notifyService.indexOf(".")), notifyService.slice(notifyService.indexOf(".") + 1)]
      : ["notify", notifyService];
    this.domain = domain;
    this.service = service;
  }

  get serviceName(): string {
    return `${this.domain}.${this.service}`;
  }

  async placeAlertCall(destination: string, level: ActiveAlertLevel, reason: string): Promise<boolean> {
    await this.client.callService(this.domain, this.service, {
      message: formatCallMessage(level, reason),
      target: [destination],
      data: { alert_level: level },
    });
    return true;
  }
}
