// @local-alert/node: Home Assistant, MQTT and feed collaborators

export { LocalAlertEngine } from "@local-alert/core";

// Home Assistant
export {
  HomeAssistantClient,
  HomeAssistantError,
  SUPERVISOR_API_URL,
  type EntityState,
  type HomeAssistantClientOptions,
} from "./home-assistant/client.js";

// Override switches
export { DEFAULT_SWITCH_PREFIX, RestSwitchRegistry, type EntityStateReader } from "./overrides/rest-switch-registry.js";
export {
  connectMqttBroker,
  MqttSwitchRegistry,
  type BrokerConnectOptions,
  type MqttSwitchRegistryOptions,
  type SwitchBrokerClient,
} from "./overrides/mqtt-switch-registry.js";

// Voice
export { NotifyServiceVoiceCaller } from "./voice/notify-service-caller.js";

// Feeds
export {
  CapFeedSchema,
  CapFeedWeatherSource,
  isCancellation,
  matchesArea,
  type CapProperties,
  type WeatherFeedOptions,
} from "./feeds/weather-feed.js";
export { detectEocState, EocStatusPageSource, htmlToText, selectText, type EocSite } from "./feeds/eoc-page.js";
