export type {
  KnownTopic,
  LogEventPayload,
  RenderErrorPayload,
  RenderStatsPayload,
  SceneFrameBeginPayload,
  SceneFrameEndPayload,
  SceneLayerPopPayload,
  SceneLayerPushPayload,
  SceneWarningPayload,
  TopicPayloadMap
} from "./payloads.js";
export type { EventBus, EventBusHandler, EventBusMiddleware, EventBusTopic, Unsubscribe } from "./eventBus.js";
export { createEventBus, createEventLoggerMiddleware } from "./eventBus.js";
export { Topics } from "./topics.js";
