export type SceneFrameBeginPayload = {
  sceneId: string;
  width: number;
  height: number;
};

export type SceneFrameEndPayload = {
  sceneId: string;
  drawCount: number;
  layerCount: number;
  maxLayerDepth: number;
};

export type SceneLayerPushPayload = {
  sceneId: string;
  depth: number;
  mixMode: string;
  compositeMode: string;
  alpha: number;
};

export type SceneLayerPopPayload = {
  sceneId: string;
  depth: number;
};

export type SceneWarningPayload = {
  sceneId: string;
  code: string;
  message: string;
};

export type RenderStatsPayload = {
  lastFrameMs: number;
  lastCommandCount: number;
  lastDrawCalls: number;
  lastLayerCount: number;
};

export type RenderErrorPayload = {
  message: string;
  commandIndex?: number;
};

export type LogEventPayload = {
  topic: string;
  payload: unknown;
};

type TopicsConst = typeof import("./topics.js").Topics;

export type TopicPayloadMap = {
  [K in TopicsConst["SCENE_FRAME_BEGIN"]]: SceneFrameBeginPayload;
} & {
  [K in TopicsConst["SCENE_FRAME_END"]]: SceneFrameEndPayload;
} & {
  [K in TopicsConst["SCENE_LAYER_PUSH"]]: SceneLayerPushPayload;
} & {
  [K in TopicsConst["SCENE_LAYER_POP"]]: SceneLayerPopPayload;
} & {
  [K in TopicsConst["SCENE_WARNING"]]: SceneWarningPayload;
} & {
  [K in TopicsConst["RENDER_STATS"]]: RenderStatsPayload;
} & {
  [K in TopicsConst["RENDER_ERROR"]]: RenderErrorPayload;
} & {
  [K in TopicsConst["LOG_EVENT"]]: LogEventPayload;
};

export type KnownTopic = keyof TopicPayloadMap;
