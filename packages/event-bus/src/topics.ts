export const Topics = {
  SCENE_FRAME_BEGIN: "scene:frame:begin",
  SCENE_FRAME_END: "scene:frame:end",
  SCENE_LAYER_PUSH: "scene:layer:push",
  SCENE_LAYER_POP: "scene:layer:pop",
  SCENE_WARNING: "scene:warning",

  RENDER_STATS: "render:stats",
  RENDER_ERROR: "render:error",

  LOG_EVENT: "log:event"
} as const;
