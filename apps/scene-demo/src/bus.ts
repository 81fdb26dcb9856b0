import { Topics, createEventBus, createEventLoggerMiddleware } from "@vecscene/event-bus";

export const bus = createEventBus({
  middlewares: [
    createEventLoggerMiddleware({
      ignoreTopics: [
        Topics.LOG_EVENT,
        Topics.SCENE_FRAME_BEGIN,
        Topics.SCENE_FRAME_END,
        Topics.SCENE_LAYER_PUSH,
        Topics.SCENE_LAYER_POP,
        Topics.RENDER_STATS
      ],
      logTopic: Topics.LOG_EVENT
    })
  ]
});
