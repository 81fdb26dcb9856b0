import { Tag } from "antd";
import { useEffect, useState } from "react";
import {
  Topics,
  type EventBus,
  type RenderErrorPayload,
  type RenderStatsPayload,
  type SceneFrameEndPayload
} from "@vecscene/event-bus";

export type StatusBarProps = {
  bus: EventBus;
  paused: boolean;
};

const REFRESH_MS = 250;

export function StatusBar({ bus, paused }: StatusBarProps) {
  const [render, setRender] = useState<RenderStatsPayload | null>(null);
  const [frame, setFrame] = useState<SceneFrameEndPayload | null>(null);
  const [lastError, setLastError] = useState<RenderErrorPayload | null>(null);

  useEffect(() => {
    // stats arrive once per frame
    let lastRender = 0;
    let lastFrame = 0;
    const unsubRender = bus.subscribe(Topics.RENDER_STATS, (payload) => {
      const now = Date.now();
      if (now - lastRender < REFRESH_MS) return;
      lastRender = now;
      setRender(payload);
    });
    const unsubFrame = bus.subscribe(Topics.SCENE_FRAME_END, (payload) => {
      const now = Date.now();
      if (now - lastFrame < REFRESH_MS) return;
      lastFrame = now;
      setFrame(payload);
    });
    const unsubError = bus.subscribe(Topics.RENDER_ERROR, setLastError);
    return () => {
      unsubRender();
      unsubFrame();
      unsubError();
    };
  }, [bus]);

  return (
    <div
      style={{
        height: 28,
        display: "flex",
        alignItems: "center",
        justifyContent: "space-between",
        padding: "0 10px",
        background: "rgba(15, 17, 21, 0.85)",
        borderTop: "1px solid rgba(255,255,255,0.08)"
      }}
    >
      <div style={{ display: "flex", gap: 8, alignItems: "center" }}>
        <Tag color={paused ? "orange" : "green"}>{paused ? "Paused" : "Running"}</Tag>
        {frame && (
          <Tag color="default">
            Scene: {frame.drawCount} draws, {frame.layerCount} layers (depth {frame.maxLayerDepth})
          </Tag>
        )}
        {lastError && <Tag color="red">{lastError.message}</Tag>}
      </div>
      <div style={{ display: "flex", gap: 8, alignItems: "center" }}>
        {render && (
          <>
            <Tag color="blue">{render.lastFrameMs.toFixed(2)} ms</Tag>
            <Tag color="default">
              {render.lastCommandCount} commands / {render.lastDrawCalls} draw calls
            </Tag>
          </>
        )}
      </div>
    </div>
  );
}
