import { useCallback, useEffect, useMemo, useRef, useState } from "react";
import { Topics, type EventBus } from "@vecscene/event-bus";
import { Canvas2DRenderer } from "@vecscene/renderer-canvas2d";
import {
  ControlPanel,
  LogPanel,
  SceneShell,
  StatusBar,
  type SceneControls
} from "@vecscene/ui-shell";
import { Typography } from "antd";
import { generateImage, measureFont } from "../assets.js";
import { buildFrame } from "../frame.js";
import { CanvasContainer } from "./CanvasContainer.js";

export type DemoLayoutProps = {
  bus: EventBus;
};

const FONT_FAMILY = "sans-serif";

export function DemoLayout({ bus }: DemoLayoutProps) {
  const [canvas, setCanvas] = useState<HTMLCanvasElement | null>(null);
  const [controls, setControls] = useState<SceneControls>({ fitMode: "fill", paused: false, masked: true });
  const controlsRef = useRef(controls);
  const sizeRef = useRef<{ width: number; height: number }>({ width: 0, height: 0 });
  const tickRef = useRef(0);
  const rendererRef = useRef<Canvas2DRenderer | null>(null);

  const image = useMemo(() => generateImage(64), []);

  useEffect(() => {
    controlsRef.current = controls;
  }, [controls]);

  const onResize = useCallback((width: number, height: number) => {
    sizeRef.current = { width, height };
    rendererRef.current?.resize(width, height);
  }, []);

  useEffect(() => {
    if (!canvas) return;
    const ctx = canvas.getContext("2d");
    if (!ctx) return;
    const font = measureFont(ctx, FONT_FAMILY);

    const renderer = new Canvas2DRenderer();
    renderer.init(canvas, { backgroundColor: "#111", bus });
    rendererRef.current = renderer;

    const rect = canvas.getBoundingClientRect();
    sizeRef.current = { width: rect.width, height: rect.height };
    renderer.resize(rect.width, rect.height);

    let frameId = 0;
    const tick = () => {
      const { width, height } = sizeRef.current;
      const current = controlsRef.current;
      if (width > 0 && height > 0) {
        if (!current.paused) tickRef.current += 1;
        try {
          const frame = buildFrame({
            width,
            height,
            tick: tickRef.current,
            font,
            image,
            fitMode: current.fitMode,
            masked: current.masked,
            bus
          });
          renderer.updateScene(frame);
        } catch (err) {
          bus.publish(Topics.RENDER_ERROR, {
            message: err instanceof Error ? err.message : String(err)
          });
        }
      }
      frameId = requestAnimationFrame(tick);
    };
    frameId = requestAnimationFrame(tick);
    renderer.startLoop();

    return () => {
      cancelAnimationFrame(frameId);
      rendererRef.current = null;
      renderer.destroy();
    };
  }, [bus, canvas, image]);

  return (
    <SceneShell
      top={
        <div style={{ height: 44, display: "flex", alignItems: "center", padding: "0 12px" }}>
          <Typography.Text strong>vecscene</Typography.Text>
        </div>
      }
      left={
        <ControlPanel
          value={controls}
          onChange={setControls}
          onRestart={() => {
            tickRef.current = 0;
          }}
        />
      }
      bottom={<LogPanel bus={bus} />}
      status={<StatusBar bus={bus} paused={controls.paused} />}
      canvas={<CanvasContainer onCanvas={setCanvas} onResize={onResize} />}
    />
  );
}
