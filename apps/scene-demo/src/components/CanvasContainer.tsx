import { useEffect, useRef } from "react";

export type CanvasContainerProps = {
  onCanvas?: (canvas: HTMLCanvasElement) => void;
  onResize?: (width: number, height: number) => void;
};

export function CanvasContainer({ onCanvas, onResize }: CanvasContainerProps) {
  const canvasRef = useRef<HTMLCanvasElement | null>(null);
  const containerRef = useRef<HTMLDivElement | null>(null);

  useEffect(() => {
    const canvas = canvasRef.current;
    if (!canvas) return;
    onCanvas?.(canvas);
  }, [onCanvas]);

  useEffect(() => {
    const container = containerRef.current;
    if (!container || !onResize) return;

    const publishSize = () => {
      const rect = container.getBoundingClientRect();
      if (rect.width <= 0 || rect.height <= 0) return;
      onResize(rect.width, rect.height);
    };

    const observer = new ResizeObserver(() => {
      publishSize();
    });

    observer.observe(container);
    publishSize();
    return () => observer.disconnect();
  }, [onResize]);

  return (
    <div ref={containerRef} style={{ width: "100%", height: "100%", position: "relative" }}>
      <canvas ref={canvasRef} style={{ display: "block", width: "100%", height: "100%" }} />
    </div>
  );
}
