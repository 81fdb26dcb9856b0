import type { ReactNode } from "react";
import "../styles.css";

export type SceneShellProps = {
  top: ReactNode;
  left: ReactNode;
  bottom: ReactNode;
  status: ReactNode;
  canvas: ReactNode;
};

export function SceneShell({ top, left, bottom, status, canvas }: SceneShellProps) {
  return (
    <div className="uiShellRoot">
      <div className="uiShellTop">{top}</div>
      <div className="uiShellLeft">{left}</div>
      <div className="uiShellCanvas">{canvas}</div>
      <div className="uiShellBottom">
        {bottom}
        {status}
      </div>
    </div>
  );
}
