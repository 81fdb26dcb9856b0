export { SceneShell } from "./components/SceneShell.js";
export { ControlPanel } from "./components/ControlPanel.js";
export { StatusBar } from "./components/StatusBar.js";
export { LogPanel } from "./components/LogPanel.js";
export type { SceneShellProps } from "./components/SceneShell.js";
export type { ControlPanelProps } from "./components/ControlPanel.js";
export type { StatusBarProps } from "./components/StatusBar.js";
export type { LogPanelProps } from "./components/LogPanel.js";
export type { FitModeOption, SceneControls } from "./types.js";
