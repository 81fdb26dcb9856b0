export type FitModeOption = "original" | "fill" | "exact";

export type SceneControls = {
  fitMode: FitModeOption;
  paused: boolean;
  /** Draw the grating through its radial alpha mask. */
  masked: boolean;
};
