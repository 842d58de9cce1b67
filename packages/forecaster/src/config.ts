export type SmoothingGrid = {
  min: number;
  max: number;
  step: number;
};

export type ForecasterConfig = {
  /** Most recent periods, including the current one, fed to the fit. */
  maxHistory: number;
  /** Below this many points the forecast repeats the last value. Never less than 2. */
  minHistory: number;
  /** Relative band around the last value that reads as flat. */
  directionTolerance: number;
  smoothingGrid: SmoothingGrid;
};

export const DEFAULT_FORECASTER_CONFIG: ForecasterConfig = {
  maxHistory: 12,
  minHistory: 2,
  directionTolerance: 0.05,
  smoothingGrid: {
    min: 0.05,
    max: 0.95,
    step: 0.05,
  },
};
