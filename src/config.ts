import type { Config, DisplayMode } from "./types.js";

export const DEFAULT_COUNT = 8;
export const DEFAULT_WORK_MINUTES = 25;
export const DEFAULT_REST_MINUTES = 5;
export const DEFAULT_DISPLAY: DisplayMode = "full";

export function defaultConfig(): Config {
  return {
    count: DEFAULT_COUNT,
    duration: DEFAULT_WORK_MINUTES,
    rest: DEFAULT_REST_MINUTES
  };
}

export function workSeconds(config: Config): number {
  return config.duration * 60;
}

export function restSeconds(config: Config): number {
  return config.rest * 60;
}

/** Seconds from start until the session is done. */
export function totalSeconds(config: Config): number {
  return workSeconds(config) + restSeconds(config);
}

export function displayMode(config: Config): DisplayMode {
  return config.display ?? DEFAULT_DISPLAY;
}
