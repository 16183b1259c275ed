import { totalSeconds, workSeconds } from "./config.js";
import type { Config, DisplayMode, Phase } from "./types.js";

const IDLE_TEXT: Record<DisplayMode, string> = {
  full: "no pomodoro running",
  compact: ">----"
};

const DONE_TEXT: Record<DisplayMode, string> = {
  full: "READY",
  compact: ">DONE"
};

/**
 * Derives the phase of a session from its start time. The result depends only
 * on the arguments; nothing is advanced or stored between calls.
 *
 * The work phase includes its upper bound: at exactly `duration` minutes the
 * session is still working, with zero seconds left.
 */
export function computePhase(startedAt: number | undefined, now: number, config: Config): Phase {
  if (startedAt === undefined) {
    return { kind: "idle" };
  }

  // A clock that stepped backwards reads as a session that just started.
  const elapsed = Math.max(now - startedAt, 0);
  const work = workSeconds(config);
  const total = totalSeconds(config);

  if (elapsed <= work) {
    return { kind: "work", remaining: work - elapsed };
  }
  if (elapsed < total) {
    return { kind: "rest", remaining: total - elapsed };
  }
  return { kind: "done" };
}

export function formatPhase(phase: Phase, mode: DisplayMode = "full"): string {
  switch (phase.kind) {
    case "idle":
      return IDLE_TEXT[mode];
    case "work":
      return `W:${formatRemaining(phase.remaining)}`;
    case "rest":
      return `R:${formatRemaining(phase.remaining)}`;
    case "done":
      return DONE_TEXT[mode];
  }
}

/** Whole minutes (truncated) from one minute up, seconds below; padded to two digits. */
export function formatRemaining(seconds: number): string {
  const clamped = Math.max(Math.floor(seconds), 0);
  if (clamped >= 60) {
    return `${String(Math.floor(clamped / 60)).padStart(2)}m`;
  }
  return `${String(clamped).padStart(2)}s`;
}

export function describePhase(phase: Phase): string {
  switch (phase.kind) {
    case "idle":
      return "No pomodoro running.";
    case "work":
      return `Working, ${describeRemaining(phase.remaining)} left.`;
    case "rest":
      return `Resting, ${describeRemaining(phase.remaining)} left.`;
    case "done":
      return "Pomodoro finished. Stop it or start the next one.";
  }
}

function describeRemaining(seconds: number): string {
  const clamped = Math.max(Math.floor(seconds), 0);
  const minutes = Math.floor(clamped / 60);
  if (minutes > 0) {
    return `${minutes} minute${minutes === 1 ? "" : "s"}`;
  }
  return `${clamped} second${clamped === 1 ? "" : "s"}`;
}
