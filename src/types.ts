export type DisplayMode = "full" | "compact";

export interface Config {
  count: number;
  duration: number;
  rest: number;
  display?: DisplayMode;
}

export interface SessionState {
  started_at?: number;
}

export type Phase =
  | { kind: "idle" }
  | { kind: "work"; remaining: number }
  | { kind: "rest"; remaining: number }
  | { kind: "done" };

export interface PomodoroStatus {
  phase: Phase;
  text: string;
  startedAt?: number;
  config: Config;
}
