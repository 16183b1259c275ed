import { defaultConfig, displayMode } from "./config.js";
import { systemClock, type Clock } from "./clock.js";
import { computePhase, formatPhase } from "./phase.js";
import { ConfigFileStorage, type ConfigStorage } from "./state/configStorage.js";
import { resolveAppPaths, type AppPaths } from "./state/paths.js";
import { StateFileStorage, type StateStorage } from "./state/stateStorage.js";
import type { PomodoroStatus } from "./types.js";

export interface PomodoroServiceOptions {
  config: ConfigStorage;
  state: StateStorage;
  clock?: Clock;
}

export class PomodoroService {
  private readonly config: ConfigStorage;
  private readonly state: StateStorage;
  private readonly clock: Clock;

  constructor(options: PomodoroServiceOptions) {
    this.config = options.config;
    this.state = options.state;
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Writes a default config file, but only when forced; an existing file is
   * never touched otherwise. Returns the path written, if any.
   */
  async init(options: { force?: boolean } = {}): Promise<string | undefined> {
    if (!options.force) {
      return undefined;
    }
    await this.config.save(defaultConfig());
    return this.config.filePath;
  }

  /** Starts a pomodoro now, replacing any session already running. */
  async start(): Promise<PomodoroStatus> {
    const config = await this.config.load();
    const startedAt = this.clock.now();
    await this.state.save({ started_at: startedAt });
    const phase = computePhase(startedAt, startedAt, config);
    return {
      phase,
      text: formatPhase(phase, displayMode(config)),
      startedAt,
      config
    };
  }

  /** Clears the running session. Returns false when there was none. */
  async stop(): Promise<boolean> {
    if (!(await this.state.exists())) {
      return false;
    }
    const current = await this.state.load();
    await this.state.save({});
    return current.started_at !== undefined;
  }

  async status(): Promise<PomodoroStatus> {
    const config = await this.config.load();
    const { started_at: startedAt } = await this.state.load();
    const phase = computePhase(startedAt, this.clock.now(), config);
    return {
      phase,
      text: formatPhase(phase, displayMode(config)),
      startedAt,
      config
    };
  }
}

export function createFileBackedService(paths: AppPaths = resolveAppPaths(), clock?: Clock): PomodoroService {
  return new PomodoroService({
    config: new ConfigFileStorage(paths.configFile),
    state: new StateFileStorage(paths.stateFile),
    clock
  });
}
