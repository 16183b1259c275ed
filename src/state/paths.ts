import { homedir } from "os";
import { join } from "path";

export const APP_NAME = "marinara";

export interface AppPaths {
  configDir: string;
  dataDir: string;
  configFile: string;
  stateFile: string;
}

type Env = Record<string, string | undefined>;

/**
 * Per-user directories for config and state, following the host platform's
 * conventions (XDG base directories on Linux and other Unix systems).
 */
export function resolveAppPaths(
  platform: NodeJS.Platform = process.platform,
  env: Env = process.env,
  home: string = homedir()
): AppPaths {
  const { configBase, dataBase } = baseDirectories(platform, env, home);
  const configDir = join(configBase, APP_NAME);
  const dataDir = join(dataBase, APP_NAME);
  return {
    configDir,
    dataDir,
    configFile: join(configDir, "config.json"),
    stateFile: join(dataDir, "state.json")
  };
}

function baseDirectories(platform: NodeJS.Platform, env: Env, home: string): { configBase: string; dataBase: string } {
  switch (platform) {
    case "darwin": {
      const support = join(home, "Library", "Application Support");
      return { configBase: support, dataBase: support };
    }
    case "win32": {
      const appData = nonEmpty(env.APPDATA) ?? join(home, "AppData", "Roaming");
      return { configBase: appData, dataBase: appData };
    }
    default:
      return {
        configBase: absolute(env.XDG_CONFIG_HOME) ?? join(home, ".config"),
        dataBase: absolute(env.XDG_DATA_HOME) ?? join(home, ".local", "share")
      };
  }
}

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.trim() ? value : undefined;
}

// Relative XDG paths are invalid and must be ignored.
function absolute(value: string | undefined): string | undefined {
  const candidate = nonEmpty(value);
  return candidate?.startsWith("/") ? candidate : undefined;
}
