import { z } from "zod";
import { defaultConfig } from "../config.js";
import type { Config } from "../types.js";
import { JsonFileStorage } from "./jsonFileStorage.js";

export const configSchema = z.object({
  count: z.number().int().positive(),
  duration: z.number().positive().describe("Work length in minutes."),
  rest: z.number().nonnegative().describe("Rest length in minutes."),
  display: z.enum(["full", "compact"]).optional()
});

export interface ConfigStorage {
  readonly filePath: string;
  load(): Promise<Config>;
  save(config: Config): Promise<void>;
}

export class ConfigFileStorage implements ConfigStorage {
  private readonly file: JsonFileStorage<typeof configSchema>;

  constructor(filePath: string) {
    this.file = new JsonFileStorage(filePath, configSchema, "config file");
  }

  get filePath(): string {
    return this.file.filePath;
  }

  async load(): Promise<Config> {
    return (await this.file.load()) ?? defaultConfig();
  }

  async save(config: Config): Promise<void> {
    await this.file.save(config);
  }
}
