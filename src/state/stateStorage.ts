import { z } from "zod";
import type { SessionState } from "../types.js";
import { JsonFileStorage } from "./jsonFileStorage.js";

export const stateSchema = z.object({
  started_at: z.number().int().nonnegative().nullable().optional()
});

type StateRecord = z.infer<typeof stateSchema>;

export interface StateStorage {
  readonly filePath: string;
  load(): Promise<SessionState>;
  save(state: SessionState): Promise<void>;
  exists(): Promise<boolean>;
}

export class StateFileStorage implements StateStorage {
  private readonly file: JsonFileStorage<typeof stateSchema>;

  constructor(filePath: string) {
    this.file = new JsonFileStorage(filePath, stateSchema, "state file");
  }

  get filePath(): string {
    return this.file.filePath;
  }

  async load(): Promise<SessionState> {
    const record = await this.file.load();
    return toState(record);
  }

  async save(state: SessionState): Promise<void> {
    const record: StateRecord = { started_at: state.started_at ?? null };
    await this.file.save(record);
  }

  exists(): Promise<boolean> {
    return this.file.exists();
  }
}

function toState(record: StateRecord | undefined): SessionState {
  const startedAt = record?.started_at;
  if (startedAt === undefined || startedAt === null) {
    return {};
  }
  return { started_at: startedAt };
}
