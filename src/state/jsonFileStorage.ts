import { access, mkdir, readFile, writeFile } from "fs/promises";
import { dirname } from "path";
import type { z } from "zod";

/**
 * One JSON record on disk, checked against a zod schema on the way in.
 *
 * A missing file reads as `undefined`. So does a file that is not JSON or
 * does not match the schema, after a warning on stderr. Any other read error
 * (permissions, a directory in the way) is thrown, as are all write errors.
 */
export class JsonFileStorage<S extends z.ZodTypeAny> {
  private pending = Promise.resolve();

  constructor(
    readonly filePath: string,
    private readonly schema: S,
    private readonly label: string
  ) {}

  async load(): Promise<z.infer<S> | undefined> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf-8");
    } catch (error) {
      if (isMissing(error)) {
        return undefined;
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      console.warn(`Ignoring ${this.label} at ${this.filePath}: not valid JSON`, error instanceof Error ? error.message : error);
      return undefined;
    }

    const result = this.schema.safeParse(parsed);
    if (!result.success) {
      console.warn(`Ignoring ${this.label} at ${this.filePath}: ${result.error.issues.map(formatIssue).join("; ")}`);
      return undefined;
    }
    return result.data;
  }

  async exists(): Promise<boolean> {
    try {
      await access(this.filePath);
      return true;
    } catch (error) {
      if (isMissing(error)) {
        return false;
      }
      throw error;
    }
  }

  async save(value: z.input<S>): Promise<void> {
    const serialized = `${JSON.stringify(value, null, 2)}\n`;
    this.pending = this.pending
      .catch(() => undefined)
      .then(async () => {
        await mkdir(dirname(this.filePath), { recursive: true });
        await writeFile(this.filePath, serialized, "utf-8");
      });
    await this.pending;
  }
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

function formatIssue(issue: z.ZodIssue): string {
  const path = issue.path.join(".");
  return path ? `${path}: ${issue.message}` : issue.message;
}
