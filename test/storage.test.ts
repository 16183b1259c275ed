import { test, type TestContext } from "node:test";
import assert from "node:assert/strict";
import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ConfigFileStorage } from "../src/state/configStorage.js";
import { StateFileStorage } from "../src/state/stateStorage.js";

async function createDir(t: TestContext) {
  const dir = await mkdtemp(join(tmpdir(), "marinara-storage-"));
  t.after(() => rm(dir, { recursive: true, force: true }));
  return dir;
}

function silenceWarnings(t: TestContext) {
  return t.mock.method(console, "warn", () => undefined);
}

test("state round-trips started_at", async t => {
  const dir = await createDir(t);
  const storage = new StateFileStorage(join(dir, "data", "state.json"));

  await storage.save({ started_at: 1_700_000_000 });
  assert.deepEqual(await storage.load(), { started_at: 1_700_000_000 });

  await storage.save({});
  assert.deepEqual(await storage.load(), {});
  const persisted = JSON.parse(await readFile(storage.filePath, "utf-8"));
  assert.deepEqual(persisted, { started_at: null });
});

test("missing state file is idle and does not exist", async t => {
  const dir = await createDir(t);
  const storage = new StateFileStorage(join(dir, "state.json"));
  const warn = silenceWarnings(t);

  assert.equal(await storage.exists(), false);
  assert.deepEqual(await storage.load(), {});
  assert.equal(warn.mock.callCount(), 0);

  await storage.save({ started_at: 10 });
  assert.equal(await storage.exists(), true);
});

test("state file without started_at is idle", async t => {
  const dir = await createDir(t);
  const filePath = join(dir, "state.json");
  await writeFile(filePath, "{}", "utf-8");
  const warn = silenceWarnings(t);

  assert.deepEqual(await new StateFileStorage(filePath).load(), {});
  assert.equal(warn.mock.callCount(), 0);
});

test("corrupt state file falls back to idle with a warning", async t => {
  const dir = await createDir(t);
  const filePath = join(dir, "state.json");
  const warn = silenceWarnings(t);

  await writeFile(filePath, "started_at = 12", "utf-8");
  assert.deepEqual(await new StateFileStorage(filePath).load(), {});

  await writeFile(filePath, JSON.stringify({ started_at: -5 }), "utf-8");
  assert.deepEqual(await new StateFileStorage(filePath).load(), {});

  assert.equal(warn.mock.callCount(), 2);
});

test("unreadable state path is an error", async t => {
  const dir = await createDir(t);
  const filePath = join(dir, "state.json");
  await mkdir(filePath);

  await assert.rejects(() => new StateFileStorage(filePath).load(), { code: "EISDIR" });
});

test("state write failures propagate", async t => {
  const dir = await createDir(t);
  const blocker = join(dir, "blocker");
  await writeFile(blocker, "", "utf-8");

  await assert.rejects(() => new StateFileStorage(join(blocker, "state.json")).save({ started_at: 1 }));
});

test("missing config file yields defaults", async t => {
  const dir = await createDir(t);
  const storage = new ConfigFileStorage(join(dir, "config.json"));

  assert.deepEqual(await storage.load(), { count: 8, duration: 25, rest: 5 });
});

test("hand-edited config keeps its field names", async t => {
  const dir = await createDir(t);
  const filePath = join(dir, "config.json");
  await writeFile(filePath, JSON.stringify({ count: 4, duration: 50, rest: 10, display: "compact" }), "utf-8");

  assert.deepEqual(await new ConfigFileStorage(filePath).load(), {
    count: 4,
    duration: 50,
    rest: 10,
    display: "compact"
  });
});

test("invalid config falls back to defaults with a warning", async t => {
  const dir = await createDir(t);
  const filePath = join(dir, "config.json");
  await writeFile(filePath, JSON.stringify({ count: 8, duration: 0, rest: 5 }), "utf-8");
  const warn = silenceWarnings(t);

  assert.deepEqual(await new ConfigFileStorage(filePath).load(), { count: 8, duration: 25, rest: 5 });
  assert.equal(warn.mock.callCount(), 1);
});

test("config save writes the persisted field names", async t => {
  const dir = await createDir(t);
  const storage = new ConfigFileStorage(join(dir, "nested", "config.json"));

  await storage.save({ count: 8, duration: 25, rest: 5 });

  const persisted = JSON.parse(await readFile(storage.filePath, "utf-8"));
  assert.deepEqual(persisted, { count: 8, duration: 25, rest: 5 });
});
