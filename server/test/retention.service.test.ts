import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import fs from "fs";
import path from "path";
import { RetentionService } from "../src/services/retention.service";
import { FakeStorage, makeTempDir, writeSizedFile } from "./helpers";

const WINDOW_SECONDS = 86400;
const REGISTERED_AT = new Date("2026-03-01T12:00:00Z");
const AFTER_DEADLINE = new Date("2026-03-02T12:00:00Z");

describe("RetentionService", () => {
  let dir: string;
  let storage: FakeStorage;
  let retention: RetentionService;

  beforeEach(async () => {
    dir = await makeTempDir();
    storage = new FakeStorage();
    retention = new RetentionService({
      storage,
      retentionWindowSeconds: WINDOW_SECONDS,
      sweepIntervalSeconds: 900,
      downloadDir: dir,
    });
  });

  afterEach(async () => {
    vi.useRealTimers();
    await retention.stop();
    await fs.promises.rm(dir, { recursive: true, force: true });
  });

  it("should set the deadline one window after registration", () => {
    const entry = retention.register(
      { localPath: path.join(dir, "a.mp4"), remoteRef: "wa-downloads/a.mp4" },
      REGISTERED_AT,
    );

    expect(entry).not.toBeNull();
    expect(entry?.deadline.toISOString()).toBe("2026-03-02T12:00:00.000Z");
    expect(entry?.state).toBe("live");
    expect(retention.size).toBe(1);
  });

  it("should ignore empty targets", () => {
    expect(retention.register({})).toBeNull();
    expect(retention.size).toBe(0);
  });

  it("should leave entries alone before their deadline", async () => {
    const localPath = await writeSizedFile(path.join(dir, "a.mp4"), 10);
    retention.register({ localPath }, REGISTERED_AT);

    await expect(retention.sweep(new Date("2026-03-02T11:59:59Z"))).resolves.toBe(0);
    expect(fs.existsSync(localPath)).toBe(true);
    expect(retention.size).toBe(1);
  });

  it("should delete the local file and remote object once due", async () => {
    const localPath = await writeSizedFile(path.join(dir, "a.mp4"), 10);
    retention.register({ localPath, remoteRef: "wa-downloads/a.mp4" }, REGISTERED_AT);

    await expect(retention.sweep(AFTER_DEADLINE)).resolves.toBe(1);
    expect(fs.existsSync(localPath)).toBe(false);
    expect(storage.deleted).toEqual(["wa-downloads/a.mp4"]);
    expect(retention.size).toBe(0);
  });

  it("should be idempotent across sweeps", async () => {
    const localPath = await writeSizedFile(path.join(dir, "a.mp4"), 10);
    retention.register({ localPath, remoteRef: "wa-downloads/a.mp4" }, REGISTERED_AT);

    await retention.sweep(AFTER_DEADLINE);
    await expect(retention.sweep(AFTER_DEADLINE)).resolves.toBe(0);
    expect(storage.deleted).toEqual(["wa-downloads/a.mp4"]);
  });

  it("should count artifacts that are already gone as deleted", async () => {
    storage.missing.add("wa-downloads/gone.mp4");
    retention.register(
      { localPath: path.join(dir, "never-written.mp4"), remoteRef: "wa-downloads/gone.mp4" },
      REGISTERED_AT,
    );

    await expect(retention.sweep(AFTER_DEADLINE)).resolves.toBe(1);
    expect(retention.size).toBe(0);
  });

  it("should retry a failed remote delete on the next sweep", async () => {
    const localPath = await writeSizedFile(path.join(dir, "a.mp4"), 10);
    retention.register({ localPath, remoteRef: "wa-downloads/a.mp4" }, REGISTERED_AT);
    storage.deleteError = new Error("connect ECONNREFUSED");

    await expect(retention.sweep(AFTER_DEADLINE)).resolves.toBe(0);
    expect(fs.existsSync(localPath)).toBe(false);
    expect(retention.list()).toMatchObject([
      { state: "live", localDeleted: true, remoteDeleted: false },
    ]);

    storage.deleteError = null;
    await expect(retention.sweep(AFTER_DEADLINE)).resolves.toBe(1);
    expect(storage.deleted).toEqual(["wa-downloads/a.mp4"]);
    expect(retention.size).toBe(0);
  });

  it("should refuse registrations after stop", async () => {
    await retention.stop();
    expect(retention.register({ localPath: path.join(dir, "a.mp4") })).toBeNull();
  });

  it("should adopt leftovers from a previous run", async () => {
    const known = await writeSizedFile(path.join(dir, "known.mp4"), 10);
    await writeSizedFile(path.join(dir, "orphan.mp4"), 10);
    await fs.promises.mkdir(path.join(dir, "subdir"));
    retention.register({ localPath: known }, REGISTERED_AT);
    storage.objects = [
      { remoteRef: "wa-downloads/old.mp4", lastModified: new Date("2026-01-01T00:00:00Z") },
    ];

    const now = new Date("2099-01-01T00:00:00Z");
    await expect(retention.adoptOrphans(now)).resolves.toBe(2);

    const remote = retention.list().find((entry) => entry.remoteRef === "wa-downloads/old.mp4");
    expect(remote?.deadline.toISOString()).toBe("2026-01-02T00:00:00.000Z");
    expect(retention.list().map((entry) => entry.localPath).sort()).toEqual([
      known,
      path.join(dir, "orphan.mp4"),
      undefined,
    ]);
  });

  it("should sweep on its interval once started", async () => {
    vi.useFakeTimers();
    retention.register({ remoteRef: "wa-downloads/a.mp4" }, new Date(0));

    retention.start();
    await vi.advanceTimersByTimeAsync(900 * 1000);
    await retention.stop();

    expect(storage.deleted).toEqual(["wa-downloads/a.mp4"]);
  });
});
