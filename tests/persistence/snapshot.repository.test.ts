import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { SnapshotRepository } from "../../src/persistence/repositories/snapshot.repository";
import { createSnapshot } from "../../src/processing/snapshot-manager";
import { SnapshotLoadError, SnapshotSaveError } from "../../src/shared/errors/check.errors";
import { RUN_1, makeEvent } from "../helpers/fixtures";

describe("SnapshotRepository", () => {
  let dataDir: string;
  let repository: SnapshotRepository;

  beforeEach(() => {
    dataDir = fs.mkdtempSync(path.join(os.tmpdir(), "snapshots-"));
    repository = new SnapshotRepository(dataDir);
  });

  afterEach(() => {
    fs.rmSync(dataDir, { recursive: true, force: true });
  });

  it("names one file per scope", () => {
    expect(repository.pathFor("ALL")).toBe(path.join(dataDir, "snapshot.json"));
    expect(repository.pathFor("nv")).toBe(path.join(dataDir, "snapshot_NV.json"));
  });

  it("returns null before the first save", async () => {
    await expect(repository.load("ALL")).resolves.toBeNull();
  });

  it("loads what was saved", async () => {
    const snapshot = createSnapshot(
      [makeEvent({ state: "NV", title: "Chimera Golf Club", city: "Las Vegas" })],
      RUN_1.toISOString()
    );

    await repository.save(snapshot, "NV");

    await expect(repository.load("NV")).resolves.toEqual(snapshot);
    await expect(repository.load("ALL")).resolves.toBeNull();
    expect(fs.readdirSync(dataDir)).toEqual(["snapshot_NV.json"]);
  });

  it("creates the data directory on save", async () => {
    const nested = new SnapshotRepository(path.join(dataDir, "nested", "dir"));

    await nested.save(createSnapshot([], RUN_1.toISOString()), "ALL");

    expect(fs.existsSync(path.join(dataDir, "nested", "dir", "snapshot.json"))).toBe(true);
  });

  it("rejects a file that is not JSON", async () => {
    fs.writeFileSync(path.join(dataDir, "snapshot.json"), "{ not json");

    await expect(repository.load("ALL")).rejects.toBeInstanceOf(SnapshotLoadError);
  });

  it("rejects a file with the wrong shape", async () => {
    fs.writeFileSync(path.join(dataDir, "snapshot.json"), JSON.stringify({ events: [] }));

    await expect(repository.load("ALL")).rejects.toBeInstanceOf(SnapshotLoadError);
  });

  it("reports a save into an unusable directory", async () => {
    const blocker = path.join(dataDir, "blocker");
    fs.writeFileSync(blocker, "");
    const broken = new SnapshotRepository(blocker);

    await expect(broken.save(createSnapshot([], RUN_1.toISOString()), "ALL")).rejects.toBeInstanceOf(
      SnapshotSaveError
    );
  });

  it("completes overlapping saves of the same scope", async () => {
    const first = createSnapshot(
      [makeEvent({ state: "NV", title: "Chimera Golf Club", city: "Las Vegas" })],
      RUN_1.toISOString()
    );
    const second = createSnapshot([], RUN_1.toISOString());

    const results = await Promise.allSettled([
      repository.save(first, "ALL"),
      repository.save(second, "ALL"),
    ]);

    expect(results.map((r) => r.status)).toEqual(["fulfilled", "fulfilled"]);
    expect(fs.readdirSync(dataDir)).toEqual(["snapshot.json"]);
  });

  it("confirms a writable directory", async () => {
    await expect(repository.checkWritable()).resolves.toBeUndefined();
  });
});
