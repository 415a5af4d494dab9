/**
 * Snapshot Repository
 *
 * Loads and saves one snapshot file per scope under the data directory:
 * - ALL       → snapshot.json
 * - NV, CA, … → snapshot_NV.json, snapshot_CA.json, …
 *
 * Saves are atomic: the document is written to a temp file beside the
 * target and renamed over it. Each save gets its own temp name; ordering of
 * writers per scope is the check worker's job.
 */
import crypto from "crypto";
import fs from "fs";
import path from "path";
import type { StateScope } from "../../shared/types/event.types";
import type { Snapshot } from "../../shared/types/snapshot.types";
import { ALL_STATES } from "../../config/constants";
import { SnapshotLoadError, SnapshotSaveError } from "../../shared/errors/check.errors";
import { validateSnapshotDocument } from "../../processing/data-validator";
import { fromDocument, toDocument } from "../snapshot.serializer";
import { logger } from "../../monitoring/logger";
import config from "../../config";

export class SnapshotRepository {
  private dataDir: string;

  constructor(dataDir: string = config.dataDir) {
    this.dataDir = path.resolve(dataDir);
  }

  /** Absolute path of the snapshot file for a scope */
  pathFor(scope: StateScope): string {
    const normalized = scope.trim().toUpperCase();
    if (normalized === "" || normalized === ALL_STATES) {
      return path.join(this.dataDir, "snapshot.json");
    }
    return path.join(this.dataDir, `snapshot_${normalized}.json`);
  }

  /**
   * Load the snapshot for a scope.
   *
   * @returns The snapshot, or null when none was saved yet (first run)
   * @throws SnapshotLoadError when the file is unreadable or malformed
   */
  async load(scope: StateScope): Promise<Snapshot | null> {
    const file = this.pathFor(scope);

    let content: string;
    try {
      content = await fs.promises.readFile(file, "utf8");
    } catch (error) {
      if (isNotFound(error)) {
        logger.debug({ scope, file }, "No snapshot yet, first run");
        return null;
      }
      throw new SnapshotLoadError(`Reading ${file}: ${(error as Error).message}`);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new SnapshotLoadError(`Parsing ${file}: ${(error as Error).message}`);
    }

    const snapshot = fromDocument(validateSnapshotDocument(parsed, file));
    logger.debug(
      { scope, file, eventCount: Object.keys(snapshot.events).length },
      "Snapshot loaded"
    );
    return snapshot;
  }

  /**
   * Save the snapshot for a scope, replacing any previous one.
   *
   * @throws SnapshotSaveError when the directory or file cannot be written
   */
  async save(snapshot: Snapshot, scope: StateScope): Promise<void> {
    const file = this.pathFor(scope);
    const tmpFile = `${file}.${process.pid}.${crypto.randomBytes(4).toString("hex")}.tmp`;

    try {
      await fs.promises.mkdir(this.dataDir, { recursive: true });
      await fs.promises.writeFile(
        tmpFile,
        JSON.stringify(toDocument(snapshot), null, 2),
        "utf8"
      );
      await fs.promises.rename(tmpFile, file);
    } catch (error) {
      await this.discard(tmpFile);
      throw new SnapshotSaveError(`Writing ${file}: ${(error as Error).message}`);
    }

    logger.info(
      { scope, file, eventCount: Object.keys(snapshot.events).length },
      "Snapshot saved"
    );
  }

  private async discard(tmpFile: string): Promise<void> {
    try {
      await fs.promises.rm(tmpFile, { force: true });
    } catch (error) {
      logger.warn({ tmpFile, error: (error as Error).message }, "Temp snapshot file not removed");
    }
  }

  /** Directory must exist (or be creatable) and be writable */
  async checkWritable(): Promise<void> {
    await fs.promises.mkdir(this.dataDir, { recursive: true });
    await fs.promises.access(this.dataDir, fs.constants.W_OK);
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
