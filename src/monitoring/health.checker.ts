/**
 * Health Checker
 *
 * Checks what the service needs to do its job:
 * - The snapshot data directory is writable
 * - The last check of each scope succeeded
 *
 * Exposed via GET /api/v1/health
 */
import type { SnapshotRepository } from "../persistence/repositories/snapshot.repository";
import { getLastOutcomes } from "./check-history";
import { logger } from "./logger";

interface HealthCheck {
  status: "up" | "down";
  latency?: number;
  error?: string;
}

export interface HealthReport {
  status: "healthy" | "degraded" | "unhealthy";
  uptime: number;
  checks: {
    storage: HealthCheck;
    lastChecks: {
      status: "up" | "down";
      failedScopes: string[];
    };
  };
}

const startTime = Date.now();

/**
 * Run all health checks and produce a report.
 * Storage down → unhealthy; a failed last check → degraded.
 */
export async function checkHealth(repository: SnapshotRepository): Promise<HealthReport> {
  const storage = await checkStorage(repository);
  const failedScopes = getLastOutcomes()
    .filter((outcome) => outcome.status === "failed")
    .map((outcome) => outcome.scope);

  const status =
    storage.status === "down"
      ? "unhealthy"
      : failedScopes.length > 0
        ? "degraded"
        : "healthy";

  return {
    status,
    uptime: Math.floor((Date.now() - startTime) / 1000),
    checks: {
      storage,
      lastChecks: {
        status: failedScopes.length > 0 ? "down" : "up",
        failedScopes,
      },
    },
  };
}

async function checkStorage(repository: SnapshotRepository): Promise<HealthCheck> {
  const start = Date.now();
  try {
    await repository.checkWritable();
    return { status: "up", latency: Date.now() - start };
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error);
    logger.error({ error: msg }, "Storage health check failed");
    return { status: "down", latency: Date.now() - start, error: msg };
  }
}
