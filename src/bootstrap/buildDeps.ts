// src/bootstrap/buildDeps.ts

/**
 * Composition root
 * ----------------
 * The only place that wires infrastructure into application services.
 * app.ts depends on the CoveragePlannerPort, never on SQLite directly.
 */

import type { AppConfig } from '../shared/config/Config';
import { logger } from '../shared/logging/Logger';

import { SqliteTrajectoryStore } from '../coverage/infrastructure/SqliteTrajectoryStore';
import { CoveragePlannerService } from '../coverage/application/CoveragePlannerService';

export type RuntimeDeps = {
  coveragePlanner: Pick<CoveragePlannerService, 'planCoverage' | 'getTrajectory'>;
};

/**
 * Builds runtime dependencies and makes sure the trajectories table exists.
 */
export function buildRuntimeDeps(
  appConfig: Pick<AppConfig, 'databasePath' | 'coverageStepSize'>,
): RuntimeDeps {
  const trajectoryStore = new SqliteTrajectoryStore({ databasePath: appConfig.databasePath });
  trajectoryStore.initialize();
  logger.info({ databasePath: appConfig.databasePath }, 'Database setup complete');

  const coveragePlanner = new CoveragePlannerService({
    trajectoryStore,
    stepSize: appConfig.coverageStepSize,
  });

  return { coveragePlanner };
}
