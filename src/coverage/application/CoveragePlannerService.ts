// src/coverage/application/CoveragePlannerService.ts

import type { PlanRequest, Trajectory } from '../domain/Trajectory';
import type { ITrajectoryStore } from '../domain/TrajectoryStore';
import { TrajectoryNotFoundError } from '../domain/TrajectoryNotFoundError';
import { logger } from '../../shared/logging/Logger';

import { DEFAULT_STEP_SIZE, generateCoveragePath } from './PathGenerator';

/**
 * Dependencies required for planning and retrieving trajectories.
 * Injected for testability and clean architecture separation.
 */
export type CoveragePlannerDeps = {
  trajectoryStore: ITrajectoryStore;
  stepSize?: number;
};

/**
 * CoveragePlannerService turns a PlanRequest into a stored Trajectory.
 */
export class CoveragePlannerService {
  private readonly stepSize: number;

  public constructor(private readonly deps: CoveragePlannerDeps) {
    this.stepSize = deps.stepSize ?? DEFAULT_STEP_SIZE;
  }

  /**
   * Generate the sweep for the request and persist it together with its inputs.
   */
  public async planCoverage(request: PlanRequest): Promise<Trajectory> {
    logger.info(
      {
        wallWidth: request.wallWidth,
        wallHeight: request.wallHeight,
        obstacleCount: request.obstacles.length,
      },
      'Planning coverage path',
    );

    const path = generateCoveragePath(request.wallWidth, request.wallHeight, request.obstacles, {
      stepSize: this.stepSize,
    });

    const trajectory = await this.deps.trajectoryStore.insert({
      wallWidth: request.wallWidth,
      wallHeight: request.wallHeight,
      obstacles: request.obstacles.map((o) => ({ ...o })),
      path,
    });

    logger.info(
      { trajectoryId: trajectory.id, pointCount: trajectory.path.length },
      'Trajectory generated and saved',
    );

    return trajectory;
  }

  /**
   * Look up a stored Trajectory.
   * Throws TrajectoryNotFoundError when the id is unknown.
   */
  public async getTrajectory(id: number): Promise<Trajectory> {
    const trajectory = await this.deps.trajectoryStore.getById(id);
    if (!trajectory) {
      logger.debug({ trajectoryId: id }, 'Trajectory not found');
      throw new TrajectoryNotFoundError(id);
    }
    return trajectory;
  }
}
