// src/http/routes/coverageRoutes.ts

/**
 * Coverage planning routes
 *
 * POST /plan_coverage         validate body -> plan + persist -> stored trajectory
 * GET  /get_trajectory/:id    validate id -> stored trajectory (404 when unknown)
 *
 * Routes stay thin; errors bubble to the global error handler.
 */

import type { NextFunction, Request, Response } from 'express';
import { Router } from 'express';

import type { PlanRequest, Trajectory } from '../../coverage/domain/Trajectory';
import { parsePlanRequestDto } from '../../coverage/dto/PlanRequestDto';
import { parseTrajectoryId, toTrajectoryResponseDto } from '../../coverage/dto/TrajectoryDto';

/**
 * Port interface: routes depend on this contract rather than on CoveragePlannerService.
 */
export interface CoveragePlannerPort {
  planCoverage(request: PlanRequest): Promise<Trajectory>;
  getTrajectory(id: number): Promise<Trajectory>;
}

export function createCoverageRoutes(planner: CoveragePlannerPort): Router {
  const router = Router();

  router.post('/plan_coverage', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const request = parsePlanRequestDto(req.body);
      const trajectory = await planner.planCoverage(request);
      return res.status(200).json(toTrajectoryResponseDto(trajectory));
    } catch (err) {
      return next(err);
    }
  });

  router.get('/get_trajectory/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const id = parseTrajectoryId(req.params.id);
      const trajectory = await planner.getTrajectory(id);
      return res.status(200).json(toTrajectoryResponseDto(trajectory));
    } catch (err) {
      return next(err);
    }
  });

  return router;
}
