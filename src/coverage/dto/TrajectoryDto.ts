// src/coverage/dto/TrajectoryDto.ts

/**
 * Trajectory wire mapping for the HTTP boundary.
 * Domain objects are camelCase; the public JSON is snake_case.
 */

import type { Obstacle } from '../domain/Obstacle';
import type { PathPoint, Trajectory } from '../domain/Trajectory';
import { CoverageDtoValidationError } from './CoverageDtoValidationError';

export type TrajectoryResponseDto = {
  id: number;
  wall_width: number;
  wall_height: number;
  path: PathPoint[];
  obstacles: Obstacle[];
  created_at: string;
};

export function toTrajectoryResponseDto(trajectory: Trajectory): TrajectoryResponseDto {
  return {
    id: trajectory.id,
    wall_width: trajectory.wallWidth,
    wall_height: trajectory.wallHeight,
    path: trajectory.path,
    obstacles: trajectory.obstacles,
    created_at: trajectory.createdAt,
  };
}

/**
 * Parse the `:id` path parameter of GET /get_trajectory/:id.
 * Any integer is accepted; ids that were never assigned resolve to not-found downstream.
 */
export function parseTrajectoryId(raw: unknown): number {
  const id = typeof raw === 'string' && /^[+-]?\d+$/.test(raw) ? Number(raw) : Number.NaN;

  if (!Number.isSafeInteger(id)) {
    throw new CoverageDtoValidationError('Invalid trajectory id', [
      '"id" must be an integer.',
    ]);
  }

  return id;
}
