/**
 * Trajectory
 *
 * The persisted result of one planning operation: the wall it was planned
 * for, the obstacle snapshot taken at planning time, and the sweep path.
 */

import type { Obstacle } from './Obstacle';

/**
 * A single sampled point of the sweep, `[x, y]`.
 */
export type PathPoint = [number, number];

/**
 * Input of a planning operation.
 */
export interface PlanRequest {
  wallWidth: number;
  wallHeight: number;
  obstacles: Obstacle[];
}

/**
 * Everything the store needs to persist a new Trajectory.
 * The id and timestamp are assigned by the store.
 */
export interface NewTrajectory extends PlanRequest {
  path: PathPoint[];
}

export interface Trajectory extends NewTrajectory {
  /**
   * Assigned by the store; never changes and is never reused.
   */
  id: number;

  /**
   * ISO-8601 UTC timestamp of insertion.
   */
  createdAt: string;
}
