// src/coverage/application/PathGenerator.ts

import { containsPoint, type Obstacle } from '../domain/Obstacle';
import type { PathPoint } from '../domain/Trajectory';

export const DEFAULT_STEP_SIZE = 0.25;

export type PathGeneratorOptions = {
  stepSize?: number;
};

/**
 * Boustrophedon (back-and-forth) coverage sweep over a `wallWidth` x `wallHeight` wall.
 *
 * Rows are sampled every `stepSize` from y = 0 up to and including `wallHeight`,
 * alternating direction, each row starting on the column where the previous one
 * ended. Points that fall inside an obstacle (edges included) are dropped, so
 * obstacles leave gaps in the path rather than detours.
 *
 * Cost is O(rows x columns x obstacles): every sampled point scans the whole
 * obstacle list. Large walls or many obstacles would need a spatial index.
 */
export function generateCoveragePath(
  wallWidth: number,
  wallHeight: number,
  obstacles: readonly Obstacle[],
  options: PathGeneratorOptions = {},
): PathPoint[] {
  const stepSize = options.stepSize ?? DEFAULT_STEP_SIZE;
  if (!Number.isFinite(stepSize) || stepSize <= 0) {
    throw new RangeError(`stepSize must be a positive number, got ${stepSize}`);
  }

  const path: PathPoint[] = [];
  let x = 0;
  let y = 0;
  let direction = 1;

  const isBlocked = (px: number, py: number): boolean =>
    obstacles.some((obstacle) => containsPoint(obstacle, px, py));

  while (y <= wallHeight) {
    while (x >= 0 && x <= wallWidth) {
      if (!isBlocked(x, y)) {
        path.push([x, y]);
      }
      x += stepSize * direction;
    }

    // back onto the last in-range column, then turn around one row up
    x -= stepSize * direction;
    y += stepSize;
    direction = -direction;
  }

  return path;
}
