/**
 * Obstacle
 *
 * Axis-aligned rectangle on the wall that the sweep must not visit.
 * (x, y) is the bottom-left corner; width and height are positive.
 */
export interface Obstacle {
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;
}

/**
 * Closed-rectangle containment: points on the obstacle's edges count as inside.
 */
export function containsPoint(obstacle: Obstacle, x: number, y: number): boolean {
  return (
    obstacle.x <= x &&
    x <= obstacle.x + obstacle.width &&
    obstacle.y <= y &&
    y <= obstacle.y + obstacle.height
  );
}
