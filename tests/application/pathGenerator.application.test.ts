import {
  DEFAULT_STEP_SIZE,
  generateCoveragePath,
} from '../../src/coverage/application/PathGenerator';
import { containsPoint, type Obstacle } from '../../src/coverage/domain/Obstacle';

describe('generateCoveragePath', () => {
  it('should use a 0.25 step by default', () => {
    expect(DEFAULT_STEP_SIZE).toBe(0.25);
  });

  it('should sweep back and forth row by row on an empty wall', () => {
    const path = generateCoveragePath(1, 0.5, []);

    expect(path).toEqual([
      [0, 0],
      [0.25, 0],
      [0.5, 0],
      [0.75, 0],
      [1, 0],
      [1, 0.25],
      [0.75, 0.25],
      [0.5, 0.25],
      [0.25, 0.25],
      [0, 0.25],
      [0, 0.5],
      [0.25, 0.5],
      [0.5, 0.5],
      [0.75, 0.5],
      [1, 0.5],
    ]);
  });

  it('should start each row on the column where the previous row ended', () => {
    // 0.6 is not a multiple of the step: the last column reached is 0.5
    const path = generateCoveragePath(0.6, 0.25, []);

    expect(path).toEqual([
      [0, 0],
      [0.25, 0],
      [0.5, 0],
      [0.5, 0.25],
      [0.25, 0.25],
      [0, 0.25],
    ]);
  });

  it('should skip points on or inside obstacles without emitting substitutes', () => {
    const obstacles: Obstacle[] = [{ x: 0.25, y: 0, width: 0.25, height: 0.25 }];

    const path = generateCoveragePath(1, 0.25, obstacles);

    expect(path).toEqual([
      [0, 0],
      [0.75, 0],
      [1, 0],
      [1, 0.25],
      [0.75, 0.25],
      [0, 0.25],
    ]);
  });

  it('should emit the origin for a wall smaller than one step', () => {
    expect(generateCoveragePath(0.1, 0.1, [])).toEqual([[0, 0]]);
  });

  it('should ignore obstacles that lie outside the wall', () => {
    const path = generateCoveragePath(1, 1, [{ x: 20, y: 20, width: 1, height: 1 }]);

    expect(path).toHaveLength(25);
  });

  it('should honour a custom step size', () => {
    const path = generateCoveragePath(1, 1, [], { stepSize: 0.5 });

    expect(path).toEqual([
      [0, 0],
      [0.5, 0],
      [1, 0],
      [1, 0.5],
      [0.5, 0.5],
      [0, 0.5],
      [0, 1],
      [0.5, 1],
      [1, 1],
    ]);
  });

  it('should reject a non-positive step size', () => {
    expect(() => generateCoveragePath(1, 1, [], { stepSize: 0 })).toThrow(RangeError);
  });

  it('should keep every point inside the wall when there are no obstacles', () => {
    const walls: Array<[number, number]> = [
      [10, 10],
      [3.3, 7.1],
      [0.3, 12],
      [5, 0.2],
    ];

    for (const [width, height] of walls) {
      const path = generateCoveragePath(width, height, []);

      expect(path.length).toBeGreaterThan(0);
      for (const [x, y] of path) {
        expect(x).toBeGreaterThanOrEqual(0);
        expect(x).toBeLessThanOrEqual(width);
        expect(y).toBeGreaterThanOrEqual(0);
        expect(y).toBeLessThanOrEqual(height);
      }
    }
  });

  it('should never emit a point inside any obstacle', () => {
    const obstacles: Obstacle[] = [
      { x: 2, y: 2, width: 3, height: 3 },
      { x: 10, y: 10, width: 2, height: 2 },
      { x: 7, y: 12, width: 1, height: 1 },
    ];

    const path = generateCoveragePath(15, 15, obstacles);

    expect(path.length).toBeGreaterThan(0);
    for (const [x, y] of path) {
      expect(obstacles.some((o) => containsPoint(o, x, y))).toBe(false);
    }
  });

  it('should drop exactly the grid points covered by an obstacle', () => {
    // 41 x 41 grid; the 2 x 2 obstacle covers 9 x 9 of its points
    expect(generateCoveragePath(10, 10, [])).toHaveLength(1681);
    expect(generateCoveragePath(10, 10, [{ x: 4, y: 4, width: 2, height: 2 }])).toHaveLength(1600);
  });
});
