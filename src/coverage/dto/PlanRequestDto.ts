// src/coverage/dto/PlanRequestDto.ts

/**
 * PlanRequest DTO parser/validator
 *
 * HTTP boundary validator for POST /plan_coverage bodies.
 * Returns a strongly typed domain PlanRequest or throws CoverageDtoValidationError.
 *
 * Wire format (snake_case):
 * {
 *   "wall_width": 10,
 *   "wall_height": 10,
 *   "obstacles": [{ "x": 4, "y": 4, "width": 2, "height": 2 }]
 * }
 */

import type { Obstacle } from '../domain/Obstacle';
import type { PlanRequest } from '../domain/Trajectory';
import { CoverageDtoValidationError } from './CoverageDtoValidationError';

/**
 * Largest accepted wall side. The sweep is synchronous and grows with the
 * wall area, so bigger walls would stall every other request.
 */
export const MAX_WALL_DIMENSION = 100;

export function parsePlanRequestDto(payload: unknown): PlanRequest {
  const issues: string[] = [];

  if (!isRecord(payload)) {
    throw new CoverageDtoValidationError('Invalid PlanRequest payload', [
      'Payload must be a JSON object.',
    ]);
  }

  const wallWidth = readWallDimension(payload, 'wall_width', issues);
  const wallHeight = readWallDimension(payload, 'wall_height', issues);
  const obstacles = readObstacles(payload, 'obstacles', issues);

  if (issues.length > 0) {
    throw new CoverageDtoValidationError('Invalid PlanRequest payload', issues);
  }

  return { wallWidth, wallHeight, obstacles };
}

/* ------------------------- obstacles parsing ------------------------- */

function readObstacles(obj: Record<string, unknown>, key: string, issues: string[]): Obstacle[] {
  const value = obj[key];
  if (value === undefined) return [];
  if (!Array.isArray(value)) {
    issues.push(`"${key}" must be an array when provided.`);
    return [];
  }

  const obstacles: Obstacle[] = [];
  value.forEach((item: unknown, index) => {
    const label = `${key}[${index}]`;
    if (!isRecord(item)) {
      issues.push(`"${label}" must be an object.`);
      return;
    }

    const before = issues.length;
    const x = readFiniteNumber(item, 'x', issues, label);
    const y = readFiniteNumber(item, 'y', issues, label);
    const width = readPositiveNumber(item, 'width', issues, label);
    const height = readPositiveNumber(item, 'height', issues, label);

    if (issues.length === before) {
      obstacles.push({ x, y, width, height });
    }
  });

  return obstacles;
}

/* ------------------------- small internal helpers ------------------------- */

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function fieldName(key: string, parent?: string): string {
  return parent ? `${parent}.${key}` : key;
}

function readFiniteNumber(
  obj: Record<string, unknown>,
  key: string,
  issues: string[],
  parent?: string,
): number {
  const value = obj[key];
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    issues.push(`"${fieldName(key, parent)}" must be a number.`);
    return 0;
  }
  return value;
}

function readPositiveNumber(
  obj: Record<string, unknown>,
  key: string,
  issues: string[],
  parent?: string,
): number {
  const value = obj[key];
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    issues.push(`"${fieldName(key, parent)}" must be a number greater than 0.`);
    return 0;
  }
  return value;
}

function readWallDimension(obj: Record<string, unknown>, key: string, issues: string[]): number {
  const before = issues.length;
  const value = readPositiveNumber(obj, key, issues);
  if (issues.length === before && value > MAX_WALL_DIMENSION) {
    issues.push(`"${key}" must not exceed ${MAX_WALL_DIMENSION}.`);
    return 0;
  }
  return value;
}
