import { CoverageDtoValidationError } from '../../src/coverage/dto/CoverageDtoValidationError';
import { MAX_WALL_DIMENSION, parsePlanRequestDto } from '../../src/coverage/dto/PlanRequestDto';
import { parseTrajectoryId } from '../../src/coverage/dto/TrajectoryDto';

function issuesOf(fn: () => unknown): string[] {
  try {
    fn();
  } catch (err) {
    if (err instanceof CoverageDtoValidationError) return err.issues;
    throw err;
  }
  throw new Error('Expected a CoverageDtoValidationError');
}

describe('parsePlanRequestDto', () => {
  it('should map a valid payload to a PlanRequest', () => {
    expect(
      parsePlanRequestDto({
        wall_width: 15,
        wall_height: 12.5,
        obstacles: [{ x: -1, y: 0, width: 3, height: 3 }],
      }),
    ).toEqual({
      wallWidth: 15,
      wallHeight: 12.5,
      obstacles: [{ x: -1, y: 0, width: 3, height: 3 }],
    });
  });

  it('should drop unknown obstacle fields', () => {
    const request = parsePlanRequestDto({
      wall_width: 1,
      wall_height: 1,
      obstacles: [{ x: 0, y: 0, width: 1, height: 1, label: 'window' }],
    });

    expect(request.obstacles).toEqual([{ x: 0, y: 0, width: 1, height: 1 }]);
  });

  it('should reject a payload that is not an object', () => {
    expect(issuesOf(() => parsePlanRequestDto([1, 2]))).toEqual(['Payload must be a JSON object.']);
    expect(issuesOf(() => parsePlanRequestDto(undefined))).toEqual([
      'Payload must be a JSON object.',
    ]);
  });

  it('should report every invalid field', () => {
    expect(
      issuesOf(() =>
        parsePlanRequestDto({
          wall_width: '10',
          wall_height: 0,
          obstacles: [null, { x: 'a', y: 1, width: 1, height: -2 }],
        }),
      ),
    ).toEqual([
      '"wall_width" must be a number greater than 0.',
      '"wall_height" must be a number greater than 0.',
      '"obstacles[0]" must be an object.',
      '"obstacles[1].x" must be a number.',
      '"obstacles[1].height" must be a number greater than 0.',
    ]);
  });

  it('should reject obstacles that are not a list', () => {
    expect(
      issuesOf(() => parsePlanRequestDto({ wall_width: 1, wall_height: 1, obstacles: {} })),
    ).toEqual(['"obstacles" must be an array when provided.']);
  });

  it('should reject null obstacles instead of defaulting them', () => {
    expect(
      issuesOf(() => parsePlanRequestDto({ wall_width: 1, wall_height: 1, obstacles: null })),
    ).toEqual(['"obstacles" must be an array when provided.']);
  });

  it('should cap wall dimensions', () => {
    expect(MAX_WALL_DIMENSION).toBe(100);
    expect(parsePlanRequestDto({ wall_width: 100, wall_height: 100 }).wallWidth).toBe(100);
    expect(issuesOf(() => parsePlanRequestDto({ wall_width: 1e5, wall_height: 100.5 }))).toEqual([
      '"wall_width" must not exceed 100.',
      '"wall_height" must not exceed 100.',
    ]);
  });
});

describe('parseTrajectoryId', () => {
  it('should parse decimal integer strings', () => {
    expect(parseTrajectoryId('99999')).toBe(99999);
    expect(parseTrajectoryId('0')).toBe(0);
  });

  it('should accept signed integers', () => {
    expect(parseTrajectoryId('-1')).toBe(-1);
    expect(parseTrajectoryId('+5')).toBe(5);
  });

  it.each(['abc', '1.5', '', '1e3', '--1', '99999999999999999999'])(
    'should reject %p',
    (raw) => {
      expect(issuesOf(() => parseTrajectoryId(raw))).toEqual(['"id" must be an integer.']);
    },
  );
});
