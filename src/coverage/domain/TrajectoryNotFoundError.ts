/**
 * Thrown when a lookup targets an id that has no stored Trajectory.
 */
export class TrajectoryNotFoundError extends Error {
  public readonly trajectoryId: number;

  public constructor(trajectoryId: number) {
    super('Trajectory not found');
    this.name = 'TrajectoryNotFoundError';
    this.trajectoryId = trajectoryId;
  }
}
