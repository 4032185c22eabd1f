/**
 * ITrajectoryStore
 * ----------------
 * Domain contract for persisting and retrieving Trajectories.
 *
 * - CoveragePlannerService depends on this interface, not on SQLite.
 * - Infrastructure (SqliteTrajectoryStore) implements it.
 * - Tests can stub it easily.
 */

import type { NewTrajectory, Trajectory } from './Trajectory';

export interface ITrajectoryStore {
  /**
   * Persist a new Trajectory atomically and return it with its assigned id and createdAt.
   */
  insert(trajectory: NewTrajectory): Promise<Trajectory>;

  /**
   * Retrieve a previously stored Trajectory.
   * Returns null when not found.
   */
  getById(id: number): Promise<Trajectory | null>;
}
