// src/coverage/infrastructure/SqliteTrajectoryStore.ts

/**
 * SqliteTrajectoryStore
 *
 * Infrastructure implementation of ITrajectoryStore using better-sqlite3.
 *
 * - One flat `trajectories` table; obstacles and path are JSON text columns
 *   because they are only ever read back whole.
 * - AUTOINCREMENT keeps ids monotonic and never reused, even after deletes.
 * - Every operation opens its own connection and closes it before returning.
 * - Row <-> domain mapping is localized here.
 */

import type { Obstacle } from '../domain/Obstacle';
import type { NewTrajectory, PathPoint, Trajectory } from '../domain/Trajectory';
import type { ITrajectoryStore } from '../domain/TrajectoryStore';
import {
  openSqliteConnection,
  withConnection,
  type ConnectionFactory,
} from '../../shared/db/SqliteConnection';

/**
 * Shape of a row in the `trajectories` table.
 */
type TrajectoryRow = {
  id: number;
  wall_width: number;
  wall_height: number;
  obstacles: string;
  path: string;
  created_at: string;
};

export type SqliteTrajectoryStoreOptions = {
  databasePath: string;
  now?: () => Date;
  openConnection?: ConnectionFactory;
};

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS trajectories (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    wall_width REAL NOT NULL,
    wall_height REAL NOT NULL,
    obstacles TEXT NOT NULL,
    path TEXT NOT NULL,
    created_at TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_created_at ON trajectories (created_at);
`;

export class SqliteTrajectoryStore implements ITrajectoryStore {
  private readonly databasePath: string;
  private readonly now: () => Date;
  private readonly openConnection: ConnectionFactory;

  public constructor(options: SqliteTrajectoryStoreOptions) {
    this.databasePath = options.databasePath;
    this.now = options.now ?? (() => new Date());
    this.openConnection = options.openConnection ?? openSqliteConnection;
  }

  /**
   * Create the table and index if they do not exist yet. Safe to call repeatedly.
   */
  public initialize(): void {
    withConnection(this.databasePath, (db) => db.exec(SCHEMA_SQL), this.openConnection);
  }

  public async insert(trajectory: NewTrajectory): Promise<Trajectory> {
    const createdAt = this.now().toISOString();
    const obstacles = trajectory.obstacles.map(toStoredObstacle);

    const id = withConnection(
      this.databasePath,
      (db) => {
        const result = db
          .prepare<[number, number, string, string, string]>(
            `INSERT INTO trajectories (wall_width, wall_height, obstacles, path, created_at)
             VALUES (?, ?, ?, ?, ?)`,
          )
          .run(
            trajectory.wallWidth,
            trajectory.wallHeight,
            JSON.stringify(obstacles),
            JSON.stringify(trajectory.path),
            createdAt,
          );
        return Number(result.lastInsertRowid);
      },
      this.openConnection,
    );

    return {
      id,
      wallWidth: trajectory.wallWidth,
      wallHeight: trajectory.wallHeight,
      obstacles,
      path: trajectory.path.map((point): PathPoint => [point[0], point[1]]),
      createdAt,
    };
  }

  public async getById(id: number): Promise<Trajectory | null> {
    const row = withConnection(
      this.databasePath,
      (db) =>
        db
          .prepare<[number], TrajectoryRow>(
            `SELECT id, wall_width, wall_height, obstacles, path, created_at
             FROM trajectories WHERE id = ?`,
          )
          .get(id),
      this.openConnection,
    );

    if (!row) return null;
    return toTrajectory(row);
  }
}

/* ------------------------- row mapping ------------------------- */

function toStoredObstacle(obstacle: Obstacle): Obstacle {
  return { x: obstacle.x, y: obstacle.y, width: obstacle.width, height: obstacle.height };
}

function toTrajectory(row: TrajectoryRow): Trajectory {
  return {
    id: row.id,
    wallWidth: row.wall_width,
    wallHeight: row.wall_height,
    obstacles: decodeObstacles(row.id, row.obstacles),
    path: decodePath(row.id, row.path),
    createdAt: row.created_at,
  };
}

function decodeObstacles(id: number, text: string): Obstacle[] {
  const parsed: unknown = JSON.parse(text);
  if (!Array.isArray(parsed)) {
    throw new Error(`Corrupt obstacles column for trajectory ${id}`);
  }

  return parsed.map((item: unknown) => {
    if (
      typeof item !== 'object' ||
      item === null ||
      !('x' in item && 'y' in item && 'width' in item && 'height' in item)
    ) {
      throw new Error(`Corrupt obstacle entry for trajectory ${id}`);
    }
    const { x, y, width, height } = item;
    if (
      typeof x !== 'number' ||
      typeof y !== 'number' ||
      typeof width !== 'number' ||
      typeof height !== 'number'
    ) {
      throw new Error(`Corrupt obstacle entry for trajectory ${id}`);
    }
    return { x, y, width, height };
  });
}

function decodePath(id: number, text: string): PathPoint[] {
  const parsed: unknown = JSON.parse(text);
  if (!Array.isArray(parsed)) {
    throw new Error(`Corrupt path column for trajectory ${id}`);
  }

  return parsed.map((item: unknown): PathPoint => {
    if (!Array.isArray(item) || item.length !== 2) {
      throw new Error(`Corrupt path point for trajectory ${id}`);
    }
    const [x, y]: unknown[] = item;
    if (typeof x !== 'number' || typeof y !== 'number') {
      throw new Error(`Corrupt path point for trajectory ${id}`);
    }
    return [x, y];
  });
}
