/**
 * Runtime configuration for the coverage planner service.
 *
 * This centralises environment variables and provides
 * typed access throughout the codebase.
 */
import dotenv from 'dotenv';

dotenv.config();

export type AppEnv = 'development' | 'test' | 'production';

export interface AppConfig {
  env: AppEnv;
  port: number;
  serviceName: string;
  serviceVersion: string;
  databasePath: string;
  coverageStepSize: number;
  logLevel: string;
}

const DEFAULT_PORT = 8000;
const DEFAULT_DATABASE_PATH = 'coverage_planning.db';
const DEFAULT_STEP_SIZE = 0.25;

function parseEnv(raw: string | undefined): AppEnv {
  if (raw === 'test' || raw === 'production') {
    return raw;
  }
  return 'development';
}

function parsePort(raw: string | undefined, fallback: number): number {
  const port = raw ? Number(raw) : fallback;
  if (!Number.isInteger(port) || port <= 0) {
    return fallback;
  }
  return port;
}

export function parsePositiveNumber(raw: string | undefined, fallback: number): number {
  const value = raw ? Number(raw) : fallback;
  if (!Number.isFinite(value) || value <= 0) {
    return fallback;
  }
  return value;
}

export function resolveLogLevel(raw: string | undefined, env: AppEnv): string {
  const level = raw?.trim();
  if (level) {
    return level;
  }
  return env === 'production' ? 'info' : 'debug';
}

const env = parseEnv(process.env.NODE_ENV);

/**
 * Load configuration from environment variables with sane defaults.
 */
export const config: AppConfig = {
  env,
  port: parsePort(process.env.PORT, DEFAULT_PORT),
  serviceName: process.env.SERVICE_NAME || 'coverage-planner-service',
  serviceVersion: process.env.SERVICE_VERSION || '0.1.0',
  databasePath: process.env.DATABASE_PATH?.trim() || DEFAULT_DATABASE_PATH,
  coverageStepSize: parsePositiveNumber(process.env.COVERAGE_STEP_SIZE, DEFAULT_STEP_SIZE),
  logLevel: resolveLogLevel(process.env.LOG_LEVEL, env),
};
