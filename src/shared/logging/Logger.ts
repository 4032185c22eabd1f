/**
 * Structured pino logger shared by the whole service.
 *
 * Every line carries the service name, version and environment so logs from
 * several instances can be told apart. Development output goes through
 * pino-pretty; other environments emit raw JSON.
 */
import pino, { Logger as PinoLogger, type LoggerOptions } from 'pino';
import { config, type AppConfig } from '../config/Config';

export type AppLogger = PinoLogger;

export function buildLoggerOptions(
  appConfig: Pick<AppConfig, 'env' | 'logLevel' | 'serviceName' | 'serviceVersion'>,
): LoggerOptions {
  return {
    level: appConfig.logLevel,
    base: {
      service: appConfig.serviceName,
      version: appConfig.serviceVersion,
      env: appConfig.env,
    },
    transport:
      appConfig.env === 'development'
        ? {
            target: 'pino-pretty',
            options: { colorize: true, translateTime: 'SYS:standard', ignore: 'pid,hostname' },
          }
        : undefined,
  };
}

export const logger: AppLogger = pino(buildLoggerOptions(config));
