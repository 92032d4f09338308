import pino, { type Logger as PinoLogger } from 'pino';

// LOG_LEVEL is read once at load; config/env-schema.ts validates the same variable
const logLevel = (typeof process !== 'undefined' && process.env && process.env.LOG_LEVEL) || 'info';

export const logger: PinoLogger = pino({
  name: 'tasksift',
  level: logLevel,
});

export type Logger = PinoLogger;
