import { pino } from 'pino';
import type { Logger } from 'pino';
import { config } from '../../config/index.js';

export type { Logger } from 'pino';

/**
 * Named logger for one module. Level comes from LOG_LEVEL so tests can run silent.
 */
export function createLogger(name: string): Logger {
  return pino({ name, level: config.LOG_LEVEL });
}

export { createRunContext, generateRunId } from './run-context.js';
export type { RunContext } from './run-context.js';
