import { randomUUID } from 'crypto';

/**
 * Generate a short run ID for tracing one CLI invocation through the logs.
 * Uses first 8 chars of a UUID for brevity.
 */
export function generateRunId(): string {
  return randomUUID().slice(0, 8);
}

/**
 * Context object bound to the CLI logger for one invocation.
 */
export interface RunContext {
  runId: string;
  command: 'extract' | 'reports' | 'info';
}

export function createRunContext(command: RunContext['command']): RunContext {
  return {
    runId: generateRunId(),
    command,
  };
}
