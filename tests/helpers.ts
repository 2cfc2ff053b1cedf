/**
 * Test Helpers
 */

import { Config } from '../framework/config/config.ts';
import { Group, createRouter } from '../framework/router/group.ts';
import { Logger, type LogEntry } from '../framework/telemetry/logger.ts';

/**
 * Logger that keeps its entries in memory
 */
export function memoryLogger(): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const logger = new Logger({ level: 'debug', output: (entry) => entries.push(entry) });
  return { logger, entries };
}

/**
 * Root group with default configuration and an in-memory logger
 */
export function testRouter(config: Config = new Config()): {
  root: Group;
  entries: LogEntry[];
  logger: Logger;
} {
  const { logger, entries } = memoryLogger();
  return { root: createRouter({ logger, config }), entries, logger };
}

export function get(path: string, headers?: Record<string, string>): Request {
  return new Request(`http://localhost${path}`, { headers });
}
