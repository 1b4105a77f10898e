import type { SqliteMessageQueue } from '../runtime/queue.js';
import type { RunnerContext } from '../runtime/runner.js';
import type { AppConfig } from '../workspace/types.js';

export interface RouteOpts {
  config: AppConfig;
  runner: RunnerContext;
  queue: SqliteMessageQueue;
}

export const API_VERSION = '0.1.0';
