import { existsSync, mkdirSync } from 'node:fs';
import { AppConfigSchema } from '../shared/schemas.js';
import { writeAppConfig } from './config.js';
import { openDb } from './db.js';
import { getRepolistPaths } from './paths.js';
import type { AppConfig } from './types.js';

export interface InitOptions {
  cwd?: string;
  force?: boolean;
  /** Path of the list file, relative to the repository root. */
  listFile?: string;
}

export function initWorkspace(opts: InitOptions = {}): AppConfig {
  const paths = getRepolistPaths(opts.cwd);

  if (existsSync(paths.root) && !opts.force) {
    throw new Error(`Workspace already exists at ${paths.root}. Use --force to reinitialize.`);
  }

  for (const dir of [paths.root, paths.objectsDir]) {
    mkdirSync(dir, { recursive: true });
  }

  const config = AppConfigSchema.parse({
    list: opts.listFile ? { file: opts.listFile } : {},
  });
  writeAppConfig(paths.config, config);

  // Creates the tables
  openDb(paths.stateDb);

  return config;
}
