import { join } from 'node:path';
import type { RepolistPaths } from './types.js';

export function getRepolistPaths(cwd: string = process.cwd()): RepolistPaths {
  const root = join(cwd, '.repolist');
  return {
    root,
    config: join(root, 'config.yaml'),
    stateDb: join(root, 'state.db'),
    objectsDir: join(root, 'objects'),
  };
}
