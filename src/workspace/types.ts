import type { z } from 'zod';
import type { AppConfigSchema } from '../shared/schemas.js';

export type AppConfig = z.infer<typeof AppConfigSchema>;

export interface RepolistPaths {
  root: string;       // .repolist/
  config: string;     // .repolist/config.yaml
  stateDb: string;    // .repolist/state.db
  objectsDir: string; // .repolist/objects/
}
