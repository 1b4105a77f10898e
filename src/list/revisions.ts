/**
 * Read the list file as it was at a given git revision.
 */
import { execFile } from 'node:child_process';
import { readFile } from 'node:fs/promises';
import { resolve as resolvePath } from 'node:path';
import { RevisionReadError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

/** Pseudo-revision for the file as currently on disk. */
export const WORKTREE = 'WORKTREE';

export type GitExec = (args: string[], cwd: string) => Promise<string>;

const MAX_FILE_BYTES = 32 * 1024 * 1024;

export const execGit: GitExec = (args, cwd) =>
  new Promise((resolve, reject) => {
    execFile('git', args, { cwd, encoding: 'utf8', maxBuffer: MAX_FILE_BYTES }, (err, stdout, stderr) => {
      if (err) {
        reject(new Error(stderr.trim() || err.message));
        return;
      }
      resolve(stdout);
    });
  });

export interface RevisionReaderOptions {
  repoPath: string;
  exec?: GitExec;
}

export async function readListAtRevision(
  revision: string,
  filePath: string,
  opts: RevisionReaderOptions,
): Promise<string> {
  if (revision === WORKTREE) {
    try {
      return await readFile(resolvePath(opts.repoPath, filePath), 'utf8');
    } catch (err) {
      throw new RevisionReadError(revision, filePath, errorMessage(err));
    }
  }

  if (!/^[\w./~^@{}-]+$/.test(revision) || revision.startsWith('-')) {
    throw new RevisionReadError(revision, filePath, 'not a valid revision name');
  }

  const exec = opts.exec ?? execGit;
  logger.debug('Reading list at revision', { revision, file: filePath });
  try {
    return await exec(['show', `${revision}:${filePath}`], opts.repoPath);
  } catch (err) {
    throw new RevisionReadError(revision, filePath, errorMessage(err));
  }
}
