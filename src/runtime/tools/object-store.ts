/**
 * Filesystem object storage.
 *
 * Objects live at <root>/<bucket>/<key> with a <key>.meta.json sidecar that
 * records content type, size and checksum. Writing the same key again
 * overwrites both files.
 */
import { existsSync, mkdirSync } from 'node:fs';
import { readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { sha256Hex } from '../../shared/redact.js';
import type { Bucket, ObjectStorage } from '../collaborators.js';
import type { StoredObject } from '../types.js';

const SAFE_KEY = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

export function assertSafeKey(key: string): void {
  if (!SAFE_KEY.test(key) || key.includes('..') || key.endsWith('.meta.json')) {
    throw new Error(`Invalid object key: ${JSON.stringify(key)}`);
  }
}


export class FilesystemObjectStorage implements ObjectStorage {
  constructor(private readonly root: string) {}

  private bucketDir(bucket: Bucket): string {
    const dir = join(this.root, bucket);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true, mode: 0o700 });
    }
    return dir;
  }

  async put(bucket: Bucket, key: string, content: string, contentType: string): Promise<StoredObject> {
    assertSafeKey(key);
    const dir = this.bucketDir(bucket);
    const size = Buffer.byteLength(content, 'utf8');
    const checksum = sha256Hex(content);

    await writeFile(join(dir, key), content, { encoding: 'utf8', mode: 0o600 });
    const meta = {
      key,
      bucket,
      content_type: contentType,
      size,
      checksum,
      stored_at: new Date().toISOString(),
    };
    await writeFile(join(dir, `${key}.meta.json`), JSON.stringify(meta, null, 2), {
      encoding: 'utf8',
      mode: 0o600,
    });

    return { bucket, key, size, checksum };
  }

  async get(bucket: Bucket, key: string): Promise<string | null> {
    assertSafeKey(key);
    const path = join(this.root, bucket, key);
    if (!existsSync(path)) return null;
    return readFile(path, 'utf8');
  }

  async delete(bucket: Bucket, key: string): Promise<boolean> {
    assertSafeKey(key);
    const path = join(this.root, bucket, key);
    if (!existsSync(path)) return false;
    await rm(path, { force: true });
    await rm(`${path}.meta.json`, { force: true });
    return true;
  }
}
