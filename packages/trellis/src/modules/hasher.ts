/**
 * Profile-aware input hashing.
 *
 *   full - sha256 over the whole file
 *   dev  - sha256 over size, mtime and the first 1000 bytes
 *   test - no hash
 */

import { createHash } from 'node:crypto';
import { createReadStream } from 'node:fs';
import * as fs from 'node:fs/promises';
import type { HashInfo, HashProfile } from '../types.js';

export const HASH_ALGORITHM = 'sha256';
export const METADATA_PREFIX_BYTES = 1000;

export class Hasher {
  constructor(readonly profile: HashProfile = 'full') {}

  async hashFile(filePath: string): Promise<HashInfo> {
    switch (this.profile) {
      case 'test':
        return { method: 'skipped', reason: 'test profile' };
      case 'dev':
        return this.metadataHash(filePath);
      case 'full':
        return this.fullHash(filePath);
    }
  }

  private async fullHash(filePath: string): Promise<HashInfo> {
    const hash = createHash(HASH_ALGORITHM);
    for await (const chunk of createReadStream(filePath)) {
      hash.update(chunk);
    }
    return { value: hash.digest('hex'), method: 'full_file', algorithm: HASH_ALGORITHM };
  }

  private async metadataHash(filePath: string): Promise<HashInfo> {
    const stat = await fs.stat(filePath);
    const hash = createHash(HASH_ALGORITHM);
    hash.update(String(stat.size));
    hash.update(String(stat.mtimeMs));

    const handle = await fs.open(filePath, 'r');
    try {
      const buffer = Buffer.alloc(METADATA_PREFIX_BYTES);
      const { bytesRead } = await handle.read(buffer, 0, METADATA_PREFIX_BYTES, 0);
      hash.update(buffer.subarray(0, bytesRead));
    } finally {
      await handle.close();
    }
    return { value: hash.digest('hex'), method: 'metadata', algorithm: HASH_ALGORITHM };
  }
}
