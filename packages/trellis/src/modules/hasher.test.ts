/**
 * Tests for profile-aware hashing
 */

import { createHash } from 'node:crypto';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { Hasher } from './hasher.js';

describe('Hasher', () => {
  let dir: string;
  let file: string;
  const content = 'x'.repeat(1500);

  beforeAll(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'trellis-hash-'));
    file = path.join(dir, 'input.geojson');
    await fs.writeFile(file, content, 'utf-8');
  });

  afterAll(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should hash the whole file in the full profile', async () => {
    const expected = createHash('sha256').update(content).digest('hex');
    expect(await new Hasher('full').hashFile(file)).toEqual({
      value: expected,
      method: 'full_file',
      algorithm: 'sha256',
    });
  });

  it('should hash size, mtime and the first 1000 bytes in the dev profile', async () => {
    const stat = await fs.stat(file);
    const expected = createHash('sha256')
      .update(String(stat.size))
      .update(String(stat.mtimeMs))
      .update(content.slice(0, 1000))
      .digest('hex');
    expect(await new Hasher('dev').hashFile(file)).toEqual({
      value: expected,
      method: 'metadata',
      algorithm: 'sha256',
    });
  });

  it('should skip hashing in the test profile', async () => {
    expect(await new Hasher('test').hashFile(path.join(dir, 'missing.geojson'))).toEqual({
      method: 'skipped',
      reason: 'test profile',
    });
  });

  it('should default to the full profile', () => {
    expect(new Hasher().profile).toBe('full');
  });
});
