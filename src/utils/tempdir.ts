import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';

/**
 * Runs `fn` with a fresh temporary directory and removes the directory once
 * the returned promise settles, whether it resolved or rejected.
 */
export async function withTempDir<T>(fn: (dir: string) => Promise<T>, prefix = 'wheel-'): Promise<T> {
  const dir = await mkdtemp(join(tmpdir(), prefix));
  try {
    return await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}
