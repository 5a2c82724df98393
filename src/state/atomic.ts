/**
 * Atomic JSON file writes: temp file in the same directory, then rename
 */

import { existsSync, mkdirSync, renameSync, unlinkSync, writeFileSync } from 'fs';
import { basename, dirname, join } from 'path';
import { randomBytes } from 'crypto';
import { getLogger } from '../utils/logger';

export function writeJsonAtomic(path: string, data: unknown): void {
  const dir = dirname(path);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }

  // Same directory keeps the rename atomic on one filesystem
  const tempPath = join(dir, `.${basename(path)}-${randomBytes(8).toString('hex')}.tmp`);

  try {
    writeFileSync(tempPath, JSON.stringify(data, null, 2));
    renameSync(tempPath, path);
  } catch (error) {
    if (existsSync(tempPath)) {
      try {
        unlinkSync(tempPath);
      } catch (cleanupError) {
        getLogger().warn('Failed to remove temp file', {
          tempPath,
          error: cleanupError instanceof Error ? cleanupError.message : 'Unknown error',
        });
      }
    }
    throw error;
  }
}
