import { randomUUID } from 'node:crypto';
import fs from 'node:fs/promises';
import path from 'node:path';

import { engineLogger as logger } from '@lasercal/logger';

export const tempPathFor = (targetPath: string): string =>
  path.join(path.dirname(targetPath), `.${path.basename(targetPath)}.${randomUUID()}.tmp`);

/**
 * Write `contents` next to `targetPath` and rename it into place, so the
 * target holds either its old contents or all of the new ones.
 */
export async function writeFileAtomic(targetPath: string, contents: string): Promise<void> {
  const tempPath = tempPathFor(targetPath);
  try {
    await fs.writeFile(tempPath, contents, 'utf8');
    await fs.rename(tempPath, targetPath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
  logger.debug({ path: targetPath, bytes: Buffer.byteLength(contents) }, 'file written');
}
