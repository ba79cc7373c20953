// Write-then-rename persistence

import * as fs from 'fs/promises';
import * as path from 'path';

let tempCounter = 0;

/**
 * Writes `content` to a temporary file beside `filePath`, flushes it, and renames it
 * over the target. A crash at any point leaves the previous file intact.
 */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  const dir = path.dirname(filePath);
  await fs.mkdir(dir, { recursive: true });

  const tempPath = path.join(dir, `.${path.basename(filePath)}.${process.pid}.${++tempCounter}.tmp`);

  try {
    const handle = await fs.open(tempPath, 'w');
    try {
      await handle.writeFile(content, 'utf-8');
      await handle.sync();
    } finally {
      await handle.close();
    }
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}
