import fs from 'fs/promises';
import path from 'path';
import { ensureDir, move } from 'fs-extra';

/**
 * Write a file through a sibling `.tmp` file and a rename, so readers see
 * either the old content or the complete new content.
 */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  const tempPath = `${filePath}.tmp`;
  await ensureDir(path.dirname(filePath));
  await fs.writeFile(tempPath, content, 'utf-8');
  await move(tempPath, filePath, { overwrite: true });
}
