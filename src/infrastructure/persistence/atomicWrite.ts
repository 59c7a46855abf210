import { promises as fs } from 'fs';
import path from 'path';

let tempCounter = 0;

/**
 * Writes to a sibling temp file and renames it over the target, so readers see either
 * the previous content or the new content in full.
 */
export async function writeFileAtomic(filePath: string, data: string): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });

  tempCounter += 1;
  const tempPath = `${filePath}.${process.pid}.${tempCounter}.tmp`;

  try {
    await fs.writeFile(tempPath, data, 'utf8');
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}

export async function readFileIfExists(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, 'utf8');
  } catch (error) {
    if (isNotFound(error)) {
      return null;
    }
    throw error;
  }
}

// fs errors may come from another realm, so the code is read structurally
export function isNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
