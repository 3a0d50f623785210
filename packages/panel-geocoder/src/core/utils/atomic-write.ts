/**
 * Replace a file in one step: write a sibling temp file, then rename it over
 * the target. Readers see the old contents or the new, never half of either.
 */

import { mkdir, rename, rm, writeFile } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';

export async function atomicWriteFile(filePath: string, contents: string): Promise<void> {
  const dir = dirname(filePath);
  await mkdir(dir, { recursive: true });

  const temp = join(dir, `.${basename(filePath)}.${process.pid}-${Date.now()}.tmp`);
  try {
    await writeFile(temp, contents, 'utf-8');
    await rename(temp, filePath);
  } catch (error) {
    await rm(temp, { force: true });
    throw error;
  }
}

export async function atomicWriteJSON(filePath: string, data: unknown): Promise<void> {
  await atomicWriteFile(filePath, `${JSON.stringify(data, null, 2)}\n`);
}
