import { randomBytes } from 'node:crypto';
import fs from 'node:fs/promises';
import path from 'node:path';

export type WriteJsonAtomicOptions = Readonly<{
  /** File mode for the written file. */
  mode?: number;
}>;

/** Writes JSON through a sibling temp file and a rename, so readers never see a torn file. */
export async function writeJsonAtomic(filePath: string, data: unknown, options: WriteJsonAtomicOptions = {}): Promise<void> {
  const dir = path.dirname(filePath);
  await fs.mkdir(dir, { recursive: true });
  const tmp = `${filePath}.${process.pid}.${randomBytes(4).toString('hex')}.tmp`;
  try {
    await fs.writeFile(tmp, `${JSON.stringify(data, null, 2)}\n`, { encoding: 'utf-8', mode: options.mode ?? 0o644 });
    await fs.rename(tmp, filePath);
  } catch (err) {
    await fs.rm(tmp, { force: true });
    throw err;
  }
}
