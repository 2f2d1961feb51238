import { promises as fs } from 'fs';
import * as path from 'path';
import { randomBytes } from 'crypto';

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Reads and parses a JSON file.
 * Resolves to `undefined` when the file does not exist or holds nothing but whitespace.
 */
export async function readJsonFile(filePath: string, signal?: AbortSignal): Promise<unknown> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, { encoding: 'utf8', signal });
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return undefined;
    }
    throw error;
  }

  if (raw.trim().length === 0) {
    return undefined;
  }
  return JSON.parse(raw);
}

/**
 * Writes `value` as JSON next to `filePath` and renames it into place,
 * so readers never observe a half-written file.
 */
export async function writeJsonFileAtomic(
  filePath: string,
  value: unknown,
  signal?: AbortSignal,
): Promise<void> {
  signal?.throwIfAborted();

  const tmp = `${filePath}.tmp.${randomBytes(4).toString('hex')}`;
  await fs.mkdir(path.dirname(filePath), { recursive: true });

  try {
    await fs.writeFile(tmp, JSON.stringify(value, null, 2), { encoding: 'utf8', signal });
    await fs.rename(tmp, filePath);
  } catch (error) {
    await fs.rm(tmp, { force: true });
    throw error;
  }
}
