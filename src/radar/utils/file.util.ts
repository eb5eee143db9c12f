import { promises as fs } from 'node:fs';
import path from 'node:path';

/** Writes through a temp file and rename so readers never see a half-written file. */
export async function writeFileAtomic(
  filePath: string,
  content: string,
): Promise<void> {
  const dir = path.dirname(filePath);
  const base = path.basename(filePath);
  const tmpPath = path.join(dir, `.${base}.${process.pid}.${Date.now()}.tmp`);

  await fs.mkdir(dir, { recursive: true });
  try {
    await fs.writeFile(tmpPath, content, 'utf-8');
    await fs.rename(tmpPath, filePath);
  } catch (error) {
    await fs.unlink(tmpPath).catch(() => undefined);
    throw error;
  }
}

export async function writeJsonAtomic(
  filePath: string,
  payload: unknown,
): Promise<void> {
  await writeFileAtomic(filePath, `${JSON.stringify(payload, null, 2)}\n`);
}

/** Errors from `fs` may come from another realm, so match on `code` rather than the prototype. */
export function isMissingFileError(error: unknown): boolean {
  return hasErrorCode(error, 'ENOENT');
}

function hasErrorCode(error: unknown, code: string): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === code
  );
}

export interface FileLockOptions {
  timeoutMs?: number;
  staleMs?: number;
  retryMs?: number;
}

/**
 * Runs `task` while holding `<filePath>.lock`, so writers in separate
 * processes take turns. A lock older than `staleMs` is taken over.
 */
export async function withFileLock<T>(
  filePath: string,
  task: () => Promise<T>,
  options: FileLockOptions = {},
): Promise<T> {
  const { timeoutMs = 10_000, staleMs = 30_000, retryMs = 25 } = options;
  const lockPath = `${filePath}.lock`;
  const deadline = Date.now() + timeoutMs;

  await fs.mkdir(path.dirname(filePath), { recursive: true });
  for (;;) {
    try {
      const handle = await fs.open(lockPath, 'wx');
      await handle.close();
      break;
    } catch (error) {
      if (!hasErrorCode(error, 'EEXIST')) {
        throw error;
      }
    }
    if (await isStaleLock(lockPath, staleMs)) {
      await fs.rm(lockPath, { force: true });
      continue;
    }
    if (Date.now() >= deadline) {
      throw new Error(`timed out waiting for ${lockPath}`);
    }
    await new Promise((resolve) => setTimeout(resolve, retryMs));
  }

  try {
    return await task();
  } finally {
    await fs.rm(lockPath, { force: true });
  }
}

async function isStaleLock(lockPath: string, staleMs: number): Promise<boolean> {
  try {
    const stat = await fs.stat(lockPath);
    return Date.now() - stat.mtimeMs > staleMs;
  } catch (error) {
    // released between open and stat; try again
    if (isMissingFileError(error)) {
      return false;
    }
    throw error;
  }
}
