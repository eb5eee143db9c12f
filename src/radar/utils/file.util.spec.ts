import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import {
  isMissingFileError,
  withFileLock,
  writeJsonAtomic,
} from './file.util';

describe('file.util', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'stack-radar-file-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('recognizes a missing file by its code', async () => {
    const error: unknown = await fs
      .readFile(path.join(dir, 'absent.json'), 'utf-8')
      .catch((e: unknown) => e);

    expect(isMissingFileError(error)).toBe(true);
    expect(isMissingFileError({ code: 'ENOENT' })).toBe(true);
    expect(isMissingFileError({ code: 'EACCES' })).toBe(false);
    expect(isMissingFileError(null)).toBe(false);
    expect(isMissingFileError('ENOENT')).toBe(false);
  });

  it('writes JSON through a temp file and leaves no temp behind', async () => {
    const filePath = path.join(dir, 'nested', 'doc.json');

    await writeJsonAtomic(filePath, { ok: true });

    expect(await fs.readFile(filePath, 'utf-8')).toBe('{\n  "ok": true\n}\n');
    expect(await fs.readdir(path.dirname(filePath))).toEqual(['doc.json']);
  });

  it('runs lock holders one after another', async () => {
    const filePath = path.join(dir, 'doc.json');
    const order: string[] = [];
    let releaseFirst = (): void => undefined;
    let markStarted = (): void => undefined;
    const firstHolding = new Promise<void>((resolve) => {
      releaseFirst = resolve;
    });
    const firstStarted = new Promise<void>((resolve) => {
      markStarted = resolve;
    });

    const first = withFileLock(filePath, async () => {
      order.push('first:start');
      markStarted();
      await firstHolding;
      order.push('first:end');
    });
    await firstStarted;
    const second = withFileLock(
      filePath,
      async () => {
        order.push('second');
      },
      { retryMs: 5 },
    );
    await new Promise((resolve) => setTimeout(resolve, 30));
    releaseFirst();
    await Promise.all([first, second]);

    expect(order).toEqual(['first:start', 'first:end', 'second']);
    await expect(fs.access(`${filePath}.lock`)).rejects.toThrow();
  });

  it('takes over a stale lock', async () => {
    const filePath = path.join(dir, 'doc.json');
    const lockPath = `${filePath}.lock`;
    await fs.writeFile(lockPath, '');
    const old = new Date(Date.now() - 60_000);
    await fs.utimes(lockPath, old, old);

    await expect(
      withFileLock(filePath, async () => 'done', { staleMs: 1_000 }),
    ).resolves.toBe('done');
  });

  it('gives up when the lock stays held', async () => {
    const filePath = path.join(dir, 'doc.json');
    await fs.writeFile(`${filePath}.lock`, '');

    await expect(
      withFileLock(filePath, async () => 'never', { timeoutMs: 20, retryMs: 5 }),
    ).rejects.toThrow('timed out waiting for');
  });
});
