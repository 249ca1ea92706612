/*MIT License

Copyright (c) 2025 Anthropic, PBC
Modified work Copyright (c) 2025 DanNsk

Permission is hereby granted, free of charge, to any person obtaining a copy
of this software and associated documentation files (the "Software"), to deal
in the Software without restriction, including without limitation the rights
to use, copy, modify, merge, publish, distribute, sublicense, and/or sell
copies of the Software, and to permit persons to whom the Software is
furnished to do so, subject to the following conditions:

The above copyright notice and this permission notice shall be included in all
copies or substantial portions of the Software.

THE SOFTWARE IS PROVIDED "AS IS", WITHOUT WARRANTY OF ANY KIND, EXPRESS OR
IMPLIED, INCLUDING BUT NOT LIMITED TO THE WARRANTIES OF MERCHANTABILITY,
FITNESS FOR A PARTICULAR PURPOSE AND NONINFRINGEMENT. IN NO EVENT SHALL THE
AUTHORS OR COPYRIGHT HOLDERS BE LIABLE FOR ANY CLAIM, DAMAGES OR OTHER
LIABILITY, WHETHER IN AN ACTION OF CONTRACT, TORT OR OTHERWISE, ARISING FROM,
OUT OF OR IN CONNECTION WITH THE SOFTWARE OR THE USE OR OTHER DEALINGS IN THE
SOFTWARE.
*/

import { promises as fs } from 'fs';
import type { FileHandle } from 'fs/promises';
import { PersistenceError } from '../errors.js';

const RETRY_INTERVAL_MS = 25;

function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: the process exists but belongs to someone else
    return (error as NodeJS.ErrnoException).code === 'EPERM';
  }
}

/**
 * Exclusive lock file guarding the backing file against other processes.
 * The lock is a sibling `<file>.lock` created with `wx` and holding the
 * owner's pid. A lock whose owner is gone, or one with no pid that is older
 * than the timeout, is stale and gets taken over.
 */
export class FileLock {
  readonly lockPath: string;

  constructor(targetPath: string, private timeoutMs: number) {
    this.lockPath = `${targetPath}.lock`;
  }

  async withLock<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      await fs.rm(this.lockPath, { force: true });
    }
  }

  private async acquire(): Promise<void> {
    const deadline = Date.now() + this.timeoutMs;
    for (;;) {
      if (await this.tryCreate()) {
        return;
      }
      if (await this.isStale()) {
        console.warn(`Removing stale lock file ${this.lockPath}`);
        await fs.rm(this.lockPath, { force: true });
        continue;
      }
      if (Date.now() >= deadline) {
        throw new PersistenceError(
          `Timed out after ${this.timeoutMs} ms waiting for lock file ${this.lockPath}`
        );
      }
      await delay(RETRY_INTERVAL_MS);
    }
  }

  private async tryCreate(): Promise<boolean> {
    let handle: FileHandle;
    try {
      handle = await fs.open(this.lockPath, 'wx');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'EEXIST') {
        return false;
      }
      throw new PersistenceError(`Cannot create lock file ${this.lockPath}`, { cause: error });
    }

    try {
      await handle.writeFile(String(process.pid));
    } catch (error) {
      await handle.close();
      await fs.rm(this.lockPath, { force: true });
      throw new PersistenceError(`Cannot write lock file ${this.lockPath}`, { cause: error });
    }
    await handle.close();
    return true;
  }

  private async isStale(): Promise<boolean> {
    let content: string;
    let modifiedAt: number;
    try {
      content = await fs.readFile(this.lockPath, 'utf-8');
      modifiedAt = (await fs.stat(this.lockPath)).mtimeMs;
    } catch (error) {
      // Released between our open and this read; just retry
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return false;
      }
      throw new PersistenceError(`Cannot inspect lock file ${this.lockPath}`, { cause: error });
    }

    const pid = Number.parseInt(content.trim(), 10);
    if (Number.isInteger(pid) && pid > 0) {
      return !isProcessAlive(pid);
    }
    return Date.now() - modifiedAt > this.timeoutMs;
  }
}
