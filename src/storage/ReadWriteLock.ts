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

import { E_TIMEOUT, Semaphore, withTimeout, type SemaphoreInterface } from 'async-mutex';
import { PersistenceError } from '../errors.js';

// Upper bound on concurrent readers; a writer takes every slot.
const MAX_READERS = 1024;
const READ_PRIORITY = 0;
const WRITE_PRIORITY = 1;

/**
 * Writer-preferring reader–writer lock with bounded waits, on a weighted
 * semaphore. Readers take one slot and writers all of them; writers queue at
 * a higher priority, so once a writer is waiting later readers queue behind
 * it. Every acquisition rejects with PersistenceError after `timeoutMs`.
 */
export class ReadWriteLock {
  private semaphore: SemaphoreInterface;

  constructor(private timeoutMs: number) {
    this.semaphore = withTimeout(new Semaphore(MAX_READERS), timeoutMs);
  }

  withRead<T>(fn: () => Promise<T> | T): Promise<T> {
    return this.run(fn, 1, READ_PRIORITY);
  }

  withWrite<T>(fn: () => Promise<T> | T): Promise<T> {
    return this.run(fn, MAX_READERS, WRITE_PRIORITY);
  }

  private async run<T>(fn: () => Promise<T> | T, weight: number, priority: number): Promise<T> {
    try {
      return await this.semaphore.runExclusive(() => fn(), weight, priority);
    } catch (error) {
      if (error === E_TIMEOUT) {
        throw new PersistenceError(`Timed out after ${this.timeoutMs} ms waiting for the graph lock`);
      }
      throw error;
    }
  }
}
