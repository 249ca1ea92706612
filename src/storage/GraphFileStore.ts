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
import path from 'path';
import { z } from 'zod';
import { PersistenceError } from '../errors.js';
import { UserGraph } from '../graph/UserGraph.js';
import type { KnowledgeGraph, PersistedGraph } from '../types/graph.js';
import { FileLock } from './FileLock.js';
import { ReadWriteLock } from './ReadWriteLock.js';

const persistedGraphSchema = z.record(
  z.object({
    entities: z.array(
      z.object({
        name: z.string().min(1),
        type: z.string(),
        observations: z.array(z.string()),
      })
    ),
    relations: z.array(
      z.object({
        from: z.string().min(1),
        type: z.string().min(1),
        to: z.string().min(1),
      })
    ),
  })
);

export interface GraphFileStoreOptions {
  lockTimeoutMs?: number;
}

export const DEFAULT_LOCK_TIMEOUT_MS = 5000;

/**
 * Owns the backing JSON document and its in-memory mirror.
 *
 * The document is loaded lazily on first access. Mutations run on a draft
 * copy of one user's graph; the whole document is then written to a temp
 * file and renamed over the original, and only after that succeeds does the
 * draft replace the live graph.
 */
export class GraphFileStore {
  private graphs = new Map<string, UserGraph>();
  private loading: Promise<void> | null = null;
  private loaded = false;
  private lock: ReadWriteLock;
  private fileLock: FileLock;

  constructor(readonly filePath: string, options: GraphFileStoreOptions = {}) {
    const timeout = options.lockTimeoutMs ?? DEFAULT_LOCK_TIMEOUT_MS;
    this.lock = new ReadWriteLock(timeout);
    this.fileLock = new FileLock(filePath, timeout);
  }

  async read<T>(userId: string, fn: (graph: UserGraph | undefined) => T): Promise<T> {
    await this.ensureLoaded();
    return this.lock.withRead(() => fn(this.graphs.get(userId)));
  }

  async listUsers(): Promise<string[]> {
    await this.ensureLoaded();
    return this.lock.withRead(() => Array.from(this.graphs.keys()));
  }

  /**
   * Runs `fn` against a draft of the user's graph (created if absent) and
   * persists the result. When `fn` reports no change nothing is written.
   */
  async mutate<T>(
    userId: string,
    fn: (draft: UserGraph) => { result: T; changed: boolean }
  ): Promise<T> {
    await this.ensureLoaded();
    return this.lock.withWrite(async () => {
      const draft = this.graphs.get(userId)?.clone() ?? new UserGraph();
      const { result, changed } = fn(draft);
      if (!changed) {
        return result;
      }

      const next = new Map(this.graphs);
      next.set(userId, draft);
      await this.persist(next);
      this.graphs = next;
      return result;
    });
  }

  /** Removes a user's whole graph; returns false if the user had none. */
  async removeUser(userId: string): Promise<boolean> {
    await this.ensureLoaded();
    return this.lock.withWrite(async () => {
      if (!this.graphs.has(userId)) {
        return false;
      }
      const next = new Map(this.graphs);
      next.delete(userId);
      await this.persist(next);
      this.graphs = next;
      return true;
    });
  }

  private ensureLoaded(): Promise<void> {
    if (this.loaded) {
      return Promise.resolve();
    }
    if (!this.loading) {
      this.loading = this.load().then(() => {
        this.loaded = true;
      });
    }
    return this.loading;
  }

  private async load(): Promise<void> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return;
      }
      const failure = new PersistenceError(`Cannot read ${this.filePath}`, { cause: error });
      console.warn(`${failure.message}; starting with an empty graph`, error);
      return;
    }

    try {
      const document = persistedGraphSchema.parse(JSON.parse(raw));
      for (const [userId, snapshot] of Object.entries(document)) {
        this.graphs.set(userId, UserGraph.fromSnapshot(snapshot));
      }
      console.error(`Loaded knowledge graph for ${this.graphs.size} user(s) from ${this.filePath}`);
    } catch (error) {
      this.graphs.clear();
      const failure = new PersistenceError(`Corrupt knowledge graph file ${this.filePath}`, { cause: error });
      console.warn(`${failure.message}; starting with an empty graph`, error);
    }
  }

  private async persist(graphs: Map<string, UserGraph>): Promise<void> {
    const entries: Array<[string, KnowledgeGraph]> = [];
    for (const [userId, graph] of graphs) {
      entries.push([userId, graph.snapshot()]);
    }
    // fromEntries defines own properties, even for a key like "__proto__"
    const document: PersistedGraph = Object.fromEntries(entries);

    const dir = path.dirname(this.filePath);
    const tempPath = path.join(dir, `.${path.basename(this.filePath)}.${process.pid}.${Date.now()}.tmp`);

    try {
      await fs.mkdir(dir, { recursive: true });
    } catch (error) {
      throw new PersistenceError(`Cannot create directory ${dir}`, { cause: error });
    }

    await this.fileLock.withLock(async () => {
      try {
        await fs.writeFile(tempPath, JSON.stringify(document, null, 2), 'utf-8');
        await fs.rename(tempPath, this.filePath);
      } catch (error) {
        await fs.rm(tempPath, { force: true });
        throw new PersistenceError(`Failed to write ${this.filePath}`, { cause: error });
      }
    });
  }
}
