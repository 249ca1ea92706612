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

import { NotFoundError, ValidationError } from '../errors.js';
import type { GraphFileStore } from '../storage/GraphFileStore.js';

const MAX_USER_ID_LENGTH = 128;
// Dropped by JSON object handling on load
const RESERVED_USER_IDS = new Set(['__proto__']);

export class UserManager {
  constructor(private store: GraphFileStore) {}

  validateUserId(userId: string): void {
    if (!userId || userId.trim() === '') {
      throw new ValidationError('user_id cannot be empty');
    }

    if (userId.length > MAX_USER_ID_LENGTH) {
      throw new ValidationError(`user_id cannot be longer than ${MAX_USER_ID_LENGTH} characters`);
    }

    if (RESERVED_USER_IDS.has(userId)) {
      throw new ValidationError(`user_id '${userId}' is reserved`);
    }

    if (!/^[A-Za-z0-9._:@-]+$/.test(userId)) {
      throw new ValidationError(
        'user_id must contain only letters, numbers, dots, colons, at signs, hyphens, and underscores'
      );
    }
  }

  async listUsers(): Promise<string[]> {
    return this.store.listUsers();
  }

  async userExists(userId: string): Promise<boolean> {
    this.validateUserId(userId);
    return this.store.read(userId, graph => graph !== undefined);
  }

  /** Explicit reset: drops every entity and relation the user has. */
  async deleteUser(userId: string): Promise<void> {
    this.validateUserId(userId);
    const removed = await this.store.removeUser(userId);
    if (!removed) {
      throw new NotFoundError(`No knowledge graph stored for user '${userId}'`);
    }
  }
}
