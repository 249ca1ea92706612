/*MIT License

Copyright (c) 2025 DanNsk

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

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { UserManager } from '../../src/managers/UserManager.js';
import { KnowledgeGraphManager } from '../../src/managers/KnowledgeGraphManager.js';
import { GraphFileStore } from '../../src/storage/GraphFileStore.js';
import { NotFoundError, ValidationError } from '../../src/errors.js';
import { promises as fs } from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const TEST_BASE_DIR = path.join(__dirname, 'test-users');
const TEST_FILE = path.join(TEST_BASE_DIR, 'knowledge_graph.json');

describe('UserManager', () => {
  let userManager: UserManager;
  let kgManager: KnowledgeGraphManager;

  beforeEach(async () => {
    await fs.rm(TEST_BASE_DIR, { recursive: true, force: true });
    const store = new GraphFileStore(TEST_FILE);
    userManager = new UserManager(store);
    kgManager = new KnowledgeGraphManager(store, userManager);
  });

  afterEach(async () => {
    await fs.rm(TEST_BASE_DIR, { recursive: true, force: true });
  });

  describe('User ID Validation', () => {
    it('should accept valid user ids', () => {
      expect(() => userManager.validateUserId('alice')).not.toThrow();
      expect(() => userManager.validateUserId('3f2b8c1e-9d4a-4f6b-8e2a-1c5d7e9f0a2b')).not.toThrow();
      expect(() => userManager.validateUserId('user:42')).not.toThrow();
      expect(() => userManager.validateUserId('first.last@example.com')).not.toThrow();
      expect(() => userManager.validateUserId('Bob_2')).not.toThrow();
    });

    it('should reject empty user ids', () => {
      expect(() => userManager.validateUserId('')).toThrow('user_id cannot be empty');
      expect(() => userManager.validateUserId('   ')).toThrow('user_id cannot be empty');
    });

    it('should reject user ids with whitespace or path characters', () => {
      expect(() => userManager.validateUserId('alice smith')).toThrow(ValidationError);
      expect(() => userManager.validateUserId('../etc')).toThrow(ValidationError);
      expect(() => userManager.validateUserId('a/b')).toThrow(ValidationError);
    });

    it('should reject reserved user ids', () => {
      expect(() => userManager.validateUserId('__proto__')).toThrow("user_id '__proto__' is reserved");
    });

    it('should reject overly long user ids', () => {
      expect(() => userManager.validateUserId('a'.repeat(128))).not.toThrow();
      expect(() => userManager.validateUserId('a'.repeat(129))).toThrow(
        'user_id cannot be longer than 128 characters'
      );
    });
  });

  describe('User Listing', () => {
    it('should return an empty list before anything is stored', async () => {
      expect(await userManager.listUsers()).toEqual([]);
    });

    it('should list users that have a graph', async () => {
      await kgManager.upsertEntity('alice', 'Python', 'skill');
      await kgManager.upsertEntity('bob', 'Rust', 'skill');

      expect(await userManager.listUsers()).toEqual(['alice', 'bob']);
      expect(await userManager.userExists('alice')).toBe(true);
      expect(await userManager.userExists('carol')).toBe(false);
    });

    it('should not list users whose operations changed nothing', async () => {
      await kgManager.deleteEntity('carol', 'Python');

      expect(await userManager.listUsers()).toEqual([]);
    });
  });

  describe('User Deletion', () => {
    it('should delete one user and leave others intact', async () => {
      await kgManager.upsertEntity('alice', 'Python', 'skill');
      await kgManager.upsertEntity('bob', 'Rust', 'skill');

      await userManager.deleteUser('alice');

      expect(await userManager.listUsers()).toEqual(['bob']);
      expect(await kgManager.readGraph('alice')).toEqual({ entities: [], relations: [] });
      expect((await kgManager.readGraph('bob')).entities).toHaveLength(1);
    });

    it('should raise NotFoundError for a user without a graph', async () => {
      await expect(userManager.deleteUser('ghost')).rejects.toThrow(NotFoundError);
    });
  });
});
