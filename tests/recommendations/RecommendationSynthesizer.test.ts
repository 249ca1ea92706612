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
import {
  GENERIC_INTERVIEW_ITEMS,
  RESUME_FALLBACK,
  RecommendationSynthesizer,
  SKILLS_FALLBACK,
} from '../../src/recommendations/RecommendationSynthesizer.js';
import { KnowledgeGraphManager } from '../../src/managers/KnowledgeGraphManager.js';
import { UserManager } from '../../src/managers/UserManager.js';
import { QueryEngine } from '../../src/query/QueryEngine.js';
import { GraphFileStore } from '../../src/storage/GraphFileStore.js';
import { promises as fs } from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const TEST_BASE_DIR = path.join(__dirname, 'test-recommendations');
const TEST_FILE = path.join(TEST_BASE_DIR, 'knowledge_graph.json');

describe('RecommendationSynthesizer', () => {
  let kgManager: KnowledgeGraphManager;
  let queries: QueryEngine;
  let recommender: RecommendationSynthesizer;

  beforeEach(async () => {
    await fs.rm(TEST_BASE_DIR, { recursive: true, force: true });
    const store = new GraphFileStore(TEST_FILE);
    kgManager = new KnowledgeGraphManager(store, new UserManager(store));
    queries = new QueryEngine(kgManager);
    recommender = new RecommendationSynthesizer(queries);
  });

  afterEach(async () => {
    await fs.rm(TEST_BASE_DIR, { recursive: true, force: true });
  });

  describe('With a populated graph', () => {
    beforeEach(async () => {
      await kgManager.createEntities('alice', [
        { name: 'Python', type: 'skill' },
        { name: '工程师', type: 'role' },
        { name: '腾讯', type: 'company' },
      ]);
    });

    it('should list recorded skills', async () => {
      expect(await recommender.recommend('alice', 'skills')).toEqual({
        type: 'skills',
        items: ['Skill on record: Python'],
      });
    });

    it('should pair roles with skills for resume advice', async () => {
      expect((await recommender.recommend('alice', 'resume')).items).toEqual([
        'Consider highlighting your experience with Python for 工程师 positions.',
      ]);
    });

    it('should name recorded companies in interview advice', async () => {
      expect((await recommender.recommend('alice', 'interview')).items).toEqual([
        'Research 腾讯 and prepare examples that match its engineering culture before your interview.',
      ]);
    });

    it('should default to general advice drawn from every category', async () => {
      expect(await recommender.recommend('alice')).toEqual({
        type: 'general',
        items: [
          'Skill on record: Python',
          'Consider highlighting your experience with Python for 工程师 positions.',
          'Research 腾讯 and prepare examples that match its engineering culture before your interview.',
        ],
      });
    });

    it('should return the same items for repeated calls', async () => {
      const first = await recommender.recommend('alice', 'general');
      const second = await recommender.recommend('alice', 'general');

      expect(second).toEqual(first);
    });
  });

  describe('Fallbacks', () => {
    it('should fall back for a user with no graph', async () => {
      expect((await recommender.recommend('nobody', 'skills')).items).toEqual([SKILLS_FALLBACK]);
      expect((await recommender.recommend('nobody', 'resume')).items).toEqual([RESUME_FALLBACK]);
      expect((await recommender.recommend('nobody', 'interview')).items).toEqual(GENERIC_INTERVIEW_ITEMS);
      expect((await recommender.recommend('nobody', 'general')).items).toEqual([
        SKILLS_FALLBACK,
        RESUME_FALLBACK,
        GENERIC_INTERVIEW_ITEMS[0],
        GENERIC_INTERVIEW_ITEMS[1],
      ]);
    });

    it('should give role-only resume advice when no skills are recorded', async () => {
      await kgManager.upsertEntity('alice', 'Designer', 'role');

      expect((await recommender.recommend('alice', 'resume')).items).toEqual([
        'Tailor your resume to Designer positions by quantifying relevant achievements.',
      ]);
    });

    it('should match entity types case-insensitively', async () => {
      await kgManager.upsertEntity('alice', 'Rust', 'Skill');

      expect((await recommender.recommend('alice', 'skills')).items).toEqual(['Skill on record: Rust']);
    });
  });

  describe('General limit', () => {
    beforeEach(async () => {
      await kgManager.createEntities('alice', [
        { name: 'Python', type: 'skill' },
        { name: 'Rust', type: 'skill' },
        { name: 'Golang', type: 'skill' },
      ]);
    });

    it('should cap each category in general advice', async () => {
      expect((await recommender.recommend('alice')).items).toEqual([
        'Skill on record: Python',
        'Skill on record: Rust',
        'Consider highlighting your experience with Python on your resume.',
        'Consider highlighting your experience with Rust on your resume.',
        GENERIC_INTERVIEW_ITEMS[0],
        GENERIC_INTERVIEW_ITEMS[1],
      ]);
    });

    it('should honor a configured limit', async () => {
      const narrow = new RecommendationSynthesizer(queries, 1);

      expect((await narrow.recommend('alice')).items).toEqual([
        'Skill on record: Python',
        'Consider highlighting your experience with Python on your resume.',
        GENERIC_INTERVIEW_ITEMS[0],
      ]);
    });

    it('should not cap a specific category', async () => {
      expect((await recommender.recommend('alice', 'skills')).items).toHaveLength(3);
    });
  });
});
