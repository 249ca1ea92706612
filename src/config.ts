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

import path from 'path';
import { z } from 'zod';
import { ValidationError } from './errors.js';
import { DEFAULT_RULES_PATH } from './extraction/ruleTable.js';
import { DEFAULT_GENERAL_ITEMS_PER_CATEGORY } from './recommendations/RecommendationSynthesizer.js';
import { DEFAULT_LOCK_TIMEOUT_MS } from './storage/GraphFileStore.js';

export interface Config {
  memoryFilePath: string;
  lockTimeoutMs: number;
  extractionRulesPath: string;
  generalRecommendationLimit: number;
}

const envSchema = z.object({
  MEMORY_FILE_PATH: z.string().min(1).optional(),
  MEMORY_LOCK_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_LOCK_TIMEOUT_MS),
  EXTRACTION_RULES_PATH: z.string().min(1).default(DEFAULT_RULES_PATH),
  GENERAL_RECOMMENDATION_LIMIT: z.coerce.number().int().positive().default(DEFAULT_GENERAL_ITEMS_PER_CATEGORY),
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): Config {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw new ValidationError(`Invalid configuration: ${issues.join('; ')}`);
  }

  const values = parsed.data;
  return {
    memoryFilePath: values.MEMORY_FILE_PATH ?? path.join(cwd, '.job-memory', 'knowledge_graph.json'),
    lockTimeoutMs: values.MEMORY_LOCK_TIMEOUT_MS,
    extractionRulesPath: values.EXTRACTION_RULES_PATH,
    generalRecommendationLimit: values.GENERAL_RECOMMENDATION_LIMIT,
  };
}
