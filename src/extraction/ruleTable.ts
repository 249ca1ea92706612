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
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { ValidationError } from '../errors.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

// src/extraction and dist/extraction both sit two levels below the package root
export const DEFAULT_RULES_PATH = path.join(__dirname, '..', '..', 'data', 'extraction-rules.json');

const triggers = z.array(z.string().trim().min(1)).min(1);

const extractionRuleSchema = z.discriminatedUnion('shape', [
  z.object({
    id: z.string().min(1),
    shape: z.literal('keyword-entity'),
    entityType: z.string().min(1),
    triggers,
  }),
  z.object({
    id: z.string().min(1),
    shape: z.literal('synthetic-entity'),
    entityType: z.string().min(1),
    entityName: z.string().min(1),
    triggers,
  }),
]);

const relationRuleSchema = z.object({
  fromType: z.string().min(1),
  relationType: z.string().min(1),
  toType: z.string().min(1),
});

export const ruleTableSchema = z.object({
  jobKeywords: z.array(z.string().trim().min(1)),
  rules: z.array(extractionRuleSchema),
  relationRules: z.array(relationRuleSchema).default([]),
});

export type ExtractionRule = z.infer<typeof extractionRuleSchema>;
export type RelationRule = z.infer<typeof relationRuleSchema>;
export type RuleTable = z.infer<typeof ruleTableSchema>;

export function parseRuleTable(data: unknown): RuleTable {
  const parsed = ruleTableSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ValidationError(`Invalid extraction rule table: ${issues.join('; ')}`);
  }
  return parsed.data;
}

export async function loadRuleTable(filePath: string = DEFAULT_RULES_PATH): Promise<RuleTable> {
  const raw = await fs.readFile(filePath, 'utf-8');
  return parseRuleTable(JSON.parse(raw));
}
