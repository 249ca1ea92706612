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

import { ValidationError } from '../errors.js';
import type { ExtractedObservation, ExtractedRelation, Extraction } from '../types/graph.js';
import type { ExtractionRule, RuleTable } from './ruleTable.js';

interface Span {
  start: number;
  end: number;
}

interface KeywordMatch extends Span {
  keyword: string;
}

interface Sentence extends Span {
  text: string;
}

const SENTENCE_PATTERN = /[^。！？!?；;\n]+/g;
const WORD_CHAR = /[a-z0-9]/i;

function splitSentences(message: string): Sentence[] {
  const sentences: Sentence[] = [];
  for (const match of message.matchAll(SENTENCE_PATTERN)) {
    const start = match.index ?? 0;
    sentences.push({ text: match[0].trim(), start, end: start + match[0].length });
  }
  return sentences.filter(s => s.text !== '');
}

// Latin keywords must not sit inside a longer word ("Rust" in "trust");
// CJK text has no word boundaries, so only letter/digit edges are checked.
function atWordBoundary(text: string, keyword: string, start: number): boolean {
  const end = start + keyword.length;
  if (WORD_CHAR.test(keyword[0]) && start > 0 && WORD_CHAR.test(text[start - 1])) {
    return false;
  }
  if (WORD_CHAR.test(keyword[keyword.length - 1]) && end < text.length && WORD_CHAR.test(text[end])) {
    return false;
  }
  return true;
}

// Lowercases per code point but keeps any character whose lowercase form has a
// different length ("İ"), so offsets in the result are offsets in `text`.
function foldCase(text: string): string {
  let folded = '';
  for (const ch of text) {
    const lower = ch.toLowerCase();
    folded += lower.length === ch.length ? lower : ch;
  }
  return folded;
}

function overlaps(a: Span, b: Span): boolean {
  return a.start < b.end && b.start < a.end;
}

/**
 * Finds every trigger of one rule in the message. Where triggers overlap the
 * longest wins, so "阿里巴巴" is not also reported as "阿里". Each keyword is
 * reported once, at its first position; results are in message order.
 */
function findMatches(foldedMessage: string, triggers: string[]): KeywordMatch[] {
  const candidates: KeywordMatch[] = [];
  for (const keyword of triggers) {
    const needle = foldCase(keyword);
    let from = 0;
    for (;;) {
      const start = foldedMessage.indexOf(needle, from);
      if (start === -1) break;
      if (atWordBoundary(foldedMessage, needle, start)) {
        candidates.push({ keyword, start, end: start + needle.length });
      }
      from = start + 1;
    }
  }

  candidates.sort((a, b) => b.end - b.start - (a.end - a.start) || a.start - b.start);
  const accepted: KeywordMatch[] = [];
  for (const candidate of candidates) {
    if (!accepted.some(a => overlaps(a, candidate))) {
      accepted.push(candidate);
    }
  }

  const firstByKeyword = new Map<string, KeywordMatch>();
  for (const match of accepted.sort((a, b) => a.start - b.start)) {
    if (!firstByKeyword.has(match.keyword)) {
      firstByKeyword.set(match.keyword, match);
    }
  }
  return Array.from(firstByKeyword.values());
}

function sentenceAt(sentences: Sentence[], position: number): Sentence | undefined {
  return sentences.find(s => position >= s.start && position < s.end);
}

/**
 * Deterministic rule engine turning a user message into graph facts.
 *
 * All behaviour lives in the RuleTable; extending the keyword lists or adding
 * rules never requires touching this class.
 */
export class ObservationExtractor {
  private classificationKeywords: string[];

  constructor(private rules: RuleTable) {
    // Synthetic triggers ("希望", "prefer") are ordinary words and never make
    // a message job-related on their own.
    const all = new Set<string>();
    for (const keyword of rules.jobKeywords) all.add(foldCase(keyword));
    for (const rule of rules.rules) {
      if (rule.shape !== 'keyword-entity') continue;
      for (const keyword of rule.triggers) all.add(foldCase(keyword));
    }
    this.classificationKeywords = Array.from(all);
  }

  isJobRelated(message: string): boolean {
    const folded = foldCase(message);
    return this.classificationKeywords.some(keyword => folded.includes(keyword));
  }

  extract(userId: string, message: string): Extraction {
    if (userId.trim() === '') {
      throw new ValidationError('user_id cannot be empty');
    }
    if (message.trim() === '') {
      throw new ValidationError('Message cannot be empty');
    }

    if (!this.isJobRelated(message)) {
      return { observations: [], relations: [] };
    }

    const folded = foldCase(message);
    const sentences = splitSentences(message);
    const observations: ExtractedObservation[] = [];
    const namesByType = new Map<string, string[]>();

    for (const rule of this.rules.rules) {
      const matches = findMatches(folded, rule.triggers);
      if (matches.length === 0) continue;
      observations.push(...this.applyRule(rule, matches, sentences, namesByType));
    }

    return { observations, relations: this.buildRelations(namesByType) };
  }

  private applyRule(
    rule: ExtractionRule,
    matches: KeywordMatch[],
    sentences: Sentence[],
    namesByType: Map<string, string[]>
  ): ExtractedObservation[] {
    const observations: ExtractedObservation[] = [];

    if (rule.shape === 'keyword-entity') {
      const names = namesByType.get(rule.entityType) ?? [];
      for (const match of matches) {
        const sentence = sentenceAt(sentences, match.start);
        if (!sentence) continue;
        observations.push({ entityName: match.keyword, entityType: rule.entityType, text: sentence.text });
        if (!names.includes(match.keyword)) names.push(match.keyword);
      }
      namesByType.set(rule.entityType, names);
      return observations;
    }

    const seen = new Set<Sentence>();
    for (const match of matches) {
      const sentence = sentenceAt(sentences, match.start);
      if (!sentence || seen.has(sentence)) continue;
      seen.add(sentence);
      observations.push({ entityName: rule.entityName, entityType: rule.entityType, text: sentence.text });
    }
    return observations;
  }

  private buildRelations(namesByType: Map<string, string[]>): ExtractedRelation[] {
    const relations: ExtractedRelation[] = [];
    for (const rule of this.rules.relationRules) {
      const sources = namesByType.get(rule.fromType) ?? [];
      const targets = namesByType.get(rule.toType) ?? [];
      for (const from of sources) {
        for (const to of targets) {
          if (from.toLowerCase() === to.toLowerCase()) continue;
          relations.push({ from, relationType: rule.relationType, to });
        }
      }
    }
    return relations;
  }
}
