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

import { describe, it, expect, beforeAll } from 'vitest';
import { ObservationExtractor } from '../../src/extraction/ObservationExtractor.js';
import { loadRuleTable, parseRuleTable } from '../../src/extraction/ruleTable.js';
import { ValidationError } from '../../src/errors.js';

describe('ObservationExtractor', () => {
  let extractor: ObservationExtractor;

  beforeAll(async () => {
    extractor = new ObservationExtractor(await loadRuleTable());
  });

  describe('Classification', () => {
    it('should recognize job-related messages', () => {
      expect(extractor.isJobRelated('我想找一个Python工程师的工作')).toBe(true);
      expect(extractor.isJobRelated('Preparing for an INTERVIEW tomorrow')).toBe(true);
    });

    it('should skip unrelated messages', () => {
      expect(extractor.isJobRelated('今天天气真好')).toBe(false);
      expect(extractor.extract('alice', '今天天气真好')).toEqual({ observations: [], relations: [] });
    });

    it('should not treat preference words alone as job-related', () => {
      for (const message of ['今天天气真好，希望明天也是晴天', 'I would like a cup of coffee']) {
        expect(extractor.isJobRelated(message)).toBe(false);
        expect(extractor.extract('alice', message)).toEqual({ observations: [], relations: [] });
      }
    });
  });

  describe('Extraction', () => {
    it('should extract skill, role, preference and the role requirement', () => {
      const message = '我想找一个Python工程师的工作';

      expect(extractor.extract('alice', message)).toEqual({
        observations: [
          { entityName: 'Python', entityType: 'skill', text: message },
          { entityName: '工程师', entityType: 'role', text: message },
          { entityName: 'preferences', entityType: 'preference', text: message },
        ],
        relations: [{ from: '工程师', relationType: 'requires', to: 'Python' }],
      });
    });

    it('should relate a role to the company it is at', () => {
      const message = '我是腾讯的后端工程师，熟悉Golang。';
      const sentence = '我是腾讯的后端工程师，熟悉Golang';

      expect(extractor.extract('alice', message)).toEqual({
        observations: [
          { entityName: 'Golang', entityType: 'skill', text: sentence },
          { entityName: '腾讯', entityType: 'company', text: sentence },
          { entityName: '后端工程师', entityType: 'role', text: sentence },
        ],
        relations: [
          { from: '后端工程师', relationType: 'at', to: '腾讯' },
          { from: '后端工程师', relationType: 'requires', to: 'Golang' },
        ],
      });
    });

    it('should prefer the longest overlapping keyword', () => {
      const result = extractor.extract('alice', '我在阿里巴巴做Java和JavaScript开发');

      expect(result.observations.map(o => [o.entityName, o.entityType])).toEqual([
        ['Java', 'skill'],
        ['JavaScript', 'skill'],
        ['阿里巴巴', 'company'],
      ]);
    });

    it('should not match Latin keywords inside longer words', () => {
      const result = extractor.extract('alice', 'I need to build trust at work');

      expect(extractor.isJobRelated('I need to build trust at work')).toBe(true);
      expect(result).toEqual({ observations: [], relations: [] });
    });

    it('should report a repeated keyword once using its canonical spelling', () => {
      const message = 'Python and python again, I love Python jobs';

      expect(extractor.extract('alice', message).observations).toEqual([
        { entityName: 'Python', entityType: 'skill', text: message },
      ]);
    });

    it('should record one observation per sentence for synthetic entities', () => {
      expect(extractor.extract('alice', '我期望月薪3万。我也希望远程工作！').observations).toEqual([
        { entityName: 'preferences', entityType: 'preference', text: '我期望月薪3万' },
        { entityName: 'preferences', entityType: 'preference', text: '我也希望远程工作' },
        { entityName: 'salary expectations', entityType: 'compensation', text: '我期望月薪3万' },
      ]);
    });

    it('should keep fragments aligned after characters that lowercase to longer text', () => {
      expect(extractor.extract('alice', 'İİİİİİİİİİ。Python工作')).toEqual({
        observations: [{ entityName: 'Python', entityType: 'skill', text: 'Python工作' }],
        relations: [],
      });
    });

    it('should reject empty input', () => {
      expect(() => extractor.extract('', 'Python')).toThrow(ValidationError);
      expect(() => extractor.extract('alice', '   ')).toThrow('Message cannot be empty');
    });
  });

  describe('Rule Tables', () => {
    it('should take new rules without code changes', () => {
      const custom = new ObservationExtractor(parseRuleTable({
        jobKeywords: ['design'],
        rules: [{ id: 'tools', shape: 'keyword-entity', entityType: 'tool', triggers: ['Figma'] }],
      }));

      expect(custom.extract('alice', 'I design in Figma')).toEqual({
        observations: [{ entityName: 'Figma', entityType: 'tool', text: 'I design in Figma' }],
        relations: [],
      });
    });

    it('should default relation rules to an empty list', () => {
      expect(parseRuleTable({ jobKeywords: ['job'], rules: [] }).relationRules).toEqual([]);
    });

    it('should reject malformed rule tables', () => {
      expect(() => parseRuleTable({
        jobKeywords: [],
        rules: [{ id: 'x', shape: 'keyword-entity', entityType: 'skill', triggers: [] }],
      })).toThrow(ValidationError);
      expect(() => parseRuleTable({ rules: [] })).toThrow(/Invalid extraction rule table: jobKeywords/);
    });

    it('should load the bundled rule table', async () => {
      const table = await loadRuleTable();

      expect(table.rules.map(r => r.id)).toEqual(['skills', 'companies', 'roles', 'preferences', 'salary']);
      expect(table.relationRules).toHaveLength(2);
    });
  });
});
