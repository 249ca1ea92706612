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

import type { QueryEngine } from '../query/QueryEngine.js';
import type { KnowledgeGraph, Recommendation, RecommendationType } from '../types/graph.js';

export const DEFAULT_GENERAL_ITEMS_PER_CATEGORY = 2;

export const SKILLS_FALLBACK =
  'No skills recorded yet. Share the skills you have so we can tailor advice to them.';
export const RESUME_FALLBACK =
  'Tell us about your target roles and skills so we can suggest what your resume should highlight.';
export const GENERIC_INTERVIEW_ITEMS = [
  'Practice answering common behavioral questions using the STAR method.',
  'Prepare two or three concise stories about projects you are proud of.',
  'Prepare questions to ask your interviewers about the team and the role.',
];

function namesOfType(graph: KnowledgeGraph, type: string): string[] {
  return graph.entities.filter(e => e.type.toLowerCase() === type).map(e => e.name);
}

/**
 * Turns the facts stored for a user into categorized advice. The output
 * depends only on the graph contents, so repeated calls agree.
 */
export class RecommendationSynthesizer {
  constructor(
    private queries: QueryEngine,
    private generalItemsPerCategory: number = DEFAULT_GENERAL_ITEMS_PER_CATEGORY
  ) {}

  async recommend(userId: string, type: RecommendationType = 'general'): Promise<Recommendation> {
    const graph = await this.queries.readGraph(userId);
    return { type, items: this.itemsFor(graph, type) };
  }

  private itemsFor(graph: KnowledgeGraph, type: RecommendationType): string[] {
    switch (type) {
      case 'skills':
        return this.skillItems(graph);
      case 'resume':
        return this.resumeItems(graph);
      case 'interview':
        return this.interviewItems(graph);
      case 'general':
        return [
          ...this.skillItems(graph).slice(0, this.generalItemsPerCategory),
          ...this.resumeItems(graph).slice(0, this.generalItemsPerCategory),
          ...this.interviewItems(graph).slice(0, this.generalItemsPerCategory),
        ];
    }
  }

  private skillItems(graph: KnowledgeGraph): string[] {
    const skills = namesOfType(graph, 'skill');
    if (skills.length === 0) {
      return [SKILLS_FALLBACK];
    }
    return skills.map(skill => `Skill on record: ${skill}`);
  }

  private resumeItems(graph: KnowledgeGraph): string[] {
    const skills = namesOfType(graph, 'skill');
    const roles = namesOfType(graph, 'role');

    if (skills.length > 0 && roles.length > 0) {
      return roles.flatMap(role =>
        skills.map(skill => `Consider highlighting your experience with ${skill} for ${role} positions.`)
      );
    }
    if (skills.length > 0) {
      return skills.map(skill => `Consider highlighting your experience with ${skill} on your resume.`);
    }
    if (roles.length > 0) {
      return roles.map(role => `Tailor your resume to ${role} positions by quantifying relevant achievements.`);
    }
    return [RESUME_FALLBACK];
  }

  private interviewItems(graph: KnowledgeGraph): string[] {
    const companies = namesOfType(graph, 'company');
    if (companies.length === 0) {
      return [...GENERIC_INTERVIEW_ITEMS];
    }
    return companies.map(
      company => `Research ${company} and prepare examples that match its engineering culture before your interview.`
    );
  }
}
