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

export interface Entity {
  name: string;
  type: string;
  observations: string[];
}

export interface Relation {
  from: string;
  type: string;
  to: string;
}

export interface KnowledgeGraph {
  entities: Entity[];
  relations: Relation[];
}

/** Persisted document: user_id -> that user's graph. */
export type PersistedGraph = Record<string, KnowledgeGraph>;

export const UNKNOWN_ENTITY_TYPE = 'unknown';

// Input types accepted by the batch operations
export interface EntityInput {
  name: string;
  type: string;
  observations?: string[];
}

export interface RelationInput {
  from: string;
  type: string;
  to: string;
}

export interface CreateRelationsResult {
  created: Relation[];
  skipped: Relation[];
}

export interface ExtractedObservation {
  entityName: string;
  entityType: string;
  text: string;
}

export interface ExtractedRelation {
  from: string;
  relationType: string;
  to: string;
}

export interface Extraction {
  observations: ExtractedObservation[];
  relations: ExtractedRelation[];
}

export interface ApplyExtractionResult {
  entities: string[];
  observationsAdded: number;
  relationsAdded: number;
}

export const RECOMMENDATION_TYPES = ['general', 'resume', 'interview', 'skills'] as const;

export type RecommendationType = (typeof RECOMMENDATION_TYPES)[number];

export interface Recommendation {
  type: RecommendationType;
  items: string[];
}
