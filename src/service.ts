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

import type { Config } from './config.js';
import { ObservationExtractor } from './extraction/ObservationExtractor.js';
import { loadRuleTable } from './extraction/ruleTable.js';
import { KnowledgeGraphManager } from './managers/KnowledgeGraphManager.js';
import { UserManager } from './managers/UserManager.js';
import { QueryEngine } from './query/QueryEngine.js';
import { RecommendationSynthesizer } from './recommendations/RecommendationSynthesizer.js';
import { GraphFileStore } from './storage/GraphFileStore.js';
import { ToolFacade } from './tools/ToolFacade.js';

export interface MemoryService {
  store: GraphFileStore;
  users: UserManager;
  graphs: KnowledgeGraphManager;
  queries: QueryEngine;
  extractor: ObservationExtractor;
  recommender: RecommendationSynthesizer;
  facade: ToolFacade;
}

/** Wires every component against one backing file. */
export async function createMemoryService(config: Config): Promise<MemoryService> {
  const store = new GraphFileStore(config.memoryFilePath, { lockTimeoutMs: config.lockTimeoutMs });
  const users = new UserManager(store);
  const graphs = new KnowledgeGraphManager(store, users);
  const queries = new QueryEngine(graphs);
  const extractor = new ObservationExtractor(await loadRuleTable(config.extractionRulesPath));
  const recommender = new RecommendationSynthesizer(queries, config.generalRecommendationLimit);
  const facade = new ToolFacade({ graphs, users, queries, extractor, recommender });

  return { store, users, graphs, queries, extractor, recommender, facade };
}
