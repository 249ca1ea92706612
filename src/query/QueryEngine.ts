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

import type { KnowledgeGraphManager } from '../managers/KnowledgeGraphManager.js';
import type { Entity, KnowledgeGraph } from '../types/graph.js';

/** Read-only view over the graph store. Results keep entity-creation order. */
export class QueryEngine {
  constructor(private graphs: KnowledgeGraphManager) {}

  readGraph(userId: string): Promise<KnowledgeGraph> {
    return this.graphs.readGraph(userId);
  }

  searchNodes(userId: string, query: string): Promise<Entity[]> {
    return this.graphs.searchNodes(userId, query);
  }

  openNodes(userId: string, names: string[]): Promise<Entity[]> {
    return this.graphs.openNodes(userId, names);
  }

  entitiesByType(userId: string, type: string): Promise<Entity[]> {
    return this.graphs.entitiesOfType(userId, type);
  }
}
