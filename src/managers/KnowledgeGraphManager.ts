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

import { NotFoundError, ValidationError } from '../errors.js';
import type { GraphFileStore } from '../storage/GraphFileStore.js';
import type {
  ApplyExtractionResult,
  CreateRelationsResult,
  Entity,
  EntityInput,
  Extraction,
  KnowledgeGraph,
  RelationInput,
} from '../types/graph.js';
import type { UserManager } from './UserManager.js';

export class KnowledgeGraphManager {
  constructor(
    private store: GraphFileStore,
    private userManager: UserManager
  ) {}

  async upsertEntity(userId: string, name: string, type: string): Promise<Entity> {
    this.userManager.validateUserId(userId);
    return this.store.mutate(userId, graph => {
      const { entity, created } = graph.upsertEntity(name, type);
      return { result: entity, changed: created };
    });
  }

  async addObservation(userId: string, name: string, text: string): Promise<void> {
    await this.addObservations(userId, name, [text]);
  }

  async addObservations(userId: string, name: string, texts: string[]): Promise<Entity> {
    this.userManager.validateUserId(userId);
    if (texts.length === 0) {
      throw new ValidationError('At least one observation is required');
    }
    return this.store.mutate(userId, graph => ({
      result: graph.addObservations(name, texts),
      changed: true,
    }));
  }

  async addRelation(userId: string, from: string, relationType: string, to: string): Promise<boolean> {
    this.userManager.validateUserId(userId);
    return this.store.mutate(userId, graph => {
      const before = graph.entityCount;
      const { created } = graph.addRelation(from, relationType, to);
      return { result: created, changed: created || graph.entityCount !== before };
    });
  }

  async createEntities(userId: string, inputs: EntityInput[]): Promise<Entity[]> {
    this.userManager.validateUserId(userId);
    return this.store.mutate(userId, graph => {
      let changed = false;
      const entities = inputs.map(input => {
        const observations = input.observations ?? [];
        if (!graph.hasEntity(input.name) || observations.length > 0) {
          changed = true;
        }
        return graph.addObservations(input.name, observations, input.type);
      });
      return { result: entities, changed };
    });
  }

  async createRelations(userId: string, inputs: RelationInput[]): Promise<CreateRelationsResult> {
    this.userManager.validateUserId(userId);
    return this.store.mutate(userId, graph => {
      const before = graph.entityCount;
      const outcome: CreateRelationsResult = { created: [], skipped: [] };
      for (const input of inputs) {
        const { relation, created } = graph.addRelation(input.from, input.type, input.to);
        (created ? outcome.created : outcome.skipped).push(relation);
      }
      return {
        result: outcome,
        changed: outcome.created.length > 0 || graph.entityCount !== before,
      };
    });
  }

  async deleteEntity(userId: string, name: string): Promise<boolean> {
    this.userManager.validateUserId(userId);
    return this.store.mutate(userId, graph => {
      const removed = graph.deleteEntity(name);
      return { result: removed, changed: removed };
    });
  }

  async deleteObservations(userId: string, name: string, texts: string[]): Promise<number> {
    this.userManager.validateUserId(userId);
    return this.store.mutate(userId, graph => {
      if (!graph.hasEntity(name)) {
        throw new NotFoundError(`Entity '${name}' not found`);
      }
      const removed = graph.deleteObservations(name, texts);
      return { result: removed, changed: removed > 0 };
    });
  }

  async deleteRelation(userId: string, from: string, relationType: string, to: string): Promise<boolean> {
    this.userManager.validateUserId(userId);
    return this.store.mutate(userId, graph => {
      const removed = graph.deleteRelation(from, relationType, to);
      return { result: removed, changed: removed };
    });
  }

  /**
   * Applies everything one message produced under a single lock and write.
   */
  async applyExtraction(userId: string, extraction: Extraction): Promise<ApplyExtractionResult> {
    this.userManager.validateUserId(userId);
    return this.store.mutate(userId, graph => {
      const touched = new Set<string>();
      let relationsAdded = 0;

      for (const observation of extraction.observations) {
        const entity = graph.addObservations(observation.entityName, [observation.text], observation.entityType);
        touched.add(entity.name);
      }
      for (const relation of extraction.relations) {
        const { relation: stored, created } = graph.addRelation(relation.from, relation.relationType, relation.to);
        touched.add(stored.from);
        touched.add(stored.to);
        if (created) relationsAdded++;
      }

      return {
        result: {
          entities: Array.from(touched),
          observationsAdded: extraction.observations.length,
          relationsAdded,
        },
        changed: extraction.observations.length > 0 || extraction.relations.length > 0,
      };
    });
  }

  async readGraph(userId: string): Promise<KnowledgeGraph> {
    this.userManager.validateUserId(userId);
    return this.store.read(userId, graph => graph?.snapshot() ?? { entities: [], relations: [] });
  }

  async searchNodes(userId: string, query: string): Promise<Entity[]> {
    this.userManager.validateUserId(userId);
    if (query.trim() === '') {
      throw new ValidationError('Search query cannot be empty');
    }
    return this.store.read(userId, graph => graph?.search(query) ?? []);
  }

  async openNodes(userId: string, names: string[]): Promise<Entity[]> {
    this.userManager.validateUserId(userId);
    return this.store.read(userId, graph => graph?.open(names) ?? []);
  }

  async entitiesOfType(userId: string, type: string): Promise<Entity[]> {
    this.userManager.validateUserId(userId);
    return this.store.read(userId, graph => graph?.entitiesOfType(type) ?? []);
  }
}
