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
import { UNKNOWN_ENTITY_TYPE } from '../types/graph.js';
import type { Entity, KnowledgeGraph, Relation } from '../types/graph.js';

export function entityKey(name: string): string {
  return name.trim().toLowerCase();
}

function relationKey(from: string, type: string, to: string): string {
  return `${entityKey(from)}\u0000${type}\u0000${entityKey(to)}`;
}

function copyEntity(entity: Entity): Entity {
  return { name: entity.name, type: entity.type, observations: [...entity.observations] };
}

function requireName(name: string, what = 'Entity name'): string {
  const trimmed = name.trim();
  if (trimmed === '') {
    throw new ValidationError(`${what} cannot be empty`);
  }
  return trimmed;
}

/**
 * One user's knowledge graph.
 *
 * Maps preserve insertion order, so iteration order is entity (and relation)
 * creation order. Entity names are unique case-insensitively; the display
 * form is whatever was used when the entity was first created. Every relation
 * endpoint is an entity in this graph: relations auto-vivify their endpoints
 * and deleting an entity cascades to its relations.
 */
export class UserGraph {
  private entities = new Map<string, Entity>();
  private relations = new Map<string, Relation>();

  static fromSnapshot(snapshot: KnowledgeGraph): UserGraph {
    const graph = new UserGraph();
    for (const entity of snapshot.entities) {
      graph.ensureEntity(entity.name, entity.type).entity.observations.push(...entity.observations);
    }
    for (const relation of snapshot.relations) {
      graph.addRelation(relation.from, relation.type, relation.to);
    }
    return graph;
  }

  get entityCount(): number {
    return this.entities.size;
  }

  get relationCount(): number {
    return this.relations.size;
  }

  clone(): UserGraph {
    return UserGraph.fromSnapshot(this.snapshot());
  }

  /** Deep copy; callers may mutate it freely. */
  snapshot(): KnowledgeGraph {
    return {
      entities: Array.from(this.entities.values(), copyEntity),
      relations: Array.from(this.relations.values(), r => ({ ...r })),
    };
  }

  getEntity(name: string): Entity | undefined {
    const entity = this.entities.get(entityKey(name));
    return entity ? copyEntity(entity) : undefined;
  }

  hasEntity(name: string): boolean {
    return this.entities.has(entityKey(name));
  }

  upsertEntity(name: string, type: string): { entity: Entity; created: boolean } {
    const { entity, created } = this.ensureEntity(name, type);
    return { entity: copyEntity(entity), created };
  }

  private ensureEntity(name: string, type: string): { entity: Entity; created: boolean } {
    const displayName = requireName(name);
    const key = entityKey(displayName);
    const existing = this.entities.get(key);
    if (existing) {
      return { entity: existing, created: false };
    }

    const entity: Entity = {
      name: displayName,
      type: type.trim() || UNKNOWN_ENTITY_TYPE,
      observations: [],
    };
    this.entities.set(key, entity);
    return { entity, created: true };
  }

  addObservations(name: string, texts: string[], type: string = UNKNOWN_ENTITY_TYPE): Entity {
    for (const text of texts) {
      if (text.trim() === '') {
        throw new ValidationError(`Observation text for '${name}' cannot be empty`);
      }
    }
    const { entity } = this.ensureEntity(name, type);
    entity.observations.push(...texts);
    return copyEntity(entity);
  }

  /** Removes the first occurrence of each text; returns how many were removed. */
  deleteObservations(name: string, texts: string[]): number {
    const entity = this.entities.get(entityKey(name));
    if (!entity) {
      return 0;
    }
    let removed = 0;
    for (const text of texts) {
      const index = entity.observations.indexOf(text);
      if (index !== -1) {
        entity.observations.splice(index, 1);
        removed++;
      }
    }
    return removed;
  }

  addRelation(from: string, type: string, to: string): { relation: Relation; created: boolean } {
    const relationType = requireName(type, 'Relation type');
    const source = this.ensureEntity(from, UNKNOWN_ENTITY_TYPE).entity;
    const target = this.ensureEntity(to, UNKNOWN_ENTITY_TYPE).entity;

    const key = relationKey(source.name, relationType, target.name);
    const existing = this.relations.get(key);
    if (existing) {
      return { relation: { ...existing }, created: false };
    }

    const relation: Relation = { from: source.name, type: relationType, to: target.name };
    this.relations.set(key, relation);
    return { relation: { ...relation }, created: true };
  }

  deleteRelation(from: string, type: string, to: string): boolean {
    return this.relations.delete(relationKey(from, type.trim(), to));
  }

  deleteEntity(name: string): boolean {
    const key = entityKey(name);
    if (!this.entities.delete(key)) {
      return false;
    }
    for (const [relKey, relation] of this.relations) {
      if (entityKey(relation.from) === key || entityKey(relation.to) === key) {
        this.relations.delete(relKey);
      }
    }
    return true;
  }

  /** Case-insensitive substring match over name, type and observations. */
  search(query: string): Entity[] {
    const needle = query.toLowerCase();
    const matches: Entity[] = [];
    for (const entity of this.entities.values()) {
      if (
        entity.name.toLowerCase().includes(needle) ||
        entity.type.toLowerCase().includes(needle) ||
        entity.observations.some(o => o.toLowerCase().includes(needle))
      ) {
        matches.push(copyEntity(entity));
      }
    }
    return matches;
  }

  open(names: string[]): Entity[] {
    const wanted = new Set(names.map(entityKey));
    const found: Entity[] = [];
    for (const [key, entity] of this.entities) {
      if (wanted.has(key)) {
        found.push(copyEntity(entity));
      }
    }
    return found;
  }

  entitiesOfType(type: string): Entity[] {
    const wanted = type.toLowerCase();
    return Array.from(this.entities.values())
      .filter(e => e.type.toLowerCase() === wanted)
      .map(copyEntity);
  }
}
