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

import type { z } from 'zod';
import { isMemoryError, ValidationError } from '../errors.js';
import type { ObservationExtractor } from '../extraction/ObservationExtractor.js';
import { entityKey } from '../graph/UserGraph.js';
import type { KnowledgeGraphManager } from '../managers/KnowledgeGraphManager.js';
import type { UserManager } from '../managers/UserManager.js';
import type { QueryEngine } from '../query/QueryEngine.js';
import type { RecommendationSynthesizer } from '../recommendations/RecommendationSynthesizer.js';
import type { Relation } from '../types/graph.js';
import {
  addObservationsArgs,
  createEntitiesArgs,
  createRelationsArgs,
  deleteEntitiesArgs,
  deleteObservationsArgs,
  deleteRelationsArgs,
  deleteUserGraphArgs,
  getJobRecommendationsArgs,
  listUsersArgs,
  openNodesArgs,
  processUserMessageArgs,
  readGraphArgs,
  searchNodesArgs,
} from './schemas.js';

export interface ToolErrorResult {
  error: string;
}

export interface ToolFacadeDeps {
  graphs: KnowledgeGraphManager;
  users: UserManager;
  queries: QueryEngine;
  extractor: ObservationExtractor;
  recommender: RecommendationSynthesizer;
  now?: () => Date;
}

interface RegisteredTool {
  run(rawArgs: unknown): Promise<unknown>;
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map(i => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message)).join('; ');
}

function defineTool<S extends z.ZodTypeAny>(
  name: string,
  schema: S,
  handler: (args: z.output<S>) => Promise<unknown>
): RegisteredTool {
  return {
    async run(rawArgs) {
      const parsed = schema.safeParse(rawArgs ?? {});
      if (!parsed.success) {
        throw new ValidationError(`Invalid arguments for ${name}: ${formatIssues(parsed.error)}`);
      }
      return handler(parsed.data);
    },
  };
}

export function isToolError(value: unknown): value is ToolErrorResult {
  return typeof value === 'object' && value !== null && 'error' in value && typeof value.error === 'string';
}

export function toToolError(error: unknown): ToolErrorResult {
  if (isMemoryError(error)) {
    return { error: `${error.name}: ${error.message}` };
  }
  const message = error instanceof Error ? error.message : String(error);
  return { error: `InternalError: ${message}` };
}

/**
 * The only layer that knows the tool-call contract: maps tool names to
 * validated calls on the graph components and turns every failure into
 * `{ error }`.
 */
export class ToolFacade {
  private tools: Map<string, RegisteredTool>;
  private now: () => Date;

  constructor(private deps: ToolFacadeDeps) {
    this.now = deps.now ?? (() => new Date());
    this.tools = this.buildDispatchTable();
  }

  get toolNames(): string[] {
    return Array.from(this.tools.keys());
  }

  async call(toolName: string, args: unknown): Promise<unknown> {
    try {
      const tool = this.tools.get(toolName);
      if (!tool) {
        throw new ValidationError(`Unknown tool: ${toolName}`);
      }
      return await tool.run(args);
    } catch (error) {
      return toToolError(error);
    }
  }

  private buildDispatchTable(): Map<string, RegisteredTool> {
    const { graphs, users, queries, extractor, recommender } = this.deps;

    return new Map<string, RegisteredTool>([
      ['process_user_message', defineTool('process_user_message', processUserMessageArgs, async ({ user_id, message }) => {
        users.validateUserId(user_id);
        const extraction = extractor.extract(user_id, message);
        if (extraction.observations.length === 0 && extraction.relations.length === 0) {
          return {
            status: 'skipped',
            reason: extractor.isJobRelated(message)
              ? 'No job-search facts found in message'
              : 'Message is not related to job search',
          };
        }
        const applied = await graphs.applyExtraction(user_id, extraction);
        return {
          status: 'success',
          user_id,
          timestamp: this.now().toISOString(),
          entities: applied.entities,
          observations_added: applied.observationsAdded,
          relations_added: applied.relationsAdded,
        };
      })],

      ['get_job_recommendations', defineTool('get_job_recommendations', getJobRecommendationsArgs, async ({ user_id, recommendation_type }) => {
        const recommendation = await recommender.recommend(user_id, recommendation_type);
        return { user_id, ...recommendation };
      })],

      ['create_entities', defineTool('create_entities', createEntitiesArgs, async ({ user_id, entities }) => ({
        entities: await graphs.createEntities(user_id, entities),
      }))],

      ['create_relations', defineTool('create_relations', createRelationsArgs, async ({ user_id, relations }) =>
        graphs.createRelations(user_id, relations)
      )],

      ['add_observations', defineTool('add_observations', addObservationsArgs, async ({ user_id, name, observations }) => ({
        entity: await graphs.addObservations(user_id, name, observations),
      }))],

      ['delete_entities', defineTool('delete_entities', deleteEntitiesArgs, async ({ user_id, names }) => {
        const deleted: string[] = [];
        const notFound: string[] = [];
        for (const name of names) {
          (await graphs.deleteEntity(user_id, name) ? deleted : notFound).push(name);
        }
        return { deleted, not_found: notFound };
      })],

      ['delete_observations', defineTool('delete_observations', deleteObservationsArgs, async ({ user_id, name, observations }) => ({
        deleted_count: await graphs.deleteObservations(user_id, name, observations),
      }))],

      ['delete_relations', defineTool('delete_relations', deleteRelationsArgs, async ({ user_id, relations }) => {
        const deleted: Relation[] = [];
        const notFound: Relation[] = [];
        for (const relation of relations) {
          (await graphs.deleteRelation(user_id, relation.from, relation.type, relation.to) ? deleted : notFound).push(relation);
        }
        return { deleted, not_found: notFound };
      })],

      ['read_graph', defineTool('read_graph', readGraphArgs, async ({ user_id }) => queries.readGraph(user_id))],

      ['search_nodes', defineTool('search_nodes', searchNodesArgs, async ({ user_id, query }) => ({
        entities: await queries.searchNodes(user_id, query),
      }))],

      ['open_nodes', defineTool('open_nodes', openNodesArgs, async ({ user_id, names }) => {
        const entities = await queries.openNodes(user_id, names);
        const found = new Set(entities.map(e => entityKey(e.name)));
        return { entities, not_found: names.filter(n => !found.has(entityKey(n))) };
      })],

      ['list_users', defineTool('list_users', listUsersArgs, async () => ({
        users: await users.listUsers(),
      }))],

      ['delete_user_graph', defineTool('delete_user_graph', deleteUserGraphArgs, async ({ user_id }) => {
        await users.deleteUser(user_id);
        return { deleted: user_id };
      })],
    ]);
  }
}
