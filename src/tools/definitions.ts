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

export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: {
    type: 'object';
    properties: Record<string, object>;
    required?: string[];
    additionalProperties?: boolean;
  };
}

const userIdProperty = {
  type: "string",
  description: "ID of the user whose knowledge graph is read or written",
};

const relationItem = {
  type: "object",
  properties: {
    from: { type: "string", description: "Name of the source entity" },
    type: { type: "string", description: "Relation type, in active voice (e.g. 'at', 'requires')" },
    to: { type: "string", description: "Name of the target entity" },
  },
  required: ["from", "type", "to"],
  additionalProperties: false,
};

export const TOOL_DEFINITIONS: ToolDefinition[] = [
  {
    name: "process_user_message",
    description: "Extract job-search facts (skills, companies, roles, preferences, salary expectations) from a user message and store them in the user's knowledge graph. Messages unrelated to job search are skipped.",
    inputSchema: {
      type: "object",
      properties: {
        user_id: userIdProperty,
        message: { type: "string", description: "The user's message" },
      },
      required: ["user_id", "message"],
      additionalProperties: false,
    },
  },
  {
    name: "get_job_recommendations",
    description: "Build job-search advice from what is stored about the user.",
    inputSchema: {
      type: "object",
      properties: {
        user_id: userIdProperty,
        recommendation_type: {
          type: "string",
          enum: ["general", "resume", "interview", "skills"],
          description: "Kind of advice. Defaults to 'general'",
        },
      },
      required: ["user_id"],
      additionalProperties: false,
    },
  },
  {
    name: "create_entities",
    description: "Create entities in the user's knowledge graph. Existing entities keep their type; given observations are appended.",
    inputSchema: {
      type: "object",
      properties: {
        user_id: userIdProperty,
        entities: {
          type: "array",
          items: {
            type: "object",
            properties: {
              name: { type: "string", description: "The name of the entity" },
              type: { type: "string", description: "The type of the entity (e.g. 'skill', 'company', 'role')" },
              observations: {
                type: "array",
                items: { type: "string" },
                description: "Observations to attach to the entity",
              },
            },
            required: ["name", "type"],
            additionalProperties: false,
          },
        },
      },
      required: ["user_id", "entities"],
      additionalProperties: false,
    },
  },
  {
    name: "create_relations",
    description: "Create directed relations between entities. Missing endpoint entities are created; existing relations are reported as skipped.",
    inputSchema: {
      type: "object",
      properties: {
        user_id: userIdProperty,
        relations: { type: "array", items: relationItem },
      },
      required: ["user_id", "relations"],
      additionalProperties: false,
    },
  },
  {
    name: "add_observations",
    description: "Append observations to an entity, creating it with type 'unknown' if needed.",
    inputSchema: {
      type: "object",
      properties: {
        user_id: userIdProperty,
        name: { type: "string", description: "Entity name" },
        observations: { type: "array", items: { type: "string" }, description: "Observation texts to append" },
      },
      required: ["user_id", "name", "observations"],
      additionalProperties: false,
    },
  },
  {
    name: "delete_entities",
    description: "Delete entities and every relation that references them.",
    inputSchema: {
      type: "object",
      properties: {
        user_id: userIdProperty,
        names: { type: "array", items: { type: "string" }, description: "Names of the entities to delete" },
      },
      required: ["user_id", "names"],
      additionalProperties: false,
    },
  },
  {
    name: "delete_observations",
    description: "Delete specific observations from an entity.",
    inputSchema: {
      type: "object",
      properties: {
        user_id: userIdProperty,
        name: { type: "string", description: "Entity name" },
        observations: { type: "array", items: { type: "string" }, description: "Observation texts to delete" },
      },
      required: ["user_id", "name", "observations"],
      additionalProperties: false,
    },
  },
  {
    name: "delete_relations",
    description: "Delete relations identified by (from, type, to).",
    inputSchema: {
      type: "object",
      properties: {
        user_id: userIdProperty,
        relations: { type: "array", items: relationItem },
      },
      required: ["user_id", "relations"],
      additionalProperties: false,
    },
  },
  {
    name: "read_graph",
    description: "Read the user's entire knowledge graph.",
    inputSchema: {
      type: "object",
      properties: { user_id: userIdProperty },
      required: ["user_id"],
      additionalProperties: false,
    },
  },
  {
    name: "search_nodes",
    description: "Case-insensitive search over entity names, types, and observations.",
    inputSchema: {
      type: "object",
      properties: {
        user_id: userIdProperty,
        query: { type: "string", description: "Substring to look for" },
      },
      required: ["user_id", "query"],
      additionalProperties: false,
    },
  },
  {
    name: "open_nodes",
    description: "Fetch entities by name. Names that do not exist are skipped.",
    inputSchema: {
      type: "object",
      properties: {
        user_id: userIdProperty,
        names: { type: "array", items: { type: "string" }, description: "Entity names to retrieve" },
      },
      required: ["user_id", "names"],
      additionalProperties: false,
    },
  },
  {
    name: "list_users",
    description: "List users that have a stored knowledge graph.",
    inputSchema: {
      type: "object",
      properties: {},
      additionalProperties: false,
    },
  },
  {
    name: "delete_user_graph",
    description: "Delete a user's entire knowledge graph.",
    inputSchema: {
      type: "object",
      properties: { user_id: userIdProperty },
      required: ["user_id"],
      additionalProperties: false,
    },
  },
];
