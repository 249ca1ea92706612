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

import { z } from 'zod';
import { RECOMMENDATION_TYPES } from '../types/graph.js';

const userId = z.string({ required_error: 'user_id is required' }).trim().min(1, 'user_id cannot be empty');
const name = z.string().trim().min(1, 'name cannot be empty');
const text = z.string().refine(s => s.trim() !== '', 'observation text cannot be empty');

const relation = z.object({
  from: name,
  type: z.string().trim().min(1, 'relation type cannot be empty'),
  to: name,
});

export const processUserMessageArgs = z.object({
  user_id: userId,
  message: z.string({ required_error: 'message is required' }).refine(s => s.trim() !== '', 'message cannot be empty'),
});

export const getJobRecommendationsArgs = z.object({
  user_id: userId,
  recommendation_type: z.enum(RECOMMENDATION_TYPES).default('general'),
});

export const createEntitiesArgs = z.object({
  user_id: userId,
  entities: z
    .array(
      z.object({
        name,
        type: z.string().trim().min(1, 'entity type cannot be empty'),
        observations: z.array(text).default([]),
      })
    )
    .min(1, 'entities cannot be empty'),
});

export const createRelationsArgs = z.object({
  user_id: userId,
  relations: z.array(relation).min(1, 'relations cannot be empty'),
});

export const addObservationsArgs = z.object({
  user_id: userId,
  name,
  observations: z.array(text).min(1, 'observations cannot be empty'),
});

export const readGraphArgs = z.object({
  user_id: userId,
});

export const searchNodesArgs = z.object({
  user_id: userId,
  query: z.string().trim().min(1, 'query cannot be empty'),
});

export const openNodesArgs = z.object({
  user_id: userId,
  names: z.array(z.string()),
});

export const deleteEntitiesArgs = z.object({
  user_id: userId,
  names: z.array(name).min(1, 'names cannot be empty'),
});

export const deleteObservationsArgs = z.object({
  user_id: userId,
  name,
  observations: z.array(z.string()).min(1, 'observations cannot be empty'),
});

export const deleteRelationsArgs = z.object({
  user_id: userId,
  relations: z.array(relation).min(1, 'relations cannot be empty'),
});

export const listUsersArgs = z.object({});

export const deleteUserGraphArgs = z.object({
  user_id: userId,
});
