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

export type MemoryErrorCode = 'VALIDATION' | 'NOT_FOUND' | 'PERSISTENCE' | 'CONFLICT';

export abstract class MemoryError extends Error {
  abstract readonly code: MemoryErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Missing or malformed arguments: empty message, bad user_id, empty observation text. */
export class ValidationError extends MemoryError {
  readonly code = 'VALIDATION';
}

/** An operation that requires its target to exist found nothing. */
export class NotFoundError extends MemoryError {
  readonly code = 'NOT_FOUND';
}

/** Backing file unreadable or unwritable, lock timeout, or a corrupt document on load. */
export class PersistenceError extends MemoryError {
  readonly code = 'PERSISTENCE';
}

// Reserved for optimistic concurrency; the single-lock store never raises it.
export class ConflictError extends MemoryError {
  readonly code = 'CONFLICT';
}

export function isMemoryError(error: unknown): error is MemoryError {
  return error instanceof MemoryError;
}
