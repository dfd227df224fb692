/**
 * Basecamp Wire Schemas
 *
 * Zod schemas for the JSON payloads returned by the Basecamp v1 API.
 * Listing payloads are validated by the client; detail records are validated
 * one at a time by the document builder so a single bad record cannot sink
 * its siblings.
 */

import { z } from 'zod';
import { MalformedRecordError } from '../types/errors.js';

/**
 * Basecamp identifiers are numeric, but nothing here depends on that
 */
export const basecampIdSchema = z.union([z.number(), z.string().min(1)]);

export const projectRefSchema = z
  .object({
    id: basecampIdSchema,
    name: z.string(),
  })
  .passthrough();

export const projectListSchema = z.array(projectRefSchema);

/**
 * Listing entry; `url` locates the full record
 */
export const taskItemSummarySchema = z
  .object({
    id: basecampIdSchema,
    url: z.string().min(1),
  })
  .passthrough();

export const taskItemSummaryPageSchema = z.array(taskItemSummarySchema);

export const creatorSchema = z
  .object({
    name: z.string().min(1),
    avatar_url: z.string().nullish(),
  })
  .passthrough();

export const commentSchema = z
  .object({
    id: basecampIdSchema,
    creator: creatorSchema,
    content: z.string().nullish(),
    updated_at: z.string().min(1),
  })
  .passthrough();

export const taskItemDetailSchema = z
  .object({
    id: basecampIdSchema,
    creator: creatorSchema,
    content: z.string().nullish(),
    app_url: z.string().min(1),
    updated_at: z.string().min(1),
    comments: z.array(commentSchema).nullish(),
  })
  .passthrough();

export type ProjectRef = z.infer<typeof projectRefSchema>;
export type RawTaskItemSummary = z.infer<typeof taskItemSummarySchema>;
/**
 * Detail record as received; validated by the document builder
 */
export type RawTaskItemDetail = unknown;
export type RawComment = z.infer<typeof commentSchema>;

const recordIdSchema = z.object({ id: basecampIdSchema }).passthrough();

/**
 * Identifier of a raw record, or null when it has none
 */
export function rawRecordId(payload: unknown): string | null {
  const result = recordIdSchema.safeParse(payload);
  return result.success ? String(result.data.id) : null;
}

/**
 * Parse `payload` with `schema`, converting zod failures into MalformedRecordError
 *
 * @param label - What is being parsed, used in the error message
 * @throws {MalformedRecordError} If validation fails
 */
export function parseRecord<S extends z.ZodTypeAny>(
  schema: S,
  payload: unknown,
  label: string,
  context?: Record<string, unknown>
): z.infer<S> {
  const result = schema.safeParse(payload);
  if (result.success) {
    return result.data;
  }
  const issues = result.error.issues;
  const message = issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
  throw new MalformedRecordError(`${label} validation failed: ${message}`, {
    ...context,
    field: issues[0]?.path.join('.') || 'unknown',
    issues: issues.map(i => ({ path: i.path.join('.'), code: i.code, message: i.message })),
  });
}
