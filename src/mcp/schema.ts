/**
 * Zod validators for tool inputs.
 *
 * These check shape and types only. Ranges that depend on configuration
 * (hop caps, limits) are checked by the retrieval operations themselves.
 */

import { z } from 'zod';
import { MEMORY_KINDS } from '../storage/types.js';

const optionalText = z.string().optional();
const limit = z.number().int().optional().describe('Maximum results');

export const SearchDocumentsInputSchema = z
  .object({
    query: z.string(),
    patient_id: optionalText,
    date_from: optionalText,
    date_to: optionalText,
    limit,
  })
  .strict();

export const GetDocumentDetailsInputSchema = z.object({ document_id: z.string() }).strict();

export const SearchKnowledgeGraphInputSchema = z
  .object({
    query: optionalText,
    entity_id: optionalText,
    max_hops: z.number().int().optional(),
    limit,
  })
  .strict();

export const GetEntityRelationshipsInputSchema = z
  .object({
    entity_id: z.string(),
    max_hops: z.number().int().optional(),
  })
  .strict();

export const EmptyInputSchema = z.object({}).strict();

export const SearchImagesInputSchema = z
  .object({
    query: optionalText,
    embedding: z.array(z.number()).optional(),
    patient_id: optionalText,
    subject_id: optionalText,
    view_position: optionalText,
    min_similarity: z.number().optional(),
    limit,
  })
  .strict();

export const HybridSearchInputSchema = z
  .object({
    query: z.string(),
    patient_id: optionalText,
    include_images: z.boolean().optional(),
    limit,
  })
  .strict();

export const MemoryKindSchema = z.enum(MEMORY_KINDS);

export const RememberInputSchema = z
  .object({
    content: z.string(),
    kind: MemoryKindSchema,
    metadata: z.record(z.unknown()).optional(),
  })
  .strict();

export const RecallInputSchema = z
  .object({
    query: z.string(),
    limit,
    kind: MemoryKindSchema.optional(),
  })
  .strict();

export const ForgetInputSchema = z.object({ memory_id: z.string() }).strict();

/**
 * Render zod issues as "path: message" lines.
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}
