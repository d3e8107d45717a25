/**
 * FHIR DocumentReference → stored document.
 *
 * Notes arrive as `content[0].attachment.data`. Payloads exported from the
 * clinical data platform are hex-encoded UTF-8; standard FHIR payloads are
 * base64. A string that is valid hex is read as hex.
 */

import { z } from 'zod';
import type { DocumentInput } from '../storage/types.js';
import { IngestionError } from '../utils/errors.js';

const AttachmentSchema = z
  .object({
    contentType: z.string().optional(),
    data: z.string().optional(),
    title: z.string().optional(),
  })
  .passthrough();

export const DocumentReferenceSchema = z
  .object({
    resourceType: z.literal('DocumentReference'),
    id: z.string().min(1),
    status: z.string().optional(),
    date: z.string().optional(),
    subject: z.object({ reference: z.string().optional() }).passthrough().optional(),
    type: z.object({ text: z.string().optional() }).passthrough().optional(),
    context: z
      .object({
        period: z.object({ start: z.string().optional() }).passthrough().optional(),
      })
      .passthrough()
      .optional(),
    content: z.array(z.object({ attachment: AttachmentSchema }).passthrough()).min(1),
  })
  .passthrough();

export type DocumentReference = z.infer<typeof DocumentReferenceSchema>;

const HEX = /^(?:[0-9a-fA-F]{2})+$/;
const BASE64 = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

export type PayloadEncoding = 'hex' | 'base64';

export function detectEncoding(data: string): PayloadEncoding | null {
  const compact = data.replace(/\s+/g, '');
  if (compact === '') return null;
  if (HEX.test(compact)) return 'hex';
  if (BASE64.test(compact)) return 'base64';
  return null;
}

/**
 * Decode an attachment payload to text. Invalid UTF-8 sequences become
 * U+FFFD.
 */
export function decodeAttachmentData(data: string): string {
  const encoding = detectEncoding(data);
  if (!encoding) {
    throw new IngestionError('Attachment data is neither hex nor base64', 'PAYLOAD_DECODE_FAILED');
  }
  return Buffer.from(data.replace(/\s+/g, ''), encoding).toString('utf8');
}

/**
 * "Patient/p1000" → "p1000". Other reference forms are kept whole.
 */
export function patientIdFromReference(reference: string | undefined): string | null {
  if (!reference) return null;
  const match = /^(?:.*\/)?Patient\/([^/]+)$/.exec(reference.trim());
  return match ? match[1] : reference.trim() || null;
}

/**
 * Build a document from a DocumentReference. Throws IngestionError when the
 * resource is malformed or carries no decodable text.
 */
export function documentFromResource(resource: unknown): DocumentInput {
  const parsed = DocumentReferenceSchema.safeParse(resource);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new IngestionError(
      `Not a usable DocumentReference: ${issue.path.join('.') || '(root)'} ${issue.message}`,
      'RESOURCE_INVALID',
    );
  }
  const ref = parsed.data;
  const attachment = ref.content[0].attachment;
  if (!attachment.data) {
    throw new IngestionError(`DocumentReference ${ref.id} has no attachment data`, 'RESOURCE_INVALID');
  }

  const text = decodeAttachmentData(attachment.data).trim();
  if (!text) {
    throw new IngestionError(`DocumentReference ${ref.id} decodes to empty text`, 'RESOURCE_INVALID');
  }

  const metadata: Record<string, unknown> = {
    source: 'FHIR',
    encoding: detectEncoding(attachment.data),
  };
  if (attachment.contentType) metadata.contentType = attachment.contentType;
  if (ref.type?.text) metadata.documentType = ref.type.text;
  if (ref.status) metadata.status = ref.status;

  return {
    id: ref.id,
    text,
    patientId: patientIdFromReference(ref.subject?.reference),
    resourceType: 'DocumentReference',
    documentDate: ref.date ?? ref.context?.period?.start ?? null,
    metadata,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function tryParseJson(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch {
    return { ok: false };
  }
}

/**
 * Resources in a file's text: a Bundle, a JSON array, a single resource, or
 * NDJSON (one resource per line).
 */
export function parseResources(content: string): unknown[] {
  const trimmed = content.trim();
  if (trimmed === '') return [];

  const whole = tryParseJson(trimmed);
  if (whole.ok) {
    const value = whole.value;
    if (Array.isArray(value)) return value;
    if (isRecord(value) && value.resourceType === 'Bundle') {
      const entries = Array.isArray(value.entry) ? value.entry : [];
      return entries.flatMap((entry: unknown) =>
        isRecord(entry) && entry.resource !== undefined ? [entry.resource] : [],
      );
    }
    return [value];
  }

  return trimmed
    .split(/\r?\n/)
    .filter((line) => line.trim() !== '')
    .map((line, i) => {
      const parsed = tryParseJson(line);
      if (!parsed.ok) {
        throw new IngestionError(`Record ${i + 1} is not valid JSON`, 'RESOURCE_INVALID');
      }
      return parsed.value;
    });
}

export function isDocumentReference(resource: unknown): boolean {
  return isRecord(resource) && resource.resourceType === 'DocumentReference';
}
