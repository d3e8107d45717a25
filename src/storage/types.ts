/**
 * Core types for clinical records held in the store.
 */

/**
 * A decoded clinical note. Immutable once ingested.
 */
export interface StoredDocument {
  /** External id, e.g. the FHIR resource id */
  id: string;
  patientId: string | null;
  resourceType: string;
  /** ISO-8601 date of the note, when known */
  documentDate: string | null;
  text: string;
  metadata: Record<string, unknown>;
  createdAt: string;
}

/**
 * Input for inserting a document.
 */
export interface DocumentInput {
  id: string;
  text: string;
  patientId?: string | null;
  resourceType?: string;
  documentDate?: string | null;
  metadata?: Record<string, unknown>;
  embedding?: number[];
  embeddingModel?: string;
}

export const ENTITY_TYPES = [
  'SYMPTOM',
  'CONDITION',
  'MEDICATION',
  'PROCEDURE',
  'ANATOMY',
  'OBSERVATION',
  'TEMPORAL',
] as const;

export type EntityType = (typeof ENTITY_TYPES)[number];

export function isEntityType(value: string): value is EntityType {
  return ENTITY_TYPES.some((t) => t === value);
}

/**
 * A clinical concept extracted from a document.
 */
export interface Entity {
  id: string;
  text: string;
  type: EntityType;
  /** Extraction confidence in [0, 1] */
  confidence: number;
  sourceDocumentId: string | null;
}

/**
 * A typed, directed edge between two entities. Self-loops are allowed.
 */
export interface Relationship {
  id: number;
  sourceEntityId: string;
  targetEntityId: string;
  relationType: string;
  /** Null when the extractor gave no confidence */
  confidence: number | null;
}

export interface RelationshipInput {
  sourceEntityId: string;
  targetEntityId: string;
  relationType: string;
  confidence?: number | null;
  sourceDocumentId?: string | null;
}

/**
 * A medical image with its multimodal embedding.
 */
export interface ImageRecord {
  id: string;
  subjectId: string;
  studyId: string | null;
  viewPosition: string | null;
  imagePath: string | null;
  /** Link to the patient of a Document, when known */
  patientId: string | null;
  documentId: string | null;
}

export interface ImageInput {
  id: string;
  subjectId: string;
  studyId?: string | null;
  viewPosition?: string | null;
  imagePath?: string | null;
  patientId?: string | null;
  documentId?: string | null;
  embedding?: number[] | null;
  embeddingModel?: string;
}

export const MEMORY_KINDS = ['correction', 'preference', 'fact'] as const;

export type MemoryKind = (typeof MEMORY_KINDS)[number];

export function isMemoryKind(value: string): value is MemoryKind {
  return MEMORY_KINDS.some((k) => k === value);
}

/**
 * A remembered correction, preference or fact.
 */
export interface MemoryRecord {
  id: string;
  content: string;
  kind: MemoryKind;
  metadata: Record<string, unknown>;
  useCount: number;
  createdAt: string;
  updatedAt: string;
  lastUsedAt: string | null;
}

/**
 * Parse a JSON metadata column, tolerating NULL and malformed text.
 */
export function parseMetadata(raw: string | null): Record<string, unknown> {
  if (!raw) return {};
  try {
    const parsed: unknown = JSON.parse(raw);
    if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
      return Object.fromEntries(Object.entries(parsed));
    }
    return {};
  } catch {
    return {};
  }
}
