/**
 * Loading clinical data into the store: FHIR notes, knowledge graph exports
 * and image manifests.
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import {
  getDocumentsWithoutEmbedding,
  insertDocuments,
  setDocumentEmbedding,
} from '../storage/document-store.js';
import { createGraphTables, insertGraph } from '../storage/graph-store.js';
import { createImageTables, insertImages } from '../storage/image-store.js';
import { ENTITY_TYPES, type DocumentInput } from '../storage/types.js';
import { callStore } from '../storage/store-call.js';
import type { EmbeddingProvider } from '../models/embedding-provider.js';
import { CapabilityUnavailableError, IngestionError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { documentFromResource, isDocumentReference, parseResources } from './fhir-document.js';

const log = createLogger('ingest');

export const DEFAULT_EMBED_BATCH_SIZE = 32;

async function readText(path: string): Promise<string> {
  try {
    return await readFile(path, 'utf-8');
  } catch (error) {
    throw new IngestionError(`Cannot read ${path}: ${errorMessage(error)}`, 'FILE_READ_FAILED', error);
  }
}

export interface InvalidResource {
  /** 0-based position among the file's resources */
  index: number;
  reason: string;
}

export interface DocumentIngestResult {
  /** Resources found in the file */
  resources: number;
  /** DocumentReferences that decoded to text */
  documents: number;
  inserted: number;
  /** Already present (documents are immutable) */
  duplicates: number;
  /** Non-DocumentReference resources */
  skipped: number;
  invalid: InvalidResource[];
}

/**
 * Convert resources to documents without touching the store.
 */
export function collectDocuments(resources: unknown[]): {
  documents: DocumentInput[];
  skipped: number;
  invalid: InvalidResource[];
} {
  const documents: DocumentInput[] = [];
  const invalid: InvalidResource[] = [];
  let skipped = 0;

  resources.forEach((resource, index) => {
    if (!isDocumentReference(resource)) {
      skipped++;
      return;
    }
    try {
      documents.push(documentFromResource(resource));
    } catch (error) {
      if (!(error instanceof IngestionError)) throw error;
      invalid.push({ index, reason: error.message });
    }
  });

  return { documents, skipped, invalid };
}

export async function ingestFhirFile(path: string): Promise<DocumentIngestResult> {
  const resources = parseResources(await readText(path));
  const { documents, skipped, invalid } = collectDocuments(resources);

  const inserted = await callStore('document insert', 'DOCUMENT_WRITE_FAILED', () =>
    insertDocuments(documents),
  );

  if (invalid.length > 0) {
    log.warn('Some resources could not be ingested', { path, invalid: invalid.length });
  }
  log.info('Documents ingested', { path, inserted, duplicates: documents.length - inserted });

  return {
    resources: resources.length,
    documents: documents.length,
    inserted,
    duplicates: documents.length - inserted,
    skipped,
    invalid,
  };
}

export interface EmbedResult {
  embedded: number;
  /** Set when embedding stopped early */
  stoppedReason?: string;
}

/**
 * Embed every document that has no vector yet, in batches.
 */
export async function embedPendingDocuments(
  embedder: EmbeddingProvider,
  batchSize: number = DEFAULT_EMBED_BATCH_SIZE,
  onProgress?: (embedded: number) => void,
): Promise<EmbedResult> {
  let embedded = 0;

  for (;;) {
    const batch = await callStore('pending documents', 'DOCUMENT_QUERY_FAILED', () =>
      getDocumentsWithoutEmbedding(batchSize),
    );
    if (batch.length === 0) return { embedded };

    let vectors: number[][];
    try {
      vectors = await embedder.embedBatch(
        batch.map((d) => d.text),
        'passage',
      );
    } catch (error) {
      if (!(error instanceof CapabilityUnavailableError)) throw error;
      log.warn('Embedding stopped', { embedded, error: error.message });
      return { embedded, stoppedReason: error.message };
    }

    const updated = await callStore('document embedding', 'DOCUMENT_WRITE_FAILED', () =>
      batch.filter((doc, i) => setDocumentEmbedding(doc.id, vectors[i], embedder.modelId)).length,
    );
    if (updated === 0) {
      return { embedded, stoppedReason: 'no documents could be updated' };
    }
    embedded += updated;
    onProgress?.(embedded);
  }
}

const GraphFileSchema = z.object({
  entities: z.array(
    z.object({
      id: z.string().min(1),
      text: z.string().min(1),
      type: z.enum(ENTITY_TYPES),
      confidence: z.number().min(0).max(1).optional(),
      source_document_id: z.string().nullable().optional(),
    }),
  ),
  relationships: z
    .array(
      z.object({
        source_entity_id: z.string().min(1),
        target_entity_id: z.string().min(1),
        relation_type: z.string().min(1),
        confidence: z.number().min(0).max(1).nullable().optional(),
        source_document_id: z.string().nullable().optional(),
      }),
    )
    .default([]),
});

export type GraphFile = z.infer<typeof GraphFileSchema>;

function parseJsonFile<S extends z.ZodTypeAny>(schema: S, text: string, path: string): z.output<S> {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new IngestionError(`${path} is not valid JSON`, 'RESOURCE_INVALID', error);
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new IngestionError(
      `${path}: ${issue.path.join('.') || '(root)'} ${issue.message}`,
      'RESOURCE_INVALID',
    );
  }
  return parsed.data;
}

/**
 * Load an extracted knowledge graph (entities and relationships), creating
 * the graph tables if needed.
 */
export async function importGraphFile(
  path: string,
): Promise<{ entities: number; relationships: number }> {
  const graph: GraphFile = parseJsonFile(GraphFileSchema, await readText(path), path);

  await callStore('graph import', 'GRAPH_WRITE_FAILED', () => {
    createGraphTables();
    insertGraph(
      graph.entities.map((e) => ({
        id: e.id,
        text: e.text,
        type: e.type,
        confidence: e.confidence ?? 1,
        sourceDocumentId: e.source_document_id ?? null,
      })),
      graph.relationships.map((r) => ({
        sourceEntityId: r.source_entity_id,
        targetEntityId: r.target_entity_id,
        relationType: r.relation_type,
        confidence: r.confidence ?? null,
        sourceDocumentId: r.source_document_id ?? null,
      })),
    );
  });

  log.info('Graph imported', { entities: graph.entities.length, relationships: graph.relationships.length });
  return { entities: graph.entities.length, relationships: graph.relationships.length };
}

const ImageFileSchema = z.array(
  z.object({
    id: z.string().min(1),
    subject_id: z.string().min(1),
    study_id: z.string().nullable().optional(),
    view_position: z.string().nullable().optional(),
    image_path: z.string().nullable().optional(),
    patient_id: z.string().nullable().optional(),
    document_id: z.string().nullable().optional(),
    embedding: z.array(z.number()).nullable().optional(),
  }),
);

export type ImageFile = z.infer<typeof ImageFileSchema>;

/**
 * Load image records with precomputed embeddings from `embeddingModel`,
 * creating the image table if needed.
 */
export async function importImageFile(path: string, embeddingModel: string): Promise<{ images: number }> {
  const images: ImageFile = parseJsonFile(ImageFileSchema, await readText(path), path);

  await callStore('image import', 'IMAGE_WRITE_FAILED', () => {
    createImageTables();
    insertImages(
      images.map((img) => ({
        id: img.id,
        subjectId: img.subject_id,
        studyId: img.study_id ?? null,
        viewPosition: img.view_position ?? null,
        imagePath: img.image_path ?? null,
        patientId: img.patient_id ?? null,
        documentId: img.document_id ?? null,
        embedding: img.embedding ?? null,
        embeddingModel,
      })),
    );
  });

  log.info('Images imported', { images: images.length });
  return { images: images.length };
}
