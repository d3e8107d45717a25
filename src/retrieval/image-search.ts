/**
 * Image search by text (through the multimodal model) or by a supplied
 * embedding.
 */

import { IMAGE_VECTORS, VectorStore } from '../storage/vector-store.js';
import { getImagesByIds, hasImageTables } from '../storage/image-store.js';
import { callStore } from '../storage/store-call.js';
import { CapabilityUnavailableError, InvalidInputError } from '../utils/errors.js';
import { isDegenerate } from '../utils/vector-math.js';
import type { RetrievalServices } from './services.js';
import { checkIntRange, checkNumberRange, requireText } from './validation.js';

export const DEFAULT_IMAGE_LIMIT = 10;
export const MAX_IMAGE_LIMIT = 50;

export type ConfidenceLevel = 'strong' | 'moderate' | 'weak';

export function confidenceLevel(similarity: number): ConfidenceLevel {
  if (similarity >= 0.7) return 'strong';
  if (similarity >= 0.5) return 'moderate';
  return 'weak';
}

export interface ImageSearchRequest {
  query?: string;
  embedding?: number[];
  subjectId?: string;
  patientId?: string;
  viewPosition?: string;
  minSimilarity?: number;
  limit?: number;
}

export interface ImageHit {
  imageId: string;
  subjectId: string;
  studyId: string | null;
  viewPosition: string | null;
  imagePath: string | null;
  patientId: string | null;
  documentId: string | null;
  similarity: number;
  confidenceLevel: ConfidenceLevel;
}

export interface ImageSearchResult {
  images: ImageHit[];
  queryMode: 'text' | 'embedding';
  embeddingModel: string;
}

function optional(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export async function searchImages(
  services: RetrievalServices,
  request: ImageSearchRequest,
): Promise<ImageSearchResult> {
  const hasQuery = request.query !== undefined && request.query.trim() !== '';
  const hasEmbedding = request.embedding !== undefined;
  if (hasQuery === hasEmbedding) {
    throw new InvalidInputError('Provide exactly one of query or embedding', 'query');
  }
  const minSimilarity = checkNumberRange(
    request.minSimilarity ?? services.config.images.minSimilarity,
    -1,
    1,
    'min_similarity',
  );
  const limit = checkIntRange(request.limit ?? DEFAULT_IMAGE_LIMIT, 1, MAX_IMAGE_LIMIT, 'limit');

  const embedder = services.imageEmbedder;
  const modelId = embedder?.modelId ?? services.config.embedding.imageModel;

  if (request.embedding !== undefined) {
    const expected = embedder?.dims;
    if (expected !== undefined && request.embedding.length !== expected) {
      throw new InvalidInputError(
        `embedding must have ${expected} dimensions, got ${request.embedding.length}`,
        'embedding',
      );
    }
    if (isDegenerate(request.embedding)) {
      throw new InvalidInputError('embedding is degenerate (zero or non-finite)', 'embedding');
    }
  }

  const available = await callStore('image table check', 'IMAGE_QUERY_FAILED', () =>
    hasImageTables(),
  );
  if (!available) {
    throw new CapabilityUnavailableError('image_store', 'No image store has been provisioned');
  }

  let vector: number[];
  if (request.embedding !== undefined) {
    vector = request.embedding;
  } else {
    const query = requireText(request.query, 'query');
    if (!embedder) {
      throw new CapabilityUnavailableError('image_embedding', 'No image embedding provider configured');
    }
    vector = await embedder.embed(query, 'query');
  }

  const store = new VectorStore(IMAGE_VECTORS);
  return callStore('image search', 'IMAGE_QUERY_FAILED', () => {
    const hits = store.search(vector, {
      limit,
      minSimilarity,
      filters: {
        subject_id: optional(request.subjectId),
        patient_id: optional(request.patientId),
        view_position: optional(request.viewPosition),
        embedding_model: modelId,
      },
    });
    const records = new Map(getImagesByIds(hits.map((h) => h.id)).map((r) => [r.id, r]));

    const images = hits.flatMap((hit): ImageHit[] => {
      const record = records.get(hit.id);
      if (!record) return [];
      return [
        {
          imageId: record.id,
          subjectId: record.subjectId,
          studyId: record.studyId,
          viewPosition: record.viewPosition,
          imagePath: record.imagePath,
          patientId: record.patientId,
          documentId: record.documentId,
          similarity: hit.similarity,
          confidenceLevel: confidenceLevel(hit.similarity),
        },
      ];
    });

    return {
      images,
      queryMode: request.embedding !== undefined ? 'embedding' : 'text',
      embeddingModel: modelId,
    };
  });
}
