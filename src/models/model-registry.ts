/**
 * Embedding models reachable through an OpenAI-compatible endpoint.
 */

export type Modality = 'text' | 'multimodal';

export interface ModelConfig {
  /** Short identifier used in config and stored beside vectors */
  id: string;
  /** Model name sent to the endpoint */
  providerModel: string;
  /** Embedding dimensions */
  dims: number;
  modality: Modality;
  /** Endpoint expects input_type query/passage (asymmetric retrieval models) */
  usesInputType: boolean;
  notes: string;
}

export const MODEL_REGISTRY: Record<string, ModelConfig> = {
  'nv-embedqa-e5-v5': {
    id: 'nv-embedqa-e5-v5',
    providerModel: 'nvidia/nv-embedqa-e5-v5',
    dims: 1024,
    modality: 'text',
    usesInputType: true,
    notes: 'Asymmetric QA retrieval model. Clinical notes, queries and memories.',
  },
  nvclip: {
    id: 'nvclip',
    providerModel: 'nvidia/nvclip',
    dims: 1024,
    modality: 'multimodal',
    usesInputType: false,
    notes: 'CLIP-style text/image space for radiograph search.',
  },
  'text-embedding-3-small': {
    id: 'text-embedding-3-small',
    providerModel: 'text-embedding-3-small',
    dims: 1536,
    modality: 'text',
    usesInputType: false,
    notes: 'OpenAI hosted alternative for text.',
  },
};

export function getModel(id: string): ModelConfig {
  const config = MODEL_REGISTRY[id];
  if (!config) {
    throw new Error(`Unknown model: ${id}. Available: ${Object.keys(MODEL_REGISTRY).join(', ')}`);
  }
  return config;
}

export function getAllModelIds(): string[] {
  return Object.keys(MODEL_REGISTRY);
}
