/**
 * Tool catalog shared by the MCP server and the agent loop.
 *
 * Every handler resolves to a ToolResult and never throws: capability gaps
 * become `capability_unavailable`, everything else `error` with a code.
 */

import type { z } from 'zod';
import type { RetrievalServices } from '../retrieval/services.js';
import { getDocumentDetails, searchDocuments } from '../retrieval/document-search.js';
import {
  getEntityRelationships,
  getEntityStatistics,
  searchKnowledgeGraph,
} from '../retrieval/graph-search.js';
import { searchImages } from '../retrieval/image-search.js';
import { hybridSearch } from '../retrieval/hybrid-search.js';
import { forget, getMemoryStats, recall, remember } from '../retrieval/memory.js';
import {
  CapabilityUnavailableError,
  GraphRagError,
  InvalidInputError,
  StoreUnavailableError,
  errorMessage,
  type Capability,
} from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { MEMORY_KINDS } from '../storage/types.js';
import {
  EmptyInputSchema,
  ForgetInputSchema,
  GetDocumentDetailsInputSchema,
  GetEntityRelationshipsInputSchema,
  HybridSearchInputSchema,
  RecallInputSchema,
  RememberInputSchema,
  SearchDocumentsInputSchema,
  SearchImagesInputSchema,
  SearchKnowledgeGraphInputSchema,
  formatIssues,
} from './schema.js';

const log = createLogger('tools');

export type ToolStatus = 'ok' | 'capability_unavailable' | 'error';

export interface ToolError {
  code: string;
  message: string;
  field?: string;
  issues?: string[];
}

export type ToolResult =
  | { status: 'ok'; data: unknown }
  | {
      status: 'capability_unavailable';
      /** Absent when the tool timed out */
      capability?: Capability;
      message: string;
    }
  | { status: 'error'; error: ToolError };

interface JsonSchemaProperty {
  type: string;
  description: string;
  enum?: readonly string[];
  items?: { type: string };
}

/**
 * Tool definition for MCP.
 */
export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: {
    type: 'object';
    properties: Record<string, JsonSchemaProperty>;
    required: string[];
  };
  handler: (args: unknown) => Promise<ToolResult>;
}

/**
 * Map a thrown error onto a tool result.
 */
export function toToolResult(error: unknown): ToolResult {
  if (error instanceof CapabilityUnavailableError) {
    return { status: 'capability_unavailable', capability: error.capability, message: error.message };
  }
  if (error instanceof InvalidInputError) {
    const detail: ToolError = { code: 'INVALID_INPUT', message: error.message };
    if (error.field) detail.field = error.field;
    return { status: 'error', error: detail };
  }
  if (error instanceof StoreUnavailableError) {
    return { status: 'error', error: { code: 'STORE_UNAVAILABLE', message: error.message } };
  }
  if (error instanceof GraphRagError) {
    return { status: 'error', error: { code: error.code, message: error.message } };
  }
  return { status: 'error', error: { code: 'INTERNAL_ERROR', message: errorMessage(error) } };
}

interface ToolSpec<S extends z.ZodTypeAny> {
  name: string;
  description: string;
  properties: Record<string, JsonSchemaProperty>;
  required?: string[];
  schema: S;
  run: (input: z.output<S>) => Promise<unknown>;
}

function defineTool<S extends z.ZodTypeAny>(spec: ToolSpec<S>): ToolDefinition {
  return {
    name: spec.name,
    description: spec.description,
    inputSchema: { type: 'object', properties: spec.properties, required: spec.required ?? [] },
    handler: async (args) => {
      const parsed = spec.schema.safeParse(args ?? {});
      if (!parsed.success) {
        return {
          status: 'error',
          error: {
            code: 'INVALID_INPUT',
            message: `Invalid arguments for ${spec.name}`,
            issues: formatIssues(parsed.error),
          },
        };
      }
      try {
        const data: unknown = await spec.run(parsed.data);
        return { status: 'ok', data };
      } catch (error) {
        const result = toToolResult(error);
        if (result.status === 'error' && result.error.code === 'INTERNAL_ERROR') {
          log.error('Tool failed', { tool: spec.name, error: errorMessage(error) });
        }
        return result;
      }
    },
  };
}

/**
 * Build the catalog bound to one set of services.
 */
export function createTools(services: RetrievalServices): ToolDefinition[] {
  return [
    defineTool({
      name: 'search_documents',
      description:
        'Search clinical notes by text. Combines keyword and semantic ranking; falls back to keyword order when embeddings are unavailable.',
      properties: {
        query: { type: 'string', description: 'Free-text clinical query' },
        patient_id: { type: 'string', description: 'Restrict to one patient' },
        date_from: { type: 'string', description: 'Earliest note date, YYYY-MM-DD (inclusive)' },
        date_to: { type: 'string', description: 'Latest note date, YYYY-MM-DD (inclusive)' },
        limit: { type: 'integer', description: 'Maximum documents (1-50, default 10)' },
      },
      required: ['query'],
      schema: SearchDocumentsInputSchema,
      run: (input) =>
        searchDocuments(services, {
          query: input.query,
          patientId: input.patient_id,
          dateFrom: input.date_from,
          dateTo: input.date_to,
          limit: input.limit,
        }),
    }),

    defineTool({
      name: 'get_document_details',
      description: 'Full text and metadata of one clinical note.',
      properties: { document_id: { type: 'string', description: 'Document id' } },
      required: ['document_id'],
      schema: GetDocumentDetailsInputSchema,
      run: async (input) => {
        const document = await getDocumentDetails(input.document_id);
        return { found: document !== null, document };
      },
    }),

    defineTool({
      name: 'search_knowledge_graph',
      description:
        'Find clinical entities matching a term (or starting from an entity id) and expand through related entities up to max_hops. Returns ranked entities with paths and the documents they came from.',
      properties: {
        query: { type: 'string', description: 'Clinical term to seed from' },
        entity_id: { type: 'string', description: 'Entity id to seed from (instead of query)' },
        max_hops: { type: 'integer', description: 'Traversal depth (0-3, default 2)' },
        limit: { type: 'integer', description: 'Maximum entities (1-100, default 20)' },
      },
      schema: SearchKnowledgeGraphInputSchema,
      run: (input) =>
        searchKnowledgeGraph(services, {
          seedTerm: input.query,
          seedEntityId: input.entity_id,
          maxHops: input.max_hops,
          limit: input.limit,
        }),
    }),

    defineTool({
      name: 'get_entity_relationships',
      description: 'Entities connected to one entity, with the relationships between them.',
      properties: {
        entity_id: { type: 'string', description: 'Entity id' },
        max_hops: { type: 'integer', description: 'Traversal depth (default 1)' },
      },
      required: ['entity_id'],
      schema: GetEntityRelationshipsInputSchema,
      run: (input) => getEntityRelationships(services, input.entity_id, input.max_hops),
    }),

    defineTool({
      name: 'get_entity_statistics',
      description: 'Knowledge graph totals by entity type, confidence bucket and relation type.',
      properties: {},
      schema: EmptyInputSchema,
      run: () => getEntityStatistics(),
    }),

    defineTool({
      name: 'search_images',
      description:
        'Find medical images similar to a text description or an embedding vector, optionally filtered by subject, patient or view position.',
      properties: {
        query: { type: 'string', description: 'Text description of the finding' },
        embedding: {
          type: 'array',
          items: { type: 'number' },
          description: 'Query vector (instead of query)',
        },
        patient_id: { type: 'string', description: 'Restrict to one patient' },
        subject_id: { type: 'string', description: 'Restrict to one imaging subject' },
        view_position: { type: 'string', description: 'View position, e.g. PA or AP' },
        min_similarity: { type: 'number', description: 'Cosine similarity floor (-1 to 1)' },
        limit: { type: 'integer', description: 'Maximum images (1-50, default 10)' },
      },
      schema: SearchImagesInputSchema,
      run: (input) =>
        searchImages(services, {
          query: input.query,
          embedding: input.embedding,
          patientId: input.patient_id,
          subjectId: input.subject_id,
          viewPosition: input.view_position,
          minSimilarity: input.min_similarity,
          limit: input.limit,
        }),
    }),

    defineTool({
      name: 'hybrid_search',
      description:
        'Search documents, the knowledge graph and optionally images at once, fusing their rankings. Reports which sources were available.',
      properties: {
        query: { type: 'string', description: 'Free-text clinical query' },
        patient_id: { type: 'string', description: 'Restrict to one patient' },
        include_images: { type: 'boolean', description: 'Also search images (default false)' },
        limit: { type: 'integer', description: 'Maximum fused results (1-50, default 10)' },
      },
      required: ['query'],
      schema: HybridSearchInputSchema,
      run: (input) =>
        hybridSearch(services, {
          query: input.query,
          patientId: input.patient_id,
          includeImages: input.include_images,
          limit: input.limit,
        }),
    }),

    defineTool({
      name: 'remember',
      description:
        'Store a correction, preference or fact for future sessions. Use when the user corrects you or states something worth keeping.',
      properties: {
        content: { type: 'string', description: 'What to remember' },
        kind: { type: 'string', enum: MEMORY_KINDS, description: 'correction, preference or fact' },
        metadata: { type: 'object', description: 'Optional extra fields' },
      },
      required: ['content', 'kind'],
      schema: RememberInputSchema,
      run: async (input) => ({
        id: await remember(services, input.content, input.kind, input.metadata),
      }),
    }),

    defineTool({
      name: 'recall',
      description: 'Retrieve stored memories most similar to a query.',
      properties: {
        query: { type: 'string', description: 'What to look for' },
        limit: { type: 'integer', description: 'Maximum memories (1-50, default 5)' },
        kind: { type: 'string', enum: MEMORY_KINDS, description: 'Restrict to one kind' },
      },
      required: ['query'],
      schema: RecallInputSchema,
      run: (input) => recall(services, input.query, { limit: input.limit, kind: input.kind }),
    }),

    defineTool({
      name: 'forget',
      description: 'Delete a stored memory by id.',
      properties: { memory_id: { type: 'string', description: 'Memory id' } },
      required: ['memory_id'],
      schema: ForgetInputSchema,
      run: async (input) => ({ deleted: await forget(input.memory_id) }),
    }),

    defineTool({
      name: 'get_memory_stats',
      description: 'Memory totals by kind and the most used memories.',
      properties: {},
      schema: EmptyInputSchema,
      run: () => getMemoryStats(),
    }),
  ];
}

/**
 * A tool list with lookup by name.
 */
export class ToolCatalog {
  private readonly byName: Map<string, ToolDefinition>;

  constructor(readonly tools: ToolDefinition[]) {
    this.byName = new Map(tools.map((t) => [t.name, t]));
  }

  get(name: string): ToolDefinition | undefined {
    return this.byName.get(name);
  }

  names(): string[] {
    return this.tools.map((t) => t.name);
  }

  /**
   * Run a tool by name. Unknown names are an `error` result.
   */
  async call(name: string, args: unknown): Promise<ToolResult> {
    const tool = this.get(name);
    if (!tool) {
      return { status: 'error', error: { code: 'UNKNOWN_TOOL', message: `Unknown tool: ${name}` } };
    }
    return tool.handler(args);
  }
}

export function createToolCatalog(services: RetrievalServices): ToolCatalog {
  return new ToolCatalog(createTools(services));
}
