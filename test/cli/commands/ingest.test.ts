/**
 * Tests for the ingest CLI command handler.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('../../../src/cli/utils.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../../../src/cli/utils.js')>()),
  loadRuntime: vi.fn(),
}));

vi.mock('../../../src/ingest/index.js', () => ({
  ingestFhirFile: vi.fn(),
  importGraphFile: vi.fn(),
  importImageFile: vi.fn(),
  embedPendingDocuments: vi.fn(),
}));

import { ingestCommand } from '../../../src/cli/commands/ingest.js';
import { loadRuntime } from '../../../src/cli/utils.js';
import {
  embedPendingDocuments,
  importGraphFile,
  importImageFile,
  ingestFhirFile,
} from '../../../src/ingest/index.js';
import { makeConfig, makeServices } from '../../retrieval/test-services.js';

const mockLoadRuntime = vi.mocked(loadRuntime);
const mockIngestFhirFile = vi.mocked(ingestFhirFile);
const mockImportGraphFile = vi.mocked(importGraphFile);
const mockImportImageFile = vi.mocked(importImageFile);
const mockEmbedPending = vi.mocked(embedPendingDocuments);

beforeEach(() => {
  vi.clearAllMocks();
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
  vi.spyOn(process, 'exit').mockImplementation(() => undefined as never);
});

function useRuntime(services = makeServices()): void {
  mockLoadRuntime.mockReturnValue({ config: services.config, services });
}

describe('ingestCommand', () => {
  it('requires something to ingest', async () => {
    await ingestCommand.handler([]);

    expect(console.error).toHaveBeenCalledWith('Error: Nothing to ingest');
    expect(process.exit).toHaveBeenCalledWith(2);
    expect(mockLoadRuntime).not.toHaveBeenCalled();
  });

  it('rejects a non-positive batch size', async () => {
    await ingestCommand.handler(['notes.json', '--batch-size', '0']);

    expect(console.error).toHaveBeenCalledWith('Error: --batch-size must be a positive integer');
    expect(process.exit).toHaveBeenCalledWith(2);
  });

  it('ingests notes then embeds them', async () => {
    const services = makeServices();
    useRuntime(services);
    mockIngestFhirFile.mockResolvedValue({
      resources: 3,
      documents: 2,
      inserted: 1,
      duplicates: 1,
      skipped: 0,
      invalid: [{ index: 2, reason: 'DocumentReference d3 has no attachment data' }],
    });
    mockEmbedPending.mockResolvedValue({ embedded: 1 });

    await ingestCommand.handler(['notes.json', '--batch-size', '16']);

    expect(mockIngestFhirFile).toHaveBeenCalledWith('notes.json');
    expect(console.log).toHaveBeenCalledWith('notes.json: 1 inserted, 1 already present, 0 skipped, 1 invalid');
    expect(console.log).toHaveBeenCalledWith('  resource 2: DocumentReference d3 has no attachment data');
    expect(mockEmbedPending).toHaveBeenCalledWith(services.textEmbedder, 16);
    expect(console.log).toHaveBeenCalledWith('Embedded 1 documents.');
    expect(process.exit).not.toHaveBeenCalled();
  });

  it('loads graph and image files without embedding', async () => {
    useRuntime(makeServices({ config: makeConfig() }));
    mockImportGraphFile.mockResolvedValue({ entities: 4, relationships: 3 });
    mockImportImageFile.mockResolvedValue({ images: 2 });

    await ingestCommand.handler(['--graph', 'graph.json', '--images', 'images.json']);

    expect(mockImportImageFile).toHaveBeenCalledWith('images.json', 'nvclip');
    expect(console.log).toHaveBeenCalledWith('graph.json: 4 entities, 3 relationships');
    expect(console.log).toHaveBeenCalledWith('images.json: 2 images');
    expect(mockIngestFhirFile).not.toHaveBeenCalled();
    expect(mockEmbedPending).not.toHaveBeenCalled();
  });

  it('skips embedding with --no-embed', async () => {
    useRuntime();
    mockIngestFhirFile.mockResolvedValue({
      resources: 1,
      documents: 1,
      inserted: 1,
      duplicates: 0,
      skipped: 0,
      invalid: [],
    });

    await ingestCommand.handler(['notes.json', '--no-embed']);

    expect(mockEmbedPending).not.toHaveBeenCalled();
  });

  it('says so when no embedding provider is configured', async () => {
    useRuntime(makeServices({ textEmbedder: null }));
    mockIngestFhirFile.mockResolvedValue({
      resources: 1,
      documents: 1,
      inserted: 1,
      duplicates: 0,
      skipped: 0,
      invalid: [],
    });

    await ingestCommand.handler(['notes.json']);

    expect(console.log).toHaveBeenCalledWith('Embedding skipped: no text embedding provider configured.');
  });

  it('exits with 1 when embedding stops early', async () => {
    useRuntime();
    mockIngestFhirFile.mockResolvedValue({
      resources: 1,
      documents: 1,
      inserted: 1,
      duplicates: 0,
      skipped: 0,
      invalid: [],
    });
    mockEmbedPending.mockResolvedValue({ embedded: 0, stoppedReason: 'Embedding model fake-text unavailable: offline' });

    await ingestCommand.handler(['notes.json']);

    expect(console.error).toHaveBeenCalledWith(
      'Embedding stopped early: Embedding model fake-text unavailable: offline',
    );
    expect(process.exit).toHaveBeenCalledWith(1);
  });
});
