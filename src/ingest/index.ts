/**
 * Ingestion exports.
 */

export {
  collectDocuments,
  embedPendingDocuments,
  importGraphFile,
  importImageFile,
  ingestFhirFile,
  DEFAULT_EMBED_BATCH_SIZE,
} from './ingest.js';
export type { DocumentIngestResult, EmbedResult, GraphFile, ImageFile, InvalidResource } from './ingest.js';

export {
  decodeAttachmentData,
  detectEncoding,
  documentFromResource,
  isDocumentReference,
  parseResources,
  patientIdFromReference,
  DocumentReferenceSchema,
} from './fhir-document.js';
export type { DocumentReference, PayloadEncoding } from './fhir-document.js';
