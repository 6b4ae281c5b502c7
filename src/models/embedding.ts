/**
 * Embedding vector interfaces
 */

/**
 * A vector produced by one embedding model.
 * Vectors of different model identities are never compared.
 */
export interface EmbeddingVector {
  /** Segment the vector represents; null for query vectors */
  owner_segment_id: string | null;
  model_identity: string;
  values: Float32Array;
}

/** Metadata value stored beside an index entry and matched by equality filters. */
export type MetadataValue = string | number | boolean | null;

export type EntryMetadata = Record<string, MetadataValue>;

/**
 * One row of the vector index
 */
export interface IndexEntry {
  segment_id: string;
  document_id: string;
  vector: EmbeddingVector;
  metadata: EntryMetadata;
}
