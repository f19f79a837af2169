export type EmbeddingVector = readonly number[]

/**
 * Anything that turns text into vectors: a model client, a remote API, or
 * the cache itself wrapping one of those.
 */
export interface EmbeddingProvider {
  /**
   * Embed a batch of documents. Resolves to exactly one vector per input
   * text, in input order.
   */
  embedDocuments(texts: readonly string[]): Promise<EmbeddingVector[]>

  embedQuery(text: string): Promise<EmbeddingVector>
}
