/**
 * Vector index that keeps documents in memory and ranks them by embedding
 * similarity, using the AI SDK's embedding helpers
 */
import { cosineSimilarity, embed, embedMany, EmbeddingModel } from 'ai';
import { v4 as uuidv4 } from 'uuid';
import { RetrievedDocument } from '../types/pipeline.js';
import { VectorIndex } from '../types/providers.js';
import { ProviderError, ValidationError, describeError } from '../types/errors.js';

interface IndexedDocument {
  id: string;
  content: string;
  metadata: Record<string, unknown>;
  embedding: number[];
}

/**
 * @example
 * ```typescript
 * import { openai } from '@ai-sdk/openai';
 *
 * const index = new EmbeddingVectorIndex(openai.embedding('text-embedding-3-small'));
 * await index.index(['Entangled particles share a quantum state.'], [{ source: 'notes.md' }]);
 * ```
 */
export class EmbeddingVectorIndex implements VectorIndex {
  private readonly documents: IndexedDocument[] = [];

  constructor(private readonly model: EmbeddingModel<string>) {}

  get size(): number {
    return this.documents.length;
  }

  async index(texts: string[], metadatas: Record<string, unknown>[]): Promise<string[]> {
    if (texts.length !== metadatas.length) {
      throw new ValidationError({
        message: `Got ${texts.length} texts but ${metadatas.length} metadata entries`,
        details: { texts: texts.length, metadatas: metadatas.length },
      });
    }

    if (texts.length === 0) {
      return [];
    }

    let embeddings: number[][];
    try {
      ({ embeddings } = await embedMany({ model: this.model, values: texts }));
    } catch (error: unknown) {
      throw new ProviderError({
        message: `Failed to index documents: ${describeError(error)}`,
        provider: this.model.provider,
        details: { originalError: error, count: texts.length },
      });
    }

    const ids = texts.map(() => uuidv4());
    texts.forEach((content, i) => {
      this.documents.push({ id: ids[i], content, metadata: { ...metadatas[i] }, embedding: embeddings[i] });
    });

    return ids;
  }

  async query(query: string, topK: number, options: { abortSignal?: AbortSignal } = {}): Promise<RetrievedDocument[]> {
    if (this.documents.length === 0 || topK <= 0) {
      return [];
    }

    let embedding: number[];
    try {
      ({ embedding } = await embed({ model: this.model, value: query, abortSignal: options.abortSignal }));
    } catch (error: unknown) {
      throw new ProviderError({
        message: `Failed to embed query: ${describeError(error)}`,
        provider: this.model.provider,
        details: { originalError: error },
      });
    }

    return this.documents
      .map((document) => ({ document, score: cosineSimilarity(embedding, document.embedding) }))
      .sort((a, b) => b.score - a.score)
      .slice(0, topK)
      .map(({ document, score }) => ({
        content: document.content,
        metadata: { ...document.metadata, documentId: document.id },
        score,
      }));
  }
}
