/**
 * Document retrieval step: queries the vector index with the research question
 */
import { createStep } from '../utils/steps.js';
import { ResearchStep } from '../types/pipeline.js';
import { VectorIndex } from '../types/providers.js';
import { ProviderError, describeError, isResearchError } from '../types/errors.js';

export interface RetrieveDocumentsOptions {
  index: VectorIndex;
  /** Number of documents to request from the index */
  topK?: number;
}

/**
 * Creates the document retrieval step
 *
 * Reads `queryText`, writes `retrievedDocuments` in the index's ranking order.
 */
export function retrieveDocuments(options: RetrieveDocumentsOptions): ResearchStep {
  return createStep(
    'document_retrieval',
    async (state, { index, topK = 5 }, { context, logger }) => {
      logger.debug(`Querying vector index for top ${topK} documents`);

      try {
        const documents = await index.query(state.queryText, topK, {
          abortSignal: context.abortSignal,
        });
        logger.info(`Retrieved ${documents.length} documents`);
        return { retrievedDocuments: documents.slice(0, topK) };
      } catch (error: unknown) {
        if (isResearchError(error)) throw error;
        throw new ProviderError({
          message: `Document retrieval failed: ${describeError(error)}`,
          provider: 'vector-index',
          step: 'document_retrieval',
          details: { originalError: error },
        });
      }
    },
    options
  );
}
