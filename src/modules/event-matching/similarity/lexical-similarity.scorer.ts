import { Injectable } from '@nestjs/common';
import type { ISemanticSimilarityScorer } from '../../../common/interfaces/index.js';
import { termFrequencyCosine, tokenize } from './text-similarity.js';

/**
 * Default semantic scorer: cosine over stopword-free term frequencies.
 * Bind SEMANTIC_SIMILARITY_SCORER_TOKEN to an embedding-backed scorer to replace it.
 */
@Injectable()
export class LexicalSimilarityScorer implements ISemanticSimilarityScorer {
  similarity(textA: string, textB: string): Promise<number | null> {
    const tokensA = tokenize(textA);
    const tokensB = tokenize(textB);
    if (tokensA.length === 0 || tokensB.length === 0) {
      return Promise.resolve(null);
    }
    return Promise.resolve(termFrequencyCosine(tokensA, tokensB));
  }
}
