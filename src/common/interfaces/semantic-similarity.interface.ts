/**
 * Injected text-similarity capability behind the semantic matching strategy.
 * Loading and reusing a model is the provider's concern.
 */
export interface ISemanticSimilarityScorer {
  /** Similarity in [0,1], or null when no judgement can be made. */
  similarity(textA: string, textB: string): Promise<number | null>;
}
