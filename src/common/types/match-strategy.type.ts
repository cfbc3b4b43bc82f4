/** Names of the registered event-matching strategies, as used in configuration and results. */
export enum MatchStrategyName {
  EXACT_TITLE = 'exact_title',
  FUZZY_TITLE = 'fuzzy_title',
  ENTITY_OVERLAP = 'entity_overlap',
  SEMANTIC_EMBEDDING = 'semantic_embedding',
  RESOLUTION_CRITERIA = 'resolution_criteria',
  TEMPORAL_ALIGNMENT = 'temporal_alignment',
}

export function isMatchStrategyName(value: unknown): value is MatchStrategyName {
  return Object.values(MatchStrategyName).some((name) => name === value);
}
