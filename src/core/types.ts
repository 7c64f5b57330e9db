/**
 * Dependency Injection Tokens
 * Layer: Core
 *
 * Every injectable dependency is registered in the tsyringe container under
 * one of these symbols. Grouped by architectural layer so it is easy to see
 * what exists at each level; add the token here first when adding a service.
 */
export const TOKENS = {
  // Infrastructure
  Logger: Symbol.for('Logger'),
  ArtifactStore: Symbol.for('ArtifactStore'),

  // Registry core — pure, configured once at startup
  RecordCodec: Symbol.for('RecordCodec'),
  NameNormalizer: Symbol.for('NameNormalizer'),
  Batcher: Symbol.for('Batcher'),

  // Services
  IngestionOptions: Symbol.for('IngestionOptions'),
  IngestionService: Symbol.for('IngestionService'),
  MatchService: Symbol.for('MatchService'),
} as const;
