/**
 * Dependency Injection Container — The Central "Phone Book"
 * Layer: Core
 *
 * The single place where every dependency is wired. Each token is mapped to
 * a concrete value or class, so a class that says "I need the Batcher" gets
 * the one built here from configuration.
 *
 *   - `reflect-metadata` must be imported first: tsyringe reads constructor
 *     parameter metadata written by the decorators.
 *   - The registry core (codec, normalizer, batcher) is pure and
 *     built once with `useValue`; configuration is handed to it as explicit
 *     option objects here, never read by the core itself.
 *   - MatchService is a singleton: ingestion publishes to the same instance
 *     the HTTP controllers read from.
 */
import 'reflect-metadata';
import { container } from 'tsyringe';

import { TOKENS } from './types';
import { config } from './config';
import { logger } from './logger';

import { IngestionService, type IngestionOptions } from '@application/services/IngestionService';
import { MatchService } from '@application/services/MatchService';
import { Batcher } from '@domain/codec/Batcher';
import { RecordCodec } from '@domain/codec/RecordCodec';
import { createRegistryLayout } from '@domain/layout/registryLayout';
import { NameNormalizer } from '@domain/matching/NameNormalizer';
import { FileArtifactStore } from '@infrastructure/storage/FileArtifactStore';

const layout = createRegistryLayout({
  totalWidth: config.registry.recordWidth,
  maxOfficers: config.registry.maxOfficers,
});
const codec = new RecordCodec(layout);
const ingestionOptions: IngestionOptions = {
  onReject: config.registry.onReject,
  progressInterval: config.registry.progressInterval,
};

container.register(TOKENS.Logger, { useValue: logger });
container.register(TOKENS.RecordCodec, { useValue: codec });
container.register(TOKENS.NameNormalizer, {
  useValue: new NameNormalizer({ suffixes: config.registry.nameSuffixes }),
});
container.register(TOKENS.Batcher, {
  useValue: new Batcher(codec, { chunkSize: config.registry.chunkSize }),
});
container.register(TOKENS.ArtifactStore, {
  useValue: new FileArtifactStore({
    outputDir: config.registry.outputDir,
    segmentPrefix: config.registry.segmentPrefix,
  }),
});
container.register(TOKENS.IngestionOptions, { useValue: ingestionOptions });
container.registerSingleton(TOKENS.MatchService, MatchService);
container.register(TOKENS.IngestionService, { useClass: IngestionService });

export { container };
