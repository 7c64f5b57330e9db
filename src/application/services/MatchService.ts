/**
 * Match Service — Name → Document Number Resolution
 * Layer: Application
 *
 * Holds the current MatchIndex and answers lookups against it. An index is
 * never edited: a new ingestion run publishes a whole new one, and readers
 * always see either the old index or the new one.
 *
 * A miss is an ordinary outcome for the index (null); at this layer it
 * becomes NotFoundError so the HTTP boundary answers 404.
 */
import { TOKENS } from '@core/types';
import type { Logger } from '@core/logger';
import type { IArtifactStore } from '@domain/interfaces/IArtifactStore';
import { MatchIndex } from '@domain/matching/MatchIndex';
import type { NameNormalizer } from '@domain/matching/NameNormalizer';
import { AppError, NotFoundError } from '@shared/errors/AppError';
import type { MatchLookupResult } from '@shared/types';
import { inject, injectable } from 'tsyringe';

@injectable()
export class MatchService {
  private index: MatchIndex | null = null;

  constructor(
    @inject(TOKENS.NameNormalizer) private normalizer: NameNormalizer,
    @inject(TOKENS.ArtifactStore) private store: IArtifactStore,
    @inject(TOKENS.Logger) private log: Logger,
  ) {}

  get isReady(): boolean {
    return this.index !== null;
  }

  publish(index: MatchIndex): void {
    this.index = index;
    this.log.info({ entries: index.size }, 'Match index published');
  }

  /** Load the last persisted index. Returns false when nothing has been persisted yet. */
  async load(): Promise<boolean> {
    const document = await this.store.readNameIndex();
    if (document === null) {
      this.log.warn('No persisted name index found; lookups are unavailable until an ingest runs');
      return false;
    }
    this.publish(MatchIndex.fromDocument(document, this.normalizer));
    return true;
  }

  resolve(name: string): MatchLookupResult {
    if (this.index === null) {
      throw new AppError('Match index is not loaded yet', 503);
    }
    const match = this.index.match(name);
    if (!match) throw new NotFoundError('Entity matching name', name);
    return { name, key: match.key, documentNumber: match.documentNumber };
  }
}
