/**
 * Match Index — Canonical Name → Document Number
 * Layer: Domain
 *
 * Built once from a finished batch, then read-only. Lookups normalize the
 * raw name with the same NameNormalizer used at build time and return the
 * document number, or null when nothing matches (a normal outcome).
 *
 * Collision policy: when two entities normalize to the same key, the later
 * one in iteration order wins. Callers that need provenance deduplicate
 * before building.
 *
 * Entities without a document number, or whose name normalizes to an empty
 * key, have nothing to resolve to and are left out.
 */
import type { Entity } from '@domain/entities/Entity';

import type { NameNormalizer } from './NameNormalizer';

/** The key-value document a caller persists: canonical name → document number. */
export type NameIndexDocument = Record<string, string>;

export interface MatchResult {
  key: string;
  documentNumber: string;
}

export class MatchIndex {
  private constructor(
    private readonly entries: ReadonlyMap<string, string>,
    private readonly normalizer: NameNormalizer,
  ) {}

  static build(entities: Iterable<Entity>, normalizer: NameNormalizer): MatchIndex {
    const entries = new Map<string, string>();
    for (const entity of entities) {
      if (entity.documentNumber === null) continue;
      const key = normalizer.normalize(entity.name);
      if (key === '') continue;
      entries.set(key, entity.documentNumber);
    }
    return new MatchIndex(entries, normalizer);
  }

  /**
   * Rebuild from a persisted document. Keys are normalized again so a
   * document written under a different suffix list still resolves; on
   * collision the later entry wins, as in build().
   */
  static fromDocument(document: NameIndexDocument, normalizer: NameNormalizer): MatchIndex {
    const entries = new Map<string, string>();
    for (const [name, documentNumber] of Object.entries(document)) {
      const key = normalizer.normalize(name);
      if (key !== '' && documentNumber !== '') entries.set(key, documentNumber);
    }
    return new MatchIndex(entries, normalizer);
  }

  get size(): number {
    return this.entries.size;
  }

  lookup(rawName: string): string | null {
    return this.match(rawName)?.documentNumber ?? null;
  }

  /** Like lookup(), but also reports the key the name normalized to. */
  match(rawName: string): MatchResult | null {
    const key = this.normalizer.normalize(rawName);
    const documentNumber = this.entries.get(key);
    return documentNumber === undefined ? null : { key, documentNumber };
  }

  toDocument(): NameIndexDocument {
    return Object.fromEntries(this.entries);
  }
}
