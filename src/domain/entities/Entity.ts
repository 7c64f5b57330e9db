/**
 * Entity — The Core Data Model
 * Layer: Domain
 *
 * One corporate-registry record. Entities are built either by decoding a
 * fixed-width line (RecordCodec.decode) or explicitly before encoding; every
 * field is readonly and decoded values are frozen, so a change means building
 * a new value.
 *
 * Key fields:
 *   - documentNumber: the registry's stable external key, null when the
 *                     record carries none. Unique within a batch.
 *   - name:           the filed entity name; MatchIndex keys on its
 *                     normalized form.
 *   - officers:       ordered, at most the layout's maxOfficers.
 */
import { type Address, emptyAddress } from './Address';
import type { Officer } from './Officer';

export type EntityStatus = 'ACTIVE' | 'INACTIVE' | 'UNKNOWN';

export interface RegisteredAgent {
  readonly name: string;
  readonly nameType: string;
  readonly address: Address;
}

export interface PropertyManager {
  readonly name: string;
  /** Single-column type flag, e.g. "P" person or "C" company. */
  readonly type: string;
  readonly address: Address;
}

export interface Entity {
  readonly documentNumber: string | null;
  readonly name: string;
  readonly status: EntityStatus;
  readonly entityType: string;
  readonly principalAddress: Address;
  readonly mailingAddress: Address;
  /** Filing date at UTC midnight, or null when blank or not a real date. */
  readonly fileDate: Date | null;
  readonly registeredAgent: RegisteredAgent;
  readonly propertyManager: PropertyManager;
  readonly officers: readonly Officer[];
}

/**
 * Explicit construction before encoding: every field starts empty, the
 * overrides fill in the rest. The result is frozen like a decoded entity.
 */
export function buildEntity(overrides: Partial<Entity> = {}): Entity {
  const entity: Entity = {
    documentNumber: null,
    name: '',
    status: 'UNKNOWN',
    entityType: '',
    principalAddress: emptyAddress(),
    mailingAddress: emptyAddress(),
    fileDate: null,
    registeredAgent: { name: '', nameType: '', address: emptyAddress() },
    propertyManager: { name: '', type: '', address: emptyAddress() },
    officers: [],
    ...overrides,
  };
  return Object.freeze(entity);
}
