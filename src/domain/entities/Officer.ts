/**
 * Officer Value Object
 * Layer: Domain
 *
 * An entity lists its officers in filing order:
 *
 *   Entity (1) ──< Officer (0..maxOfficers)
 *
 * Officers have no identity outside their entity. In a record they occupy one
 * fixed stride each in the trailing region; a stride with a blank title ends
 * the list.
 */
import type { Address } from './Address';

export interface Officer {
  /** Role code such as "P", "VP" or "MGR"; kept as free text. */
  readonly title: string;
  /** "P" for a person, "C" for a corporation. */
  readonly nameType: string;
  readonly name: string;
  readonly address: Address;
}
