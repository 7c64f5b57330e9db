/**
 * Registry record layout: the column table of the corporate extract.
 *
 * Field names are dotted paths into Entity (head) and Officer (stride); the
 * codec maps them with `entityFields.ts`. Widths below are the defaults of the
 * 1440-column extract; total width and officer count come from configuration.
 *
 *     0  documentNumber … fileDate          (480 columns)
 *   480  blank                              (64)
 *   544  registered agent                   (124)
 *   668  officer strides, 6 × 128
 *  1436  blank filler                       (4)
 *
 * The extract has no property-manager columns, so the default layout leaves
 * that block out and it decodes empty. A layout that needs it can add the
 * `propertyManager.*` fields.
 */
import { ADDRESS_PARTS, type AddressPart } from '@domain/entities/Address';
import { DEFAULT_MAX_OFFICERS, DEFAULT_RECORD_WIDTH } from '@shared/constants';

import { type FieldSpec, FieldLayout, type LayoutEntry } from './FieldLayout';

type AddressBlock = 'principalAddress' | 'mailingAddress' | 'registeredAgent.address' | 'propertyManager.address';

export type EntityFieldName =
  | 'documentNumber'
  | 'name'
  | 'status'
  | 'entityType'
  | 'fileDate'
  | 'registeredAgent.name'
  | 'registeredAgent.nameType'
  | 'propertyManager.name'
  | 'propertyManager.type'
  | `${AddressBlock}.${AddressPart}`;

export type OfficerFieldName = 'title' | 'nameType' | 'name' | `address.${AddressPart}`;

export type RegistryLayout = FieldLayout<EntityFieldName, OfficerFieldName>;

/** Full six-part address: 42 + 42 + 28 + 2 + 10 + 2 = 126 columns. */
const FULL_ADDRESS: Readonly<Record<AddressPart, number>> = {
  line1: 42,
  line2: 42,
  city: 28,
  state: 2,
  postalCode: 10,
  country: 2,
};

/** Agent, manager and officer addresses: line1, city, state, 9-digit zip = 81 columns. */
const SHORT_ADDRESS: Readonly<Partial<Record<AddressPart, number>>> = {
  line1: 42,
  city: 28,
  state: 2,
  postalCode: 9,
};

function addressFields<P extends string>(
  prefix: P,
  widths: Readonly<Partial<Record<AddressPart, number>>>,
): FieldSpec<`${P}.${AddressPart}`>[] {
  const fields: FieldSpec<`${P}.${AddressPart}`>[] = [];
  for (const part of ADDRESS_PARTS) {
    const width = widths[part];
    if (width !== undefined) fields.push({ name: `${prefix}.${part}` as const, width });
  }
  return fields;
}

/** Head region: 668 columns. */
export const REGISTRY_HEAD_FIELDS: ReadonlyArray<LayoutEntry<EntityFieldName>> = [
  { name: 'documentNumber', width: 12 },
  { name: 'name', width: 192 },
  { name: 'status', width: 1 },
  { name: 'entityType', width: 15 },
  ...addressFields('principalAddress', FULL_ADDRESS),
  ...addressFields('mailingAddress', FULL_ADDRESS),
  { name: 'fileDate', width: 8 },
  { filler: 64 },
  { name: 'registeredAgent.name', width: 42 },
  { name: 'registeredAgent.nameType', width: 1 },
  ...addressFields('registeredAgent.address', SHORT_ADDRESS),
];

/** The property-manager block, for layouts that carry one: 124 columns. */
export const PROPERTY_MANAGER_FIELDS: ReadonlyArray<FieldSpec<EntityFieldName>> = [
  { name: 'propertyManager.name', width: 42 },
  { name: 'propertyManager.type', width: 1 },
  ...addressFields('propertyManager.address', SHORT_ADDRESS),
];

/** One officer stride: 128 columns. */
export const REGISTRY_OFFICER_FIELDS: ReadonlyArray<LayoutEntry<OfficerFieldName>> = [
  { name: 'title', width: 4 },
  { name: 'nameType', width: 1 },
  { name: 'name', width: 42 },
  ...addressFields('address', SHORT_ADDRESS),
];

export interface RegistryLayoutOptions {
  totalWidth?: number;
  maxOfficers?: number;
}

export function createRegistryLayout(options: RegistryLayoutOptions = {}): RegistryLayout {
  return new FieldLayout<EntityFieldName, OfficerFieldName>({
    totalWidth: options.totalWidth ?? DEFAULT_RECORD_WIDTH,
    head: REGISTRY_HEAD_FIELDS,
    stride: REGISTRY_OFFICER_FIELDS,
    maxOfficers: options.maxOfficers ?? DEFAULT_MAX_OFFICERS,
    titleField: 'title',
  });
}
