/**
 * Mapping between Entity values and the flat, named column values the record
 * layout speaks in. Column values are raw text: the codec pads/cuts them on
 * the way out and trims trailing spaces on the way in.
 */
import { ADDRESS_PARTS, type Address, type AddressPart } from '@domain/entities/Address';
import type { Entity, EntityStatus } from '@domain/entities/Entity';
import type { Officer } from '@domain/entities/Officer';
import type { EntityFieldName, OfficerFieldName } from '@domain/layout/registryLayout';
import { STATUS_CODES } from '@shared/constants';

export type FieldReader<N extends string> = (name: N) => string;

export function statusFromCode(code: string): EntityStatus {
  switch (code) {
    case STATUS_CODES.ACTIVE:
      return 'ACTIVE';
    case STATUS_CODES.INACTIVE:
      return 'INACTIVE';
    default:
      return 'UNKNOWN';
  }
}

/** UNKNOWN has no code of its own; a blank column decodes back to UNKNOWN. */
export function statusToCode(status: EntityStatus): string {
  switch (status) {
    case 'ACTIVE':
      return STATUS_CODES.ACTIVE;
    case 'INACTIVE':
      return STATUS_CODES.INACTIVE;
    case 'UNKNOWN':
      return '';
  }
}

/** Registry dates are YYYYMMDD. Anything that is not a real calendar date is null. */
export function parseRegistryDate(value: string): Date | null {
  const match = /^(\d{4})(\d{2})(\d{2})$/.exec(value);
  if (!match) return null;
  const [, yyyy, mm, dd] = match;
  const month = Number(mm);
  const day = Number(dd);
  const year = Number(yyyy);
  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  return date;
}

export function formatRegistryDate(date: Date | null): string {
  if (date === null || Number.isNaN(date.getTime())) return '';
  const mm = String(date.getUTCMonth() + 1).padStart(2, '0');
  const dd = String(date.getUTCDate()).padStart(2, '0');
  const yyyy = String(date.getUTCFullYear()).padStart(4, '0');
  return `${yyyy}${mm}${dd}`;
}

function readAddress(read: (part: AddressPart) => string): Address {
  return Object.freeze({
    line1: read('line1'),
    line2: read('line2'),
    city: read('city'),
    state: read('state'),
    postalCode: read('postalCode'),
    country: read('country'),
  });
}

function addressFields<P extends string>(
  prefix: P,
  address: Address,
): Partial<Record<`${P}.${AddressPart}`, string>> {
  const fields: Partial<Record<`${P}.${AddressPart}`, string>> = {};
  for (const part of ADDRESS_PARTS) {
    fields[`${prefix}.${part}` as const] = address[part];
  }
  return fields;
}

export function entityFromFields(read: FieldReader<EntityFieldName>, officers: readonly Officer[]): Entity {
  const documentNumber = read('documentNumber');
  return Object.freeze({
    documentNumber: documentNumber === '' ? null : documentNumber,
    name: read('name'),
    status: statusFromCode(read('status')),
    entityType: read('entityType'),
    principalAddress: readAddress((part) => read(`principalAddress.${part}`)),
    mailingAddress: readAddress((part) => read(`mailingAddress.${part}`)),
    fileDate: parseRegistryDate(read('fileDate')),
    registeredAgent: Object.freeze({
      name: read('registeredAgent.name'),
      nameType: read('registeredAgent.nameType'),
      address: readAddress((part) => read(`registeredAgent.address.${part}`)),
    }),
    propertyManager: Object.freeze({
      name: read('propertyManager.name'),
      type: read('propertyManager.type'),
      address: readAddress((part) => read(`propertyManager.address.${part}`)),
    }),
    officers: Object.freeze([...officers]),
  });
}

export function entityToFields(entity: Entity): Partial<Record<EntityFieldName, string>> {
  return {
    documentNumber: entity.documentNumber ?? '',
    name: entity.name,
    status: statusToCode(entity.status),
    entityType: entity.entityType,
    fileDate: formatRegistryDate(entity.fileDate),
    'registeredAgent.name': entity.registeredAgent.name,
    'registeredAgent.nameType': entity.registeredAgent.nameType,
    'propertyManager.name': entity.propertyManager.name,
    'propertyManager.type': entity.propertyManager.type,
    ...addressFields('principalAddress', entity.principalAddress),
    ...addressFields('mailingAddress', entity.mailingAddress),
    ...addressFields('registeredAgent.address', entity.registeredAgent.address),
    ...addressFields('propertyManager.address', entity.propertyManager.address),
  };
}

export function officerFromFields(read: FieldReader<OfficerFieldName>): Officer {
  return Object.freeze({
    title: read('title'),
    nameType: read('nameType'),
    name: read('name'),
    address: readAddress((part) => read(`address.${part}`)),
  });
}

export function officerToFields(officer: Officer): Partial<Record<OfficerFieldName, string>> {
  return {
    title: officer.title,
    nameType: officer.nameType,
    name: officer.name,
    ...addressFields('address', officer.address),
  };
}
