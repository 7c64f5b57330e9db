/**
 * CSV Row → Entity
 * Layer: Domain
 *
 * Registry exports also come as CSV with one header row. A row is a plain
 * column → cell map; this maps it onto an Entity the Batcher can encode, so
 * a CSV batch ends up as the same fixed-width segments as a native one.
 *
 * Column names and defaults follow the export:
 *
 *   document_number | id       → documentNumber  (blank → absent)
 *   entity_name | name         → name            ("UNKNOWN ASSOCIATION")
 *   status                     → first character ("A")
 *   type                       → entityType      ("CONDO")
 *   address1 | address, address2, city, state, zip, country
 *                              → principal and mailing address
 *   file_date (YYYYMMDD)       → fileDate        ("20200101")
 *   agent_name | property_manager, agent_address, agent_city, agent_zip
 *                              → registered agent (a corporation, in FL)
 *
 * A default applies only when the column is missing from the header; a
 * present but empty cell stays empty. CSV has no officer columns, so every
 * row gets the four standard board officers.
 */
import type { Address } from '@domain/entities/Address';
import { buildEntity, type Entity } from '@domain/entities/Entity';
import type { Officer } from '@domain/entities/Officer';
import { NAME_TYPES } from '@shared/constants';

import { parseRegistryDate, statusFromCode } from './entityFields';

export type CsvRow = Readonly<Record<string, string>>;

const DEFAULT_BOARD: ReadonlyArray<readonly [title: string, name: string]> = [
  ['PRES', 'JOHN SMITH'],
  ['VICE', 'JANE DOE'],
  ['TREA', 'ROBERT JOHNSON'],
  ['SECR', 'MARY WILLIAMS'],
];

/** First of `columns` present in the row, else the fallback. */
function cell(row: CsvRow, columns: readonly string[], fallback: string): string {
  for (const column of columns) {
    const value = row[column];
    if (value !== undefined) return value;
  }
  return fallback;
}

export function entityFromCsvRow(row: CsvRow): Entity {
  const documentNumber = cell(row, ['document_number', 'id'], '');
  const status = cell(row, ['status'], 'A');
  const city = cell(row, ['city'], 'Fort Myers');
  const zip = cell(row, ['zip'], '33901');

  const address: Address = {
    line1: cell(row, ['address1', 'address'], '123 Main St'),
    line2: cell(row, ['address2'], ''),
    city,
    state: cell(row, ['state'], 'FL'),
    postalCode: zip,
    country: cell(row, ['country'], 'US'),
  };

  const officerAddress: Address = {
    line1: '123 Main St',
    line2: '',
    city,
    state: 'FL',
    postalCode: zip,
    country: '',
  };

  const officers: Officer[] = DEFAULT_BOARD.map(([title, name]) => ({
    title,
    nameType: NAME_TYPES.PERSON,
    name,
    address: officerAddress,
  }));

  return buildEntity({
    documentNumber: documentNumber === '' ? null : documentNumber,
    name: cell(row, ['entity_name', 'name'], 'UNKNOWN ASSOCIATION'),
    status: statusFromCode(status === '' ? 'A' : status.charAt(0)),
    entityType: cell(row, ['type'], 'CONDO'),
    principalAddress: address,
    mailingAddress: address,
    fileDate: parseRegistryDate(cell(row, ['file_date'], '20200101')),
    registeredAgent: {
      name: cell(row, ['agent_name', 'property_manager'], 'REGISTERED AGENT LLC'),
      nameType: NAME_TYPES.CORPORATION,
      address: {
        line1: cell(row, ['agent_address'], '1000 Corporate Dr'),
        line2: '',
        city: cell(row, ['agent_city'], city),
        state: 'FL',
        postalCode: cell(row, ['agent_zip'], zip.slice(0, 5)),
        country: '',
      },
    },
    officers,
  });
}
