/**
 * Test Fixtures — Reusable Sample Data
 * Layer: Test Helpers
 *
 * One complete entity that fits every column of the default layout, plus the
 * exact 1440-column line it encodes to, built column by column here rather
 * than through the codec. Names and document numbers are made up; dates are
 * fixed for determinism.
 */
import type { Address } from '@domain/entities/Address';
import { buildEntity, type Entity } from '@domain/entities/Entity';
import type { Officer } from '@domain/entities/Officer';

/** Left-justify each value in its column (no truncation: fixtures must fit). */
export function columns(...cells: Array<[value: string, width: number]>): string {
  return cells.map(([value, width]) => value.padEnd(width, ' ')).join('');
}

export const sampleAddress: Address = {
  line1: '100 HERON WAY',
  line2: 'SUITE 200',
  city: 'NAPLES',
  state: 'FL',
  postalCode: '34108',
  country: 'US',
};

/** Agent and officer blocks have no line2/country columns. */
export const sampleShortAddress: Address = {
  line1: '2 BAYFRONT PL',
  line2: '',
  city: 'NAPLES',
  state: 'FL',
  postalCode: '341021234',
  country: '',
};

export const sampleOfficers: Officer[] = [
  { title: 'P', nameType: 'P', name: 'DOE, JANE', address: sampleShortAddress },
  { title: 'VP', nameType: 'P', name: 'ROE, RICHARD', address: sampleShortAddress },
  { title: 'T', nameType: 'C', name: 'LEDGER HOLDINGS LLC', address: sampleShortAddress },
];

export const sampleEntity: Entity = buildEntity({
  documentNumber: 'N13000000010',
  name: 'HERON POINT HOMEOWNERS ASSOCIATION, INC.',
  status: 'ACTIVE',
  entityType: 'DOMNP',
  principalAddress: sampleAddress,
  mailingAddress: { ...sampleAddress, line1: 'PO BOX 1234', line2: '' },
  fileDate: new Date(Date.UTC(2013, 0, 15)),
  registeredAgent: { name: 'SAMPLE AGENT SERVICES', nameType: 'C', address: sampleShortAddress },
  officers: sampleOfficers,
});

function fullAddressColumns(a: Address): Array<[string, number]> {
  return [
    [a.line1, 42],
    [a.line2, 42],
    [a.city, 28],
    [a.state, 2],
    [a.postalCode, 10],
    [a.country, 2],
  ];
}

export function shortAddressColumns(a: Address): Array<[string, number]> {
  return [
    [a.line1, 42],
    [a.city, 28],
    [a.state, 2],
    [a.postalCode, 9],
  ];
}

export function officerStride(officer: Officer): string {
  return columns(
    [officer.title, 4],
    [officer.nameType, 1],
    [officer.name, 42],
    ...shortAddressColumns(officer.address),
  );
}

export const BLANK_STRIDE = ' '.repeat(128);

/**
 * The head region (668 columns) of sampleEntity, with overridable status,
 * document number and date columns for decode tests.
 */
export function sampleHead(overrides: { documentNumber?: string; status?: string; fileDate?: string } = {}): string {
  return columns(
    [overrides.documentNumber ?? 'N13000000010', 12],
    ['HERON POINT HOMEOWNERS ASSOCIATION, INC.', 192],
    [overrides.status ?? 'A', 1],
    ['DOMNP', 15],
    ...fullAddressColumns(sampleAddress),
    ...fullAddressColumns({ ...sampleAddress, line1: 'PO BOX 1234', line2: '' }),
    [overrides.fileDate ?? '20130115', 8],
    ['', 64],
    ['SAMPLE AGENT SERVICES', 42],
    ['C', 1],
    ...shortAddressColumns(sampleShortAddress),
  );
}

/** Assemble a full record: head, the given strides, blank strides, filler. */
export function recordLine(head: string, strides: string[]): string {
  const tail = [...strides];
  while (tail.length < 6) tail.push(BLANK_STRIDE);
  return head + tail.join('') + ' '.repeat(4);
}

/** The exact line sampleEntity encodes to under the default layout. */
export const sampleRecordLine = recordLine(sampleHead(), sampleOfficers.map(officerStride));

/** A minimal valid entity for batch tests. */
export function simpleEntity(documentNumber: string | null, name: string): Entity {
  return buildEntity({ documentNumber, name, status: 'ACTIVE', entityType: 'DOMNP' });
}
