/**
 * Unit Tests — entityFromCsvRow
 *
 * A row only has the columns its header names. Defaults stand in for columns
 * the header lacks; a column that is present but empty keeps its empty cell.
 */
import { entityFromCsvRow } from '@domain/codec/csvRowEntity';

describe('entityFromCsvRow', () => {
  it('should fill every block with defaults for an empty header', () => {
    const entity = entityFromCsvRow({});

    expect(entity.documentNumber).toBeNull();
    expect(entity.name).toBe('UNKNOWN ASSOCIATION');
    expect(entity.status).toBe('ACTIVE');
    expect(entity.entityType).toBe('CONDO');
    expect(entity.principalAddress).toEqual({
      line1: '123 Main St',
      line2: '',
      city: 'Fort Myers',
      state: 'FL',
      postalCode: '33901',
      country: 'US',
    });
    expect(entity.mailingAddress).toEqual(entity.principalAddress);
    expect(entity.fileDate?.toISOString()).toBe('2020-01-01T00:00:00.000Z');
    expect(entity.registeredAgent).toEqual({
      name: 'REGISTERED AGENT LLC',
      nameType: 'C',
      address: { line1: '1000 Corporate Dr', line2: '', city: 'Fort Myers', state: 'FL', postalCode: '33901', country: '' },
    });
  });

  it('should give every row the four standard board officers', () => {
    const { officers } = entityFromCsvRow({ city: 'NAPLES', zip: '34102' });

    expect(officers.map((o) => [o.title, o.name])).toEqual([
      ['PRES', 'JOHN SMITH'],
      ['VICE', 'JANE DOE'],
      ['TREA', 'ROBERT JOHNSON'],
      ['SECR', 'MARY WILLIAMS'],
    ]);
    expect(officers[0].nameType).toBe('P');
    expect(officers[0].address).toEqual({
      line1: '123 Main St',
      line2: '',
      city: 'NAPLES',
      state: 'FL',
      postalCode: '34102',
      country: '',
    });
  });

  it('should read the named columns', () => {
    const entity = entityFromCsvRow({
      document_number: 'N100',
      entity_name: 'PALM COURT CONDOMINIUM',
      status: 'Inactive',
      type: 'DOMNP',
      address1: '9 SHELL RD',
      address2: 'APT 4',
      city: 'NAPLES',
      state: 'FL',
      zip: '341021234',
      country: 'US',
      file_date: '20150630',
      agent_name: 'COASTAL AGENTS INC',
      agent_address: '50 MAIN ST',
      agent_city: 'TAMPA',
      agent_zip: '33602',
    });

    expect(entity.documentNumber).toBe('N100');
    expect(entity.name).toBe('PALM COURT CONDOMINIUM');
    expect(entity.status).toBe('INACTIVE');
    expect(entity.entityType).toBe('DOMNP');
    expect(entity.principalAddress.line2).toBe('APT 4');
    expect(entity.fileDate?.toISOString()).toBe('2015-06-30T00:00:00.000Z');
    expect(entity.registeredAgent.name).toBe('COASTAL AGENTS INC');
    expect(entity.registeredAgent.address).toEqual({
      line1: '50 MAIN ST',
      line2: '',
      city: 'TAMPA',
      state: 'FL',
      postalCode: '33602',
      country: '',
    });
  });

  it('should fall back to the alternate column names', () => {
    const entity = entityFromCsvRow({ id: 'X9', name: 'HARBOR VIEW', address: '1 DOCK ST', property_manager: 'BAY MGMT' });

    expect(entity.documentNumber).toBe('X9');
    expect(entity.name).toBe('HARBOR VIEW');
    expect(entity.principalAddress.line1).toBe('1 DOCK ST');
    expect(entity.registeredAgent.name).toBe('BAY MGMT');
  });

  it('should prefer the primary column when both are present', () => {
    const entity = entityFromCsvRow({ document_number: 'N1', id: 'X9', entity_name: 'PRIMARY', name: 'ALTERNATE' });

    expect(entity.documentNumber).toBe('N1');
    expect(entity.name).toBe('PRIMARY');
  });

  it('should keep a present but empty cell empty', () => {
    const entity = entityFromCsvRow({ entity_name: '', city: '', type: '' });

    expect(entity.name).toBe('');
    expect(entity.entityType).toBe('');
    expect(entity.principalAddress.city).toBe('');
    expect(entity.registeredAgent.address.city).toBe('');
  });

  it('should treat an empty document number as absent', () => {
    expect(entityFromCsvRow({ document_number: '' }).documentNumber).toBeNull();
  });

  it.each([
    ['A', 'ACTIVE'],
    ['Active', 'ACTIVE'],
    ['', 'ACTIVE'],
    ['I', 'INACTIVE'],
    ['Dissolved', 'UNKNOWN'],
  ])('should map status %p by its first character to %s', (status, expected) => {
    expect(entityFromCsvRow({ status }).status).toBe(expected);
  });

  it('should default the agent zip to the first five digits of the zip', () => {
    expect(entityFromCsvRow({ zip: '341021234' }).registeredAgent.address.postalCode).toBe('34102');
  });

  it('should decode an unreadable file date as null', () => {
    expect(entityFromCsvRow({ file_date: '06/30/2015' }).fileDate).toBeNull();
  });
});
