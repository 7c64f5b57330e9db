/**
 * Sample Batch Script
 * Layer: Entry Point (CLI)
 *
 * Writes a small fixed-width batch file of made-up homeowner associations so
 * the ingest pipeline can be exercised without a registry extract:
 *
 *   npm run sample [-- --file ./data/cordata.txt]
 *
 * Records are encoded with the configured layout, so the file always matches
 * what `npm run ingest` expects.
 */
import { config } from '@core/config';
import { container } from '@core/container';
import { TOKENS } from '@core/types';
import type { Batcher } from '@domain/codec/Batcher';
import { buildEntity, type Entity } from '@domain/entities/Entity';
import { emptyAddress } from '@domain/entities/Address';
import { NAME_TYPES } from '@shared/constants';
import fs from 'fs';
import path from 'path';

const args = process.argv.slice(2);
const fileIdx = args.indexOf('--file');
const defaultFile = path.resolve(config.registry.dataDir, config.registry.inputFile);
const filePath = path.resolve(fileIdx !== -1 && args[fileIdx + 1] ? args[fileIdx + 1] : defaultFile);

const ASSOCIATIONS: ReadonlyArray<[documentNumber: string, name: string, city: string, zip: string]> = [
  ['N00000000001', 'HERON POINT HOMEOWNERS ASSOCIATION, INC.', 'NAPLES', '34108'],
  ['N00000000002', 'SAWGRASS LANDING COMMUNITY ASSOCIATION INC', 'NAPLES', '34114'],
  ['N00000000003', 'CYPRESS HOLLOW CLUB INC', 'BONITA SPRINGS', '34134'],
  ['N00000000004', 'MANGROVE BEND CONDOMINIUM ASSOCIATION, INC.', 'BONITA SPRINGS', '34135'],
  ['N00000000005', 'OSPREY RIDGE MASTER ASSOCIATION INC', 'ESTERO', '33913'],
];

function sampleEntity([documentNumber, name, city, zip]: (typeof ASSOCIATIONS)[number]): Entity {
  const address = { ...emptyAddress(), line1: '100 MAIN ST', city, state: 'FL', postalCode: zip, country: 'US' };
  return buildEntity({
    documentNumber,
    name,
    status: 'ACTIVE',
    entityType: 'DOMNP',
    principalAddress: address,
    mailingAddress: address,
    fileDate: new Date(Date.UTC(2013, 0, 15)),
    registeredAgent: { name: 'SAMPLE AGENT SERVICES', nameType: NAME_TYPES.CORPORATION, address },
    officers: [
      {
        title: 'P',
        nameType: NAME_TYPES.PERSON,
        name: 'DOE, JANE',
        address: { ...emptyAddress(), line1: '100 MAIN ST', city, state: 'FL', postalCode: zip },
      },
    ],
  });
}

function main(): void {
  const batcher = container.resolve<Batcher>(TOKENS.Batcher);
  const entities = ASSOCIATIONS.map(sampleEntity);
  const content = [...batcher.segments(entities)].join('');

  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, content, 'utf-8');

  // eslint-disable-next-line no-console
  console.log(`Created ${filePath} with ${entities.length} sample associations`);
}

main();
