/**
 * Record Codec — Fixed-Width Line ⇄ Entity
 * Layer: Domain
 * Pattern: Adapter Pattern (implements IRecordCodec<Entity>)
 *
 * One generic encode/decode pair driven by the FieldLayout column table;
 * there is no per-field padding code anywhere else.
 *
 * Decoding:
 *   - the line must be exactly `totalWidth` long, else FormatError
 *     (LengthMismatch);
 *   - each column is sliced at its offset and trailing spaces are trimmed
 *     (embedded spaces are kept);
 *   - officer strides are read from `headEnd` until `maxOfficers` strides
 *     have been read or a stride's title column is blank. Officers are never
 *     sparse: nothing after the first blank stride is looked at.
 *
 * Encoding:
 *   - a value longer than its column is cut, a shorter one is space-padded;
 *   - filler columns are written blank;
 *   - the officer list ends at the first officer whose title column would be
 *     blank, so strides are never sparse and decode reads back exactly what
 *     was written;
 *   - officers beyond `maxOfficers` are dropped, unused strides are blank;
 *   - the result is always exactly `totalWidth` long.
 */
import type { Entity } from '@domain/entities/Entity';
import type { Officer } from '@domain/entities/Officer';
import type { IRecordCodec } from '@domain/interfaces/IRecordCodec';
import type { PlacedField } from '@domain/layout/FieldLayout';
import type { EntityFieldName, OfficerFieldName, RegistryLayout } from '@domain/layout/registryLayout';
import { FormatError } from '@shared/errors/AppError';

import { entityFromFields, entityToFields, officerFromFields, officerToFields } from './entityFields';

export type DecodeOutcome =
  | { ok: true; lineNumber: number; entity: Entity }
  | { ok: false; lineNumber: number; error: FormatError };

const TRAILING_SPACES = /[ ]+$/;
const BLANK = /^ *$/;
const LINE_BREAKS = /[\r\n]/g;

/** Hard cut or right-pad to exactly `width` columns. */
export function fit(value: string, width: number): string {
  const flat = value.replace(LINE_BREAKS, ' ');
  return flat.length >= width ? flat.slice(0, width) : flat.padEnd(width, ' ');
}

export class RecordCodec implements IRecordCodec<Entity> {
  private readonly blankStride: string;
  private readonly titleWidth: number;

  constructor(private readonly layout: RegistryLayout) {
    this.blankStride = ' '.repeat(layout.strideWidth);
    this.titleWidth = layout.strideFields.find((f) => f.name === layout.titleField)?.width ?? 0;
  }

  get recordWidth(): number {
    return this.layout.totalWidth;
  }

  decode(line: string): Entity {
    const { layout } = this;
    if (line.length !== layout.totalWidth) {
      throw new FormatError('LengthMismatch', layout.totalWidth, line.length);
    }

    const head = readColumns(line, 0, layout.headFields);
    const officers: Officer[] = [];

    for (let i = 0; i < layout.maxOfficers; i++) {
      const stride = readColumns(line, layout.officerOffset(i), layout.strideFields);
      if (stride(layout.titleField) === '') break;
      officers.push(officerFromFields(stride));
    }

    return entityFromFields(head, officers);
  }

  encode(entity: Entity): string {
    const { layout } = this;
    const parts: string[] = [writeColumns(entityToFields(entity), layout.headFields, layout.headEnd)];
    const officers = this.writableOfficers(entity.officers);

    for (let i = 0; i < layout.maxOfficers; i++) {
      const officer = officers[i];
      parts.push(
        officer ? writeColumns(officerToFields(officer), layout.strideFields, layout.strideWidth) : this.blankStride,
      );
    }

    parts.push(' '.repeat(layout.fillerWidth));
    return parts.join('');
  }

  /** Officers up to (not including) the first one whose title would encode blank. */
  private writableOfficers(officers: readonly Officer[]): readonly Officer[] {
    const end = officers.findIndex((officer) => BLANK.test(fit(officer.title, this.titleWidth)));
    return end === -1 ? officers : officers.slice(0, end);
  }

  /**
   * Decode a whole batch. A bad line yields a failed outcome instead of
   * aborting; outcomes keep input order and carry 1-based line numbers.
   */
  decodeAll(lines: Iterable<string>, firstLineNumber = 1): DecodeOutcome[] {
    const outcomes: DecodeOutcome[] = [];
    let lineNumber = firstLineNumber;
    for (const line of lines) {
      outcomes.push(this.decodeLine(line, lineNumber));
      lineNumber++;
    }
    return outcomes;
  }

  decodeLine(line: string, lineNumber: number): DecodeOutcome {
    try {
      return { ok: true, lineNumber, entity: this.decode(line) };
    } catch (err) {
      if (err instanceof FormatError) return { ok: false, lineNumber, error: err.atLine(lineNumber) };
      throw err;
    }
  }
}

function readColumns<N extends string>(
  line: string,
  base: number,
  fields: ReadonlyArray<PlacedField<N>>,
): (name: N) => string {
  const values = new Map<N, string>();
  for (const field of fields) {
    const start = base + field.offset;
    values.set(field.name, line.slice(start, start + field.width).replace(TRAILING_SPACES, ''));
  }
  // Fields the layout leaves out have no columns and read as empty.
  return (name) => values.get(name) ?? '';
}

function writeColumns<N extends EntityFieldName | OfficerFieldName>(
  values: Partial<Record<N, string>>,
  fields: ReadonlyArray<PlacedField<N>>,
  regionWidth: number,
): string {
  let region = '';
  for (const field of fields) {
    // Pad over any filler before this field.
    region = region.padEnd(field.offset, ' ') + fit(values[field.name] ?? '', field.width);
  }
  return region.padEnd(regionWidth, ' ');
}
