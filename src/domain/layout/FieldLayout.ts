/**
 * Field Layout — Declarative Column Table
 * Layer: Domain
 *
 * A record type is described once, as data: the ordered head fields with
 * their widths, the ordered fields of one officer stride, how many strides the
 * tail region holds and the total record width. Offsets are derived, never
 * written by hand:
 *
 *   | head fields … | stride 0 | stride 1 | … | stride max-1 | filler |
 *   0            headEnd
 *
 * Either region may also hold unnamed filler entries (`{ filler: 64 }`): columns
 * that belong to no field, written blank and never read. They move every
 * later offset but have no name to look up.
 *
 *   officerOffset(i) = headEnd + i × strideWidth
 *
 * The layout holds no record data. Every inconsistency is reported with a
 * LayoutError from the constructor, so RecordCodec never has to validate
 * offsets while encoding or decoding.
 */
import { LayoutError } from '@shared/errors/AppError';

export interface FieldSpec<N extends string = string> {
  readonly name: N;
  readonly width: number;
}

/** Blank columns between two fields. */
export interface FillerSpec {
  readonly filler: number;
}

export type LayoutEntry<N extends string = string> = FieldSpec<N> | FillerSpec;

export interface PlacedField<N extends string = string> extends FieldSpec<N> {
  /** Offset from the start of the region (record for head, stride for officers). */
  readonly offset: number;
}

export interface FieldLayoutOptions<H extends string, S extends string> {
  totalWidth: number;
  head: ReadonlyArray<LayoutEntry<H>>;
  stride: ReadonlyArray<LayoutEntry<S>>;
  maxOfficers: number;
  /** Stride field whose blank value ends the officer list. */
  titleField: S;
}

export class FieldLayout<H extends string = string, S extends string = string> {
  readonly totalWidth: number;
  readonly headEnd: number;
  readonly strideWidth: number;
  readonly maxOfficers: number;
  readonly titleField: S;
  readonly headFields: ReadonlyArray<PlacedField<H>>;
  readonly strideFields: ReadonlyArray<PlacedField<S>>;

  private readonly headByName: ReadonlyMap<H, PlacedField<H>>;
  private readonly strideByName: ReadonlyMap<S, PlacedField<S>>;

  constructor(options: FieldLayoutOptions<H, S>) {
    const { totalWidth, maxOfficers, titleField } = options;

    if (!Number.isInteger(totalWidth) || totalWidth <= 0) {
      throw new LayoutError(`total width must be a positive integer, got ${totalWidth}`);
    }
    if (!Number.isInteger(maxOfficers) || maxOfficers < 0) {
      throw new LayoutError(`max officer count must be a non-negative integer, got ${maxOfficers}`);
    }

    const head = place(options.head, 'head');
    const stride = place(options.stride, 'officer stride');
    this.headFields = head.fields;
    this.strideFields = stride.fields;
    this.headByName = new Map(this.headFields.map((f) => [f.name, f]));
    this.strideByName = new Map(this.strideFields.map((f) => [f.name, f]));

    this.headEnd = head.width;
    this.strideWidth = stride.width;
    this.totalWidth = totalWidth;
    this.maxOfficers = maxOfficers;
    this.titleField = titleField;

    if (maxOfficers > 0 && !this.strideByName.has(titleField)) {
      throw new LayoutError(`officer stride has no "${titleField}" field to terminate the list`);
    }

    const used = this.headEnd + this.strideWidth * maxOfficers;
    if (used > totalWidth) {
      throw new LayoutError(
        `head (${this.headEnd}) + ${maxOfficers} × stride (${this.strideWidth}) = ${used} exceeds total width ${totalWidth}`,
      );
    }
  }

  /** Columns after the last officer stride that belong to no field. */
  get fillerWidth(): number {
    return this.totalWidth - this.headEnd - this.strideWidth * this.maxOfficers;
  }

  hasField(name: H): boolean {
    return this.headByName.has(name);
  }

  offsetOf(name: H): number {
    const field = this.headByName.get(name);
    if (!field) throw new LayoutError(`unknown head field "${name}"`);
    return field.offset;
  }

  widthOf(name: H): number {
    const field = this.headByName.get(name);
    if (!field) throw new LayoutError(`unknown head field "${name}"`);
    return field.width;
  }

  officerOffset(index: number): number {
    if (!Number.isInteger(index) || index < 0 || index >= this.maxOfficers) {
      throw new LayoutError(`officer index ${index} outside [0, ${this.maxOfficers})`);
    }
    return this.headEnd + index * this.strideWidth;
  }

  officerFieldOffset(index: number, name: S): number {
    const field = this.strideByName.get(name);
    if (!field) throw new LayoutError(`unknown officer field "${name}"`);
    return this.officerOffset(index) + field.offset;
  }
}

function isFiller<N extends string>(entry: LayoutEntry<N>): entry is FillerSpec {
  return 'filler' in entry;
}

function place<N extends string>(
  entries: ReadonlyArray<LayoutEntry<N>>,
  region: string,
): { fields: PlacedField<N>[]; width: number } {
  const seen = new Set<N>();
  const fields: PlacedField<N>[] = [];
  let offset = 0;

  for (const entry of entries) {
    if (isFiller(entry)) {
      if (!Number.isInteger(entry.filler) || entry.filler <= 0) {
        throw new LayoutError(`${region} filler at offset ${offset} has non-positive width ${entry.filler}`);
      }
      offset += entry.filler;
      continue;
    }
    if (!Number.isInteger(entry.width) || entry.width <= 0) {
      throw new LayoutError(`${region} field "${entry.name}" has non-positive width ${entry.width}`);
    }
    if (seen.has(entry.name)) {
      throw new LayoutError(`${region} field "${entry.name}" is declared twice`);
    }
    seen.add(entry.name);
    fields.push(Object.freeze({ name: entry.name, width: entry.width, offset }));
    offset += entry.width;
  }

  return { fields, width: offset };
}
