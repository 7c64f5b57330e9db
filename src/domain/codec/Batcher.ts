/**
 * Batcher — Positional Chunking + Segment Encoding
 * Layer: Domain
 *
 * Splits an ordered list of entities into fixed-size slices by index (the
 * last slice may be shorter) and renders each slice as one text segment: the
 * encoded line of every member, in order, each followed by the line
 * separator.
 *
 * Both `chunks()` and `segments()` are lazy and restartable: every iteration
 * walks the input again and yields the same partition.
 */
import type { Entity } from '@domain/entities/Entity';
import type { IRecordCodec } from '@domain/interfaces/IRecordCodec';
import { LINE_SEPARATOR } from '@shared/constants';
import { ValidationError } from '@shared/errors/AppError';

export interface BatcherOptions {
  chunkSize: number;
  lineSeparator?: string;
}

export class Batcher {
  readonly chunkSize: number;
  readonly lineSeparator: string;

  constructor(
    private readonly codec: IRecordCodec<Entity>,
    options: BatcherOptions,
  ) {
    if (!Number.isInteger(options.chunkSize) || options.chunkSize <= 0) {
      throw new ValidationError(`chunkSize must be a positive integer, got ${options.chunkSize}`);
    }
    this.chunkSize = options.chunkSize;
    this.lineSeparator = options.lineSeparator ?? LINE_SEPARATOR;
  }

  chunks(entities: readonly Entity[]): Iterable<readonly Entity[]> {
    const { chunkSize } = this;
    return {
      *[Symbol.iterator]() {
        for (let start = 0; start < entities.length; start += chunkSize) {
          yield entities.slice(start, start + chunkSize);
        }
      },
    };
  }

  segments(entities: readonly Entity[]): Iterable<string> {
    const chunks = this.chunks(entities);
    const encodeChunk = (chunk: readonly Entity[]): string => this.encodeChunk(chunk);
    return {
      *[Symbol.iterator]() {
        for (const chunk of chunks) {
          yield encodeChunk(chunk);
        }
      },
    };
  }

  encodeChunk(chunk: readonly Entity[]): string {
    return chunk.map((entity) => this.codec.encode(entity) + this.lineSeparator).join('');
  }
}
