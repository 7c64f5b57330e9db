/**
 * Record Codec Interface
 * Layer: Domain
 * Pattern: Adapter Pattern
 *
 * Converts one plug shape (a raw fixed-width line) into another (a domain
 * value) and back. The ingestion pipeline only calls `decode()`/`encode()`;
 * which layout and which record type sit behind them is the codec's business.
 */
export interface IRecordCodec<T> {
  /** Decode one record line (no trailing newline). Throws FormatError on a malformed line. */
  decode(line: string): T;

  /** Encode one value into a line of exactly the layout's total width. Never throws. */
  encode(value: T): string;
}
