import type { Cell } from './cell';

/**
 * Converts between raw cells and one typed cell. Implemented once per cell
 * type so the channel can send and receive any of them.
 *
 * All three methods throw a ChannelError rather than return a partial value.
 */
export interface CellConverter<T, K = T> {
  readonly command: number;
  /** Parse the payload of a received cell. */
  fromCell (cell: Cell): T;
  /** Build (and validate) a typed cell from plain options. */
  fromKeywords (keywords: K): T;
  /** Serialize a typed cell for sending. */
  toCell (value: T): Cell;
}
