/**
 * @fileoverview Inflammation Table
 *
 * Rectangular grid of measurements: one row per patient, one column per day.
 * Values live in a contiguous row-major Float64Array; instances are never
 * mutated after construction, every transformation returns a new table.
 *
 * @module domain/inflammation/inflammation-table
 */

import {
  IndexOutOfRangeError,
  InvalidTableTypeError,
  TableShapeError,
} from '@inflammation/core';
import { TableShapeSchema, type TableShape } from '@inflammation/types';

/** Nested-array form of a table, as produced by the CSV loader */
export type TableRows = ReadonlyArray<ReadonlyArray<number>>;

/** Anything the statistics accept as a table */
export type TableInput = InflammationTable | TableRows;

/** Read-only numeric vector handed to reducers */
export type Vector = ArrayLike<number>;

export class InflammationTable {
  private readonly data: Float64Array;

  readonly rows: number;

  readonly cols: number;

  private constructor(data: Float64Array, rows: number, cols: number) {
    this.data = data;
    this.rows = rows;
    this.cols = cols;
  }

  /**
   * Build a table from a value of unknown shape.
   *
   * @throws {InvalidTableTypeError} not an array, or a cell that is not a number
   * @throws {TableShapeError} not exactly 2-dimensional, or ragged rows
   */
  static from(input: unknown): InflammationTable {
    if (input instanceof InflammationTable) {
      return input;
    }
    if (!Array.isArray(input)) {
      throw new InvalidTableTypeError();
    }

    // Holes in sparse arrays read as undefined
    const rowList: unknown[][] = [];
    for (let i = 0; i < input.length; i++) {
      const row: unknown = input[i];
      if (row === undefined) {
        throw new TableShapeError(`row ${i} is missing`);
      }
      if (!Array.isArray(row)) {
        throw new TableShapeError();
      }
      rowList.push(row);
    }

    const rows = rowList.length;
    const cols = rowList[0]?.length ?? 0;
    const data = new Float64Array(rows * cols);

    for (let i = 0; i < rows; i++) {
      const row = rowList[i] ?? [];
      if (row.length !== cols) {
        throw new TableShapeError(`row ${i} has ${row.length} values, expected ${cols}`);
      }
      for (let j = 0; j < cols; j++) {
        const cell: unknown = row[j];
        if (Array.isArray(cell)) {
          throw new TableShapeError();
        }
        if (typeof cell !== 'number') {
          throw new InvalidTableTypeError(`cell (${i}, ${j}) is not a number`);
        }
        data[i * cols + j] = cell;
      }
    }

    return new InflammationTable(data, rows, cols);
  }

  static fromRows(rows: TableRows): InflammationTable {
    return InflammationTable.from(rows);
  }

  /**
   * Wrap a row-major buffer. The values are copied.
   */
  static fromBuffer(values: Vector, rows: number, cols: number): InflammationTable {
    const shape = TableShapeSchema.safeParse({ rows, cols });
    if (!shape.success) {
      throw new TableShapeError(`invalid table shape ${rows}x${cols}`);
    }
    if (values.length !== rows * cols) {
      throw new TableShapeError(
        `buffer holds ${values.length} values, shape ${rows}x${cols} needs ${rows * cols}`
      );
    }
    return new InflammationTable(Float64Array.from(values), rows, cols);
  }

  get shape(): TableShape {
    return { rows: this.rows, cols: this.cols };
  }

  get(row: number, col: number): number {
    this.checkRow(row);
    if (!Number.isInteger(col) || col < 0 || col >= this.cols) {
      throw new IndexOutOfRangeError(`day index ${col} out of range`, col, this.cols);
    }
    return this.data[row * this.cols + col] ?? Number.NaN;
  }

  row(index: number): number[] {
    this.checkRow(index);
    return Array.from(this.rowView(index));
  }

  toRows(): number[][] {
    const out: number[][] = [];
    for (let i = 0; i < this.rows; i++) {
      out.push(Array.from(this.rowView(i)));
    }
    return out;
  }

  /**
   * One value per row, reduced across the columns (days)
   */
  reduceRows(reducer: (values: Vector, row: number) => number): number[] {
    const out: number[] = [];
    for (let i = 0; i < this.rows; i++) {
      out.push(reducer(this.rowView(i), i));
    }
    return out;
  }

  /**
   * One value per column, reduced down the rows (patients).
   * Each call gets its own copy of the column.
   */
  reduceColumns(reducer: (values: Vector, col: number) => number): number[] {
    const out: number[] = [];
    for (let j = 0; j < this.cols; j++) {
      const scratch = new Float64Array(this.rows);
      for (let i = 0; i < this.rows; i++) {
        scratch[i] = this.data[i * this.cols + j] ?? Number.NaN;
      }
      out.push(reducer(scratch, j));
    }
    return out;
  }

  map(fn: (value: number, row: number, col: number) => number): InflammationTable {
    const out = new Float64Array(this.data.length);
    for (let i = 0; i < this.rows; i++) {
      for (let j = 0; j < this.cols; j++) {
        const k = i * this.cols + j;
        out[k] = fn(this.data[k] ?? Number.NaN, i, j);
      }
    }
    return new InflammationTable(out, this.rows, this.cols);
  }

  /**
   * First cell matching the predicate, in row-major order
   */
  find(predicate: (value: number) => boolean): { row: number; col: number } | undefined {
    for (let k = 0; k < this.data.length; k++) {
      if (predicate(this.data[k] ?? Number.NaN)) {
        return { row: Math.floor(k / this.cols), col: k % this.cols };
      }
    }
    return undefined;
  }

  private rowView(index: number): Float64Array {
    const start = index * this.cols;
    return this.data.subarray(start, start + this.cols);
  }

  private checkRow(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.rows) {
      throw new IndexOutOfRangeError(`patient index ${index} out of range`, index, this.rows);
    }
  }
}

/**
 * Accept either a table or its nested-array form
 */
export function toTable(input: TableInput): InflammationTable {
  return input instanceof InflammationTable ? input : InflammationTable.fromRows(input);
}
