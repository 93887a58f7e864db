/**
 * @fileoverview InflammationTable Unit Tests
 *
 * @module domain/__tests__/inflammation-table
 */

import { describe, it, expect } from 'vitest';
import {
  IndexOutOfRangeError,
  InvalidTableTypeError,
  TableShapeError,
} from '@inflammation/core';
import { InflammationTable, toTable } from '../inflammation/inflammation-table.js';

describe('InflammationTable', () => {
  describe('fromRows()', () => {
    it('stores patients as rows and days as columns', () => {
      const table = InflammationTable.fromRows([
        [0, 1, 2],
        [3, 4, 5],
      ]);

      expect(table.shape).toEqual({ rows: 2, cols: 3 });
      expect(table.get(1, 0)).toBe(3);
      expect(table.get(0, 2)).toBe(2);
    });

    it('copies the input so later changes do not leak in', () => {
      const firstPatient = [1, 2];
      const table = InflammationTable.fromRows([firstPatient]);
      firstPatient[0] = 99;

      expect(table.get(0, 0)).toBe(1);
    });

    it('builds an empty table from an empty list', () => {
      const table = InflammationTable.fromRows([]);
      expect(table.shape).toEqual({ rows: 0, cols: 0 });
      expect(table.toRows()).toEqual([]);
    });

    it('rejects ragged rows', () => {
      expect(() => InflammationTable.fromRows([[1, 2], [3]])).toThrow(
        new TableShapeError('row 1 has 1 values, expected 2')
      );
    });
  });

  describe('from()', () => {
    it('returns an existing table unchanged', () => {
      const table = InflammationTable.fromRows([[1]]);
      expect(InflammationTable.from(table)).toBe(table);
    });

    it('rejects values that are not arrays', () => {
      expect(() => InflammationTable.from('1,2,3')).toThrow(InvalidTableTypeError);
      expect(() => InflammationTable.from(null)).toThrow(InvalidTableTypeError);
      expect(() => InflammationTable.from(new Float64Array(4))).toThrow(InvalidTableTypeError);
    });

    it('rejects one-dimensional input', () => {
      expect(() => InflammationTable.from([1, 2, 3])).toThrow(TableShapeError);
    });

    it('rejects three-dimensional input', () => {
      expect(() => InflammationTable.from([[[1], [2]]])).toThrow(TableShapeError);
    });

    it('rejects non-numeric cells', () => {
      expect(() => InflammationTable.from([[1, '2']])).toThrow(
        new InvalidTableTypeError('cell (0, 1) is not a number')
      );
    });

    it('rejects a hole in a sparse row', () => {
      expect(() => InflammationTable.from([[1, , 3]])).toThrow(
        new InvalidTableTypeError('cell (0, 1) is not a number')
      );
    });

    it('rejects a missing row in a sparse table', () => {
      expect(() => InflammationTable.from([[1, 2], , [3, 4]])).toThrow(
        new TableShapeError('row 1 is missing')
      );
    });
  });

  describe('fromBuffer()', () => {
    it('wraps a row-major buffer', () => {
      const table = InflammationTable.fromBuffer([1, 2, 3, 4, 5, 6], 2, 3);
      expect(table.toRows()).toEqual([
        [1, 2, 3],
        [4, 5, 6],
      ]);
    });

    it('rejects a buffer of the wrong length', () => {
      expect(() => InflammationTable.fromBuffer([1, 2, 3], 2, 2)).toThrow(
        new TableShapeError('buffer holds 3 values, shape 2x2 needs 4')
      );
    });

    it('rejects an invalid shape', () => {
      expect(() => InflammationTable.fromBuffer([], -1, 2)).toThrow(
        new TableShapeError('invalid table shape -1x2')
      );
    });
  });

  describe('indexing', () => {
    const table = InflammationTable.fromRows([
      [1, 2],
      [3, 4],
    ]);

    it('returns a copy of a row', () => {
      const row = table.row(1);
      row[0] = 42;

      expect(row).toEqual([42, 4]);
      expect(table.row(1)).toEqual([3, 4]);
    });

    it('rejects out of range patients', () => {
      expect(() => table.row(2)).toThrow(IndexOutOfRangeError);
      expect(() => table.row(-1)).toThrow(IndexOutOfRangeError);
      expect(() => table.row(0.5)).toThrow(IndexOutOfRangeError);
    });

    it('rejects out of range days', () => {
      expect(() => table.get(0, 2)).toThrow(new IndexOutOfRangeError('day index 2 out of range', 2, 2));
    });
  });

  describe('axis reductions', () => {
    const table = InflammationTable.fromRows([
      [1, 2, 3],
      [4, 5, 6],
    ]);
    const sum = (values: ArrayLike<number>): number => {
      let total = 0;
      for (let i = 0; i < values.length; i++) total += values[i] ?? 0;
      return total;
    };

    it('reduces each row across the days', () => {
      expect(table.reduceRows(sum)).toEqual([6, 15]);
    });

    it('reduces each column down the patients', () => {
      expect(table.reduceColumns(sum)).toEqual([5, 7, 9]);
    });

    it('passes the axis index to the reducer', () => {
      expect(table.reduceColumns((_values, col) => col)).toEqual([0, 1, 2]);
      expect(table.reduceRows((_values, row) => row * 10)).toEqual([0, 10]);
    });

    it('gives each column its own values', () => {
      const seen: ArrayLike<number>[] = [];
      table.reduceColumns((values) => {
        seen.push(values);
        return 0;
      });
      expect(seen.map((values) => Array.from(values))).toEqual([
        [1, 4],
        [2, 5],
        [3, 6],
      ]);
    });
  });

  describe('map()', () => {
    it('returns a new table and leaves the original alone', () => {
      const table = InflammationTable.fromRows([[1, 2]]);
      const doubled = table.map((value) => value * 2);

      expect(doubled).not.toBe(table);
      expect(doubled.toRows()).toEqual([[2, 4]]);
      expect(table.toRows()).toEqual([[1, 2]]);
    });

    it('passes row and column positions', () => {
      const table = InflammationTable.fromRows([
        [0, 0],
        [0, 0],
      ]);
      expect(table.map((_v, row, col) => row * 10 + col).toRows()).toEqual([
        [0, 1],
        [10, 11],
      ]);
    });
  });

  describe('find()', () => {
    it('locates the first matching cell in row-major order', () => {
      const table = InflammationTable.fromRows([
        [1, 2, 3],
        [4, 9, 9],
      ]);
      expect(table.find((value) => value > 5)).toEqual({ row: 1, col: 1 });
    });

    it('returns undefined when nothing matches', () => {
      expect(InflammationTable.fromRows([[1]]).find((value) => value < 0)).toBeUndefined();
    });
  });
});

describe('toTable', () => {
  it('converts nested arrays', () => {
    expect(toTable([[5, 6]]).shape).toEqual({ rows: 1, cols: 2 });
  });

  it('passes tables through', () => {
    const table = InflammationTable.fromRows([[5]]);
    expect(toTable(table)).toBe(table);
  });
});
