import { describe, it, expect } from 'vitest';
import { renderRows, renderValue, toCells } from '../../services/database/render-rows.js';

describe('renderRows', () => {
  it('renders one line per row with comma-separated values', () => {
    expect(renderRows([[1, 'Rock'], [2, 'Jazz']])).toBe('1, Rock\n2, Jazz');
  });

  it('renders an empty result set as an empty string', () => {
    expect(renderRows([])).toBe('');
  });

  it('renders nulls, blobs and dates', () => {
    expect(renderRows([[null, new Uint8Array(3), new Date(Date.UTC(2024, 0, 2))]])).toBe(
      'NULL, <blob 3 bytes>, 2024-01-02T00:00:00.000Z'
    );
  });
});

describe('renderValue', () => {
  it('renders numbers, bigints and objects', () => {
    expect(renderValue(0.99)).toBe('0.99');
    expect(renderValue(10n)).toBe('10');
    expect(renderValue({ a: 1 })).toBe('{"a":1}');
    expect(renderValue(undefined)).toBe('NULL');
  });
});

describe('toCells', () => {
  it('wraps a scalar row in an array', () => {
    expect(toCells(5)).toEqual([5]);
    expect(toCells([1, 2])).toEqual([1, 2]);
  });
});
