import { describe, expect, it, vi } from 'vitest';

import { createHeightTable, getKnownHeight, reportHeight } from './height-table';

describe('reportHeight', () => {
  it('adds a height for a card that was not measured yet', () => {
    const table = reportHeight(createHeightTable(), 'a', 120);

    expect(getKnownHeight(table, 'a')).toBe(120);
  });

  it('keeps the latest height reported for a card', () => {
    let table = createHeightTable();
    table = reportHeight(table, 'a', 120);
    table = reportHeight(table, 'a', 96);

    expect(getKnownHeight(table, 'a')).toBe(96);
    expect(table.size).toBe(1);
  });

  it('does not modify the table it was given', () => {
    const table = createHeightTable([['a', 120]]);

    const next = reportHeight(table, 'b', 40);

    expect(getKnownHeight(table, 'b')).toBeUndefined();
    expect(getKnownHeight(next, 'b')).toBe(40);
  });

  it('returns the same table when the height is unchanged', () => {
    const table = createHeightTable([['a', 120]]);

    expect(reportHeight(table, 'a', 120)).toBe(table);
  });

  it('stores a height of zero as a known height', () => {
    const table = reportHeight(createHeightTable(), 'a', 0);

    expect(getKnownHeight(table, 'a')).toBe(0);
  });

  it.each([Number.NaN, -1, Number.POSITIVE_INFINITY])(
    'ignores an invalid height (%s)',
    (height) => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      const table = createHeightTable([['a', 120]]);

      expect(reportHeight(table, 'a', height)).toBe(table);
      expect(warn).toHaveBeenCalledWith('Ignoring invalid card height', {
        itemId: 'a',
        height,
      });
    },
  );
});

describe('getKnownHeight', () => {
  it('returns undefined for a card that was never measured', () => {
    expect(getKnownHeight(createHeightTable(), 'missing')).toBeUndefined();
  });
});
