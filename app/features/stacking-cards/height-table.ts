/**
 * Measured content height per card id.
 * A missing entry means the card has not been measured yet, which is not the same as a height of 0.
 */
export type HeightTable = ReadonlyMap<string, number>;

export function createHeightTable(
  entries: Iterable<readonly [string, number]> = [],
): HeightTable {
  return new Map(entries);
}

export function getKnownHeight(
  table: HeightTable,
  itemId: string,
): number | undefined {
  return table.get(itemId);
}

const isValidHeight = (height: number) =>
  Number.isFinite(height) && height >= 0;

/**
 * Records a measured height for a card. The latest report for an id wins.
 * Returns the same table when nothing changed so that state setters can bail out of re-rendering.
 */
export function reportHeight(
  table: HeightTable,
  itemId: string,
  height: number,
): HeightTable {
  if (!isValidHeight(height)) {
    console.warn('Ignoring invalid card height', { itemId, height });
    return table;
  }

  if (table.get(itemId) === height) {
    return table;
  }

  const next = new Map(table);
  next.set(itemId, height);
  return next;
}
