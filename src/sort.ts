export type SortDirection = "asc" | "desc";

/** One sort criterion; later criteria break ties of earlier ones. */
export type SortKey<T> = Readonly<{
  by: (item: T) => string | number;
  direction?: SortDirection;
}>;

function compareValues(a: string | number, b: string | number): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Returns a sorted copy. Equal items keep their input order, so callers can
 * rely on insertion order as the final tie-break.
 */
export function sortByKeys<T>(
  items: readonly T[],
  ...keys: readonly SortKey<T>[]
): T[] {
  return [...items].sort((a, b) => {
    for (const key of keys) {
      const c = compareValues(key.by(a), key.by(b));
      if (c !== 0) return key.direction === "desc" ? -c : c;
    }
    return 0;
  });
}

export function sortByKey<T>(
  items: readonly T[],
  by: (item: T) => string | number,
  direction: SortDirection = "asc",
): T[] {
  return sortByKeys(items, { by, direction });
}
