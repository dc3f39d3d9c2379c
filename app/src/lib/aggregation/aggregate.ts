export type AggregationRow = {
  key: string;
  total: number;
};

export type GroupedSum = {
  rows: AggregationRow[];
  total: number;
  filledCount: number;
};

export const fillMissingWithZero = (values: (number | null)[]): number[] =>
  values.map((value) => (value === null || Number.isNaN(value) ? 0 : value));

/**
 * Sums `values` per distinct key. Rows come back by total, largest first;
 * equal totals keep the order in which their keys first appeared.
 */
export const sumByGroup = (keys: string[], values: (number | null)[]): GroupedSum => {
  const filled = fillMissingWithZero(values);
  const filledCount = values.filter((value) => value === null || Number.isNaN(value)).length;
  const totals = new Map<string, number>();

  keys.forEach((key, index) => {
    totals.set(key, (totals.get(key) ?? 0) + (filled[index] ?? 0));
  });

  const rows = Array.from(totals.entries())
    .map(([key, total]) => ({ key, total }))
    .sort((a, b) => b.total - a.total);

  return {
    rows,
    total: rows.reduce((sum, row) => sum + row.total, 0),
    filledCount
  };
};
