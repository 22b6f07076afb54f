export type ColorColumn = "income" | "expense" | "balance" | "budget";

// ColorBrewer 6-class sequential schemes, darkest first.
const GN_BU = ["#0868ac", "#43a2ca", "#7bccc4", "#a8ddb5", "#ccebc5", "#f0f9e8"];
const OR_RD = ["#b30000", "#e34a33", "#fc8d59", "#fdbb84", "#fdd49e", "#fef0d9"];
const BALANCE = "#555555";
// Budget columns are drawn as white boxes behind the spending.
const BUDGET = "#ffffff";

export const MAX_DISTINCT_COLORS = GN_BU.length;

/**
 * `n` colours for a series group: green-blue for income, orange-red for expense, grey
 * for balance, white for budget. At most six distinct colours; beyond that the palette repeats.
 */
export function getColors(column: ColorColumn, n: number): string[] {
  if (n <= 0) return [];

  const palette =
    column === "income" ? GN_BU : column === "expense" ? OR_RD : column === "budget" ? [BUDGET] : [BALANCE];
  const out: string[] = [];
  for (let i = 0; i < n; i++) out.push(palette[i % palette.length]);
  return out;
}
