/**
 * Complexity label aggregation.
 *
 * Cost labels are informal strings, so aggregation is a heuristic: each label
 * is scanned for known patterns, and the label containing the highest-ranked
 * pattern wins. Labels are returned verbatim, never rewritten.
 */

/**
 * Known patterns, cheapest first.
 */
export const COMPLEXITY_RANKING: ReadonlyArray<string> = Object.freeze([
  "O(1)",
  "O(log n)",
  "O(n)",
  "O(n log n)",
  "O(n * max_order)",
  "O(n * window)",
  "O(n * depth)",
  "O(n^2)",
  "O(|Σ|^order)",
  "Incomputable",
]);

/** Result for an empty label list */
export const DEFAULT_COMPLEXITY = "O(n)";

/**
 * Rank of the highest pattern contained in `label`, or -1.
 */
export function complexityRank(label: string): number {
  let best = -1;
  COMPLEXITY_RANKING.forEach((pattern, rank) => {
    if (label.includes(pattern) && rank > best) {
      best = rank;
    }
  });
  return best;
}

/**
 * Pick the dominant label from a list of cost labels.
 *
 * Ties keep the earlier label. When no label contains a known pattern, the
 * first label is returned as-is.
 *
 * @example
 *   combineComplexity(["O(1)", "O(n)", "O(n log n)"]); // "O(n log n)"
 *   combineComplexity(["O(n) amortized", "O(n)"]);     // "O(n) amortized"
 */
export function combineComplexity(labels: ReadonlyArray<string>): string {
  const [first] = labels;
  if (first === undefined) {
    return DEFAULT_COMPLEXITY;
  }

  let result = first;
  let bestRank = -1;
  for (const label of labels) {
    const rank = complexityRank(label);
    if (rank > bestRank) {
      bestRank = rank;
      result = label;
    }
  }
  return result;
}
