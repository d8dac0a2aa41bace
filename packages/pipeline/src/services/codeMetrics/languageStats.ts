import type { LanguageDistribution } from "@bundlemeta/common";
import type { LineCountStats } from "./LineCounter";

const SHARE_DECIMALS = 6;
const STACK_SIZE = 3;

function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/**
 * language -> (code + comment) / total, rounded to 6 decimals.
 * Languages without lines are omitted; an empty map when the total is 0.
 */
export function languageDistribution(languages: Record<string, LineCountStats>): LanguageDistribution {
  const lines = Object.entries(languages).map(([language, s]) => [language, s.code + s.comment] as const);
  const total = lines.reduce((acc, [, n]) => acc + n, 0);

  const distribution: LanguageDistribution = {};
  if (total === 0) return distribution;
  for (const [language, n] of lines) {
    if (n > 0) distribution[language] = roundTo(n / total, SHARE_DECIMALS);
  }
  return distribution;
}

/** Top three languages by share, e.g. "TypeScript (75%), JSON (25%)" */
export function renderStack(distribution: LanguageDistribution): string {
  return Object.entries(distribution)
    .sort((a, b) => b[1] - a[1])
    .slice(0, STACK_SIZE)
    .map(([language, share]) => `${language} (${Math.round(share * 100)}%)`)
    .join(", ");
}

export function docstringRatio(summary: LineCountStats): number {
  return summary.code > 0 ? summary.comment / summary.code : 0;
}
