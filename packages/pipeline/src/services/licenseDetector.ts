import { readdir, readFile } from "node:fs/promises";
import { join } from "node:path";
import type { LicenseType } from "@bundlemeta/common";

const LICENSE_PREFIXES = ["LICENSE", "LICENCE", "COPYING"];
const SCAN_CHARS = 5000;

interface LicenseRule {
  license: LicenseType;
  /** Every group must match; a group matches when any of its phrases occurs */
  allOf: string[][];
}

const CONTENT_RULES: LicenseRule[] = [
  { license: "MIT", allOf: [["mit license", "permission is hereby granted"]] },
  { license: "APACHE-2.0", allOf: [["apache license"], ["version 2.0"]] },
  { license: "GPL-3.0", allOf: [["gnu general public license"], ["version 3"]] },
  { license: "GPL", allOf: [["gnu general public license"]] },
  { license: "BSD", allOf: [["bsd license", "redistribution and use in source and binary forms"]] },
  { license: "MPL-2.0", allOf: [["mozilla public license"], ["version 2.0"]] },
  { license: "UNLICENSE", allOf: [["the unlicense", "this is free and unencumbered software"]] },
];

const NAME_HINTS: [string, LicenseType][] = [
  ["MIT", "MIT"],
  ["APACHE", "APACHE-2.0"],
  ["GPL", "GPL"],
  ["BSD", "BSD"],
  ["MPL", "MPL-2.0"],
];

export function isLicenseFileName(name: string): boolean {
  const upper = name.toUpperCase();
  return LICENSE_PREFIXES.some((prefix) => upper.startsWith(prefix));
}

/**
 * Classify license text by keyword rules, then by hints in the file name.
 */
export function classifyLicense(text: string, fileName = ""): LicenseType {
  const head = text.slice(0, SCAN_CHARS).toLowerCase();
  for (const rule of CONTENT_RULES) {
    if (rule.allOf.every((group) => group.some((phrase) => head.includes(phrase)))) {
      return rule.license;
    }
  }

  const upperName = fileName.toUpperCase();
  for (const [hint, license] of NAME_HINTS) {
    if (upperName.includes(hint)) return license;
  }
  return "UNKNOWN";
}

/**
 * Root-level LICENSE, LICENCE or COPYING file detection. The shortest
 * candidate name wins; no candidate or an unreadable one is UNKNOWN.
 */
export async function detectLicense(repoRoot: string): Promise<LicenseType> {
  let candidates: string[];
  try {
    const entries = await readdir(repoRoot, { withFileTypes: true });
    candidates = entries.filter((e) => e.isFile() && isLicenseFileName(e.name)).map((e) => e.name);
  } catch {
    return "UNKNOWN";
  }
  if (candidates.length === 0) return "UNKNOWN";

  candidates.sort((a, b) => a.length - b.length || (a < b ? -1 : a > b ? 1 : 0));
  const target = candidates[0];

  try {
    const text = await readFile(join(repoRoot, target), "utf8");
    return classifyLicense(text, target);
  } catch {
    return "UNKNOWN";
  }
}
