import type { ParsedVersion, VersionComparison } from "./types.js";

const dottedIntegerPattern = /^\d+(\.\d+)*$/;

export function normalizeVersionLiteral(raw: string): string {
  return raw.trim().replace(/^v/i, "");
}

export function parseVersion(literal: string): ParsedVersion {
  const normalized = normalizeVersionLiteral(literal);
  if (!dottedIntegerPattern.test(normalized)) {
    return { literal, parts: null };
  }

  const parts = normalized.split(".").map((segment) => Number.parseInt(segment, 10));
  if (parts.some((part) => !Number.isSafeInteger(part))) {
    return { literal, parts: null };
  }

  return { literal, parts };
}

function sign(value: number): -1 | 0 | 1 {
  if (value < 0) {
    return -1;
  }
  return value > 0 ? 1 : 0;
}

function compareNumeric(left: number[], right: number[]): -1 | 0 | 1 {
  const length = Math.max(left.length, right.length);
  for (let index = 0; index < length; index += 1) {
    const difference = (left[index] ?? 0) - (right[index] ?? 0);
    if (difference !== 0) {
      return sign(difference);
    }
  }
  return 0;
}

function compareLexical(left: string, right: string): -1 | 0 | 1 {
  if (left < right) {
    return -1;
  }
  return left > right ? 1 : 0;
}

/**
 * Orders two version literals.
 *
 * Both sides are compared as zero-padded dotted integers when both parse; if
 * either side does not, both are compared as trimmed strings (code-unit order)
 * for that call. The two paths are never mixed.
 */
export function describeComparison(left: string, right: string): VersionComparison {
  const parsedLeft = parseVersion(left);
  const parsedRight = parseVersion(right);

  if (parsedLeft.parts && parsedRight.parts) {
    return { result: compareNumeric(parsedLeft.parts, parsedRight.parts), path: "numeric" };
  }

  return { result: compareLexical(left.trim(), right.trim()), path: "lexical" };
}

export function compareVersions(left: string, right: string): -1 | 0 | 1 {
  return describeComparison(left, right).result;
}
