/**
 * Line and word level comparison of two extracted texts.
 */

const MAX_DIFFERENCES = 10;
const SIMILAR_THRESHOLD = 0.7;

export type LineDifference = {
  line: number;
  left?: string;
  right?: string;
};

export type TextComparison = {
  leftLines: number;
  rightLines: number;
  commonLines: number;
  addedLines: number;
  removedLines: number;
  /** 2 * common / (left + right) over non-empty lines; 1 when both are empty. */
  similarity: number;
  /** Shared distinct words over all distinct words, case-insensitive; the same either way round. */
  wordOverlapPercent: number;
  identical: boolean;
  similar: boolean;
  summary: string;
  differences: LineDifference[];
};

function contentLines(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

function uniqueWords(text: string): Set<string> {
  return new Set((text.toLowerCase().match(/\S+/g) ?? []));
}

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

export function compareTexts(left: string, right: string): TextComparison {
  const a = contentLines(left);
  const b = contentLines(right);

  const remaining = new Map<string, number>();
  for (const line of b) remaining.set(line, (remaining.get(line) ?? 0) + 1);
  let common = 0;
  for (const line of a) {
    const count = remaining.get(line) ?? 0;
    if (count > 0) {
      common++;
      remaining.set(line, count - 1);
    }
  }

  const total = a.length + b.length;
  const similarity = total === 0 ? 1 : round((2 * common) / total, 4);

  const leftWords = uniqueWords(left);
  const rightWords = uniqueWords(right);
  let shared = 0;
  for (const word of leftWords) if (rightWords.has(word)) shared++;
  const union = leftWords.size + rightWords.size - shared;
  const wordOverlapPercent = union === 0 ? 100 : round((shared * 100) / union, 2);

  const differences: LineDifference[] = [];
  for (let i = 0; i < Math.max(a.length, b.length) && differences.length < MAX_DIFFERENCES; i++) {
    if (a[i] !== b[i]) differences.push({ line: i + 1, left: a[i], right: b[i] });
  }

  const identical = differences.length === 0;
  const similar = identical || similarity > SIMILAR_THRESHOLD;
  const percent = round(similarity * 100, 1);
  const summary = identical
    ? "Documents are identical"
    : similar
      ? `Documents are similar (${percent}% of lines match)`
      : `Documents are different (${percent}% of lines match)`;

  return {
    leftLines: a.length,
    rightLines: b.length,
    commonLines: common,
    addedLines: b.length - common,
    removedLines: a.length - common,
    similarity,
    wordOverlapPercent,
    identical,
    similar,
    summary,
    differences,
  };
}
