import { format, isValid, parse } from "date-fns";

interface DatePattern {
  regex: RegExp;
  format: string;
}

const MONTHS =
  "january|february|march|april|may|june|july|august|september|october|november|december";

// Day-first for numeric dates
const PATTERNS: DatePattern[] = [
  { regex: /\b\d{4}-\d{1,2}-\d{1,2}\b/g, format: "yyyy-M-d" },
  { regex: /\b\d{1,2}\/\d{1,2}\/\d{4}\b/g, format: "d/M/yyyy" },
  { regex: /\b\d{1,2}\.\d{1,2}\.\d{4}\b/g, format: "d.M.yyyy" },
  { regex: new RegExp(`\\b(?:${MONTHS}) \\d{4}\\b`, "gi"), format: "MMMM yyyy" },
];

/**
 * Find the first valid date in `text` and return it as a "yyyy/MM" tag
 *
 * @example
 * extractDateTag("Invoice date: 15/01/2023") // "2023/01"
 */
export function extractDateTag(text: string): string | undefined {
  const candidates: Array<{ index: number; value: string; format: string }> = [];

  for (const pattern of PATTERNS) {
    for (const match of text.matchAll(pattern.regex)) {
      candidates.push({
        index: match.index ?? 0,
        value: match[0],
        format: pattern.format,
      });
    }
  }

  candidates.sort((a, b) => a.index - b.index);

  const reference = new Date(2000, 0, 1);
  for (const candidate of candidates) {
    const date = parse(candidate.value, candidate.format, reference);
    if (isValid(date)) {
      return format(date, "yyyy/MM");
    }
  }

  return undefined;
}
