import type { PageName } from "../types";

/**
 * Split a filename around its first run of ASCII digits
 *
 * The digits are read as the page number and removed to form the group key,
 * so "scan1.png", "scan2.png" and "scan10.png" share the key "scan.png".
 * Names without digits are page 0 and keep their whole name as key, which
 * makes "scan.png" the cover page of that same group.
 *
 * @example
 * parsePageName("invoice_2023-01.pdf")
 * // { prefix: "invoice_", digits: "2023", suffix: "-01.pdf", page: 2023, key: "invoice_-01.pdf" }
 */
export function parsePageName(filename: string): PageName {
  const match = /\d+/.exec(filename);

  if (!match) {
    return { prefix: filename, digits: "", suffix: "", page: 0, key: filename };
  }

  const prefix = filename.slice(0, match.index);
  const digits = match[0];
  const suffix = filename.slice(match.index + digits.length);

  return {
    prefix,
    digits,
    suffix,
    page: parseInt(digits, 10),
    key: prefix + suffix,
  };
}
