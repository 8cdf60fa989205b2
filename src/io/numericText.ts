const NBSP = /\u00A0/g;
const THOUSANDS = /,/g;
const UNICODE_MINUS = /\u2212/g;

/** Normalizes spreadsheet-exported numeric text to a plain literal. */
export function cleanNumericText(text: string): string {
  return text.replace(NBSP, "").replace(THOUSANDS, "").replace(UNICODE_MINUS, "-").trim();
}
