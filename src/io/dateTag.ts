import { parse as parsePath } from "node:path";

interface DatePattern {
  regex: RegExp;
  order: (match: RegExpMatchArray) => [string, string, string];
}

// Tried in order; a match that is not a calendar date falls through to the next.
const PATTERNS: DatePattern[] = [
  {
    regex: /(20\d{2})([01]\d)([0-3]\d)/,
    order: (m) => [m[1], m[2], m[3]],
  },
  {
    regex: /(20\d{2})[-_](\d{2})[-_](\d{2})/,
    order: (m) => [m[1], m[2], m[3]],
  },
  {
    regex: /(\d{2})[-_](\d{2})[-_](20\d{2})/,
    order: (m) => [m[3], m[1], m[2]],
  },
];

function pad(value: number, width: number): string {
  return String(value).padStart(width, "0");
}

export function formatDateTag(year: number, month: number, day: number): string {
  return `${pad(year, 4)}_${pad(month, 2)}_${pad(day, 2)}`;
}

function toCalendarTag(year: number, month: number, day: number): string | undefined {
  const date = new Date(Date.UTC(year, month - 1, day));
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return undefined;
  }
  return formatDateTag(year, month, day);
}

/** `YYYY_MM_DD` from a file name's stem, or from `now` when it carries no date. */
export function extractDateTag(fileName: string, now: Date = new Date()): string {
  const stem = parsePath(fileName).name;
  for (const pattern of PATTERNS) {
    const match = stem.match(pattern.regex);
    if (!match) {
      continue;
    }
    const [year, month, day] = pattern.order(match).map((part) => Number.parseInt(part, 10));
    const tag = toCalendarTag(year, month, day);
    if (tag) {
      return tag;
    }
  }
  return formatDateTag(now.getFullYear(), now.getMonth() + 1, now.getDate());
}
