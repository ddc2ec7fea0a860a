/**
 * Total order over provider API versions.
 *
 * 1. Date-stamped versions (`YYYY-MM-DD[-suffix]`) rank above anything else.
 * 2. Between date-stamped versions, the later date wins; on the same date a
 *    stable version outranks a suffixed one (`2023-05-01` > `2023-05-01-preview`),
 *    and two suffixes compare case-insensitively, then ordinally.
 * 3. Other strings compare case-insensitively, then ordinally.
 *
 * Returns a negative number when `a` ranks below `b`, positive when above, and
 * zero only for identical strings.
 */
export function compareApiVersions(a: string, b: string): number {
  const left = parseDateVersion(a);
  const right = parseDateVersion(b);

  if (left && right) {
    if (left.date !== right.date) return left.date < right.date ? -1 : 1;
    if (left.suffix === right.suffix) return 0;
    if (left.suffix === null) return 1;
    if (right.suffix === null) return -1;
    return compareText(left.suffix, right.suffix);
  }
  if (left) return 1;
  if (right) return -1;
  return compareText(a, b);
}

interface DateVersion {
  /** `YYYYMMDD` so plain string comparison orders dates. */
  readonly date: string;
  readonly suffix: string | null;
}

const DATE_VERSION = /^(\d{4})-(\d{2})-(\d{2})(?:-(.+))?$/;

function parseDateVersion(version: string): DateVersion | null {
  const match = DATE_VERSION.exec(version);
  if (!match) return null;
  const [, year = "", month = "", day = "", suffix] = match;
  return { date: `${year}${month}${day}`, suffix: suffix ?? null };
}

function compareText(a: string, b: string): number {
  const la = a.toLowerCase();
  const lb = b.toLowerCase();
  if (la !== lb) return la < lb ? -1 : 1;
  if (a === b) return 0;
  return a < b ? -1 : 1;
}
