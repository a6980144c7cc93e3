// Publication dates: everything parseable becomes YYYY-MM-DD, the rest is kept as found

const MONTHS: Record<string, number> = {
  jan: 1, january: 1,
  feb: 2, february: 2,
  mar: 3, march: 3,
  apr: 4, april: 4,
  may: 5,
  jun: 6, june: 6,
  jul: 7, july: 7,
  aug: 8, august: 8,
  sep: 9, sept: 9, september: 9,
  oct: 10, october: 10,
  nov: 11, november: 11,
  dec: 12, december: 12,
};


function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}


function isValidDate(year: number, month: number, day: number): boolean {
  return month >= 1 && month <= 12 && day >= 1 && day <= daysInMonth(year, month);
}


function format(year: number, month: number, day: number): string {
  return `${String(year).padStart(4, "0")}-${String(month).padStart(2, "0")}-${String(day).padStart(2, "0")}`;
}


/** Month name or abbreviation ("Mar", "march", "Sept") to 1-12 */
export function monthNumber(name: string): number | undefined {
  return MONTHS[name.toLowerCase().replace(/\.$/, "")];
}


/**
 * ISO dates and datetimes keep their calendar date (no timezone shift).
 * Slash dates are read day-first, month-first only when day-first is impossible.
 */
export function normalizeDate(raw: string | null | undefined): string {
  const s = (raw ?? "").trim();
  if (!s) return "";

  const iso = s.match(/^(\d{4})-(\d{2})-(\d{2})(?:[T\s].*)?$/);
  if (iso) {
    const [y, m, d] = [Number(iso[1]), Number(iso[2]), Number(iso[3])];
    return isValidDate(y, m, d) ? format(y, m, d) : s;
  }

  const slash = s.match(/^(\d{1,2})\/(\d{1,2})\/(\d{4})$/);
  if (slash) {
    const [a, b, y] = [Number(slash[1]), Number(slash[2]), Number(slash[3])];
    if (isValidDate(y, b, a)) return format(y, b, a);
    if (isValidDate(y, a, b)) return format(y, a, b);
    return s;
  }

  const named = s.match(/^([A-Za-z]+\.?)\s+(\d{1,2}),?\s+(\d{4})$/);
  if (named) {
    const m = monthNumber(named[1]);
    const [d, y] = [Number(named[2]), Number(named[3])];
    if (m !== undefined && isValidDate(y, m, d)) return format(y, m, d);
  }
  return s;
}


/** Year of a normalised date, null when the value is not YYYY-MM-DD */
export function yearOf(date: string): number | null {
  const m = date.match(/^(\d{4})-\d{2}-\d{2}$/);
  return m ? Number(m[1]) : null;
}
