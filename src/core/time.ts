export const formatISODate = (date: Date): string => date.toISOString().slice(0, 10);

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})/;
const US_DATE = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;

// Accepts YYYY-MM-DD (optionally with a time part) or M/D/YYYY; returns YYYY-MM-DD.
export const normalizeDate = (input: string): string => {
  const trimmed = input.trim();
  const iso = ISO_DATE.exec(trimmed);
  if (iso) return `${iso[1]}-${iso[2]}-${iso[3]}`;
  const us = US_DATE.exec(trimmed);
  if (us) {
    return `${us[3]}-${us[1].padStart(2, '0')}-${us[2].padStart(2, '0')}`;
  }
  throw new Error(`Invalid date: ${input}`);
};

export const parseDateArg = (value?: string): string | undefined => {
  if (value === undefined) return undefined;
  const normalized = normalizeDate(value);
  if (Number.isNaN(new Date(`${normalized}T00:00:00Z`).getTime())) {
    throw new Error(`Invalid date: ${value}`);
  }
  return normalized;
};

export const addDays = (date: string, days: number): string => {
  const d = new Date(`${date}T00:00:00Z`);
  d.setUTCDate(d.getUTCDate() + days);
  return formatISODate(d);
};

// Monday-Friday calendar between two dates inclusive.
export const weekdaysBetween = (start: string, end: string): string[] => {
  const days: string[] = [];
  for (let current = start; current <= end; current = addDays(current, 1)) {
    const dow = new Date(`${current}T00:00:00Z`).getUTCDay();
    if (dow !== 0 && dow !== 6) days.push(current);
  }
  return days;
};

export const runIdFor = (now: Date = new Date()): string => now.toISOString().slice(0, 19).replace(/:/g, '-');
