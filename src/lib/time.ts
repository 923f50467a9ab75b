const ESTONIAN_DATE = /^(\d{1,2})\.(\d{1,2})\.(\d{4})$/;

/** Parses `dd.mm.yyyy` as a UTC midnight. Invalid calendar dates yield null. */
export function parseEstonianDate(value: string | null | undefined): Date | null {
  if (value == null) {
    return null;
  }
  const match = ESTONIAN_DATE.exec(value.trim());
  if (!match) {
    return null;
  }

  const day = Number(match[1]);
  const month = Number(match[2]);
  const year = Number(match[3]);
  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  return date;
}

export function getUtcDayStart(reference = new Date()): Date {
  const start = new Date(reference.getTime());
  start.setUTCHours(0, 0, 0, 0);
  return start;
}
