/**
 * Date helpers shared by the live fetch collaborators.
 */

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const ISO_MONTH = /^(\d{4})-(\d{2})$/;
const BR_DATE = /^(\d{2})\/(\d{2})\/(\d{4})$/;

export const toIsoDate = (value: Date): string =>
  value.toISOString().slice(0, 10);

const isCalendarDate = (year: string, month: string, day: string): boolean => {
  const date = new Date(`${year}-${month}-${day}T00:00:00.000Z`);
  return !Number.isNaN(date.getTime()) && toIsoDate(date) === `${year}-${month}-${day}`;
};

/**
 * `dd/MM/yyyy` as used by the BCB SGS API.
 */
export const toBrDate = (isoDate: string): string => {
  const match = ISO_DATE.exec(isoDate);
  if (!match) {
    throw new Error(`Expected YYYY-MM-DD, received '${isoDate}'.`);
  }
  const [, year, month, day] = match;
  return `${day}/${month}/${year}`;
};

/**
 * Normalizes `dd/MM/yyyy`, `YYYY-MM-DD` and `YYYY-MM` (first of month) to
 * `YYYY-MM-DD`. Returns null for anything else, including impossible dates.
 */
export const parseSourceDate = (value: string): string | null => {
  const trimmed = value.trim().slice(0, 10);

  const br = BR_DATE.exec(trimmed);
  if (br) {
    const [, day = "", month = "", year = ""] = br;
    return isCalendarDate(year, month, day) ? `${year}-${month}-${day}` : null;
  }

  const iso = ISO_DATE.exec(trimmed);
  if (iso) {
    const [, year = "", month = "", day = ""] = iso;
    return isCalendarDate(year, month, day) ? trimmed : null;
  }

  const monthOnly = ISO_MONTH.exec(trimmed);
  if (monthOnly) {
    const [, year = "", month = ""] = monthOnly;
    return isCalendarDate(year, month, "01") ? `${year}-${month}-01` : null;
  }

  return null;
};
