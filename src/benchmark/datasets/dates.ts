const MONTHS = [
  'january',
  'february',
  'march',
  'april',
  'may',
  'june',
  'july',
  'august',
  'september',
  'october',
  'november',
  'december',
];

function toIso(year: number, monthIndex: number, day: number, hour: number, minute: number): string | undefined {
  const date = new Date(Date.UTC(year, monthIndex, day, hour, minute));
  // Rejects roll-over such as 31 February
  if (date.getUTCMonth() !== monthIndex || date.getUTCDate() !== day) {
    return undefined;
  }
  return date.toISOString();
}

/**
 * Parse LOCOMO session times such as "1:56 pm on 8 May, 2023" as UTC.
 */
export function parseLocomoDate(value: string): string | undefined {
  const match = /^(\d{1,2}):(\d{2})\s*(am|pm)\s+on\s+(\d{1,2})\s+([A-Za-z]+),?\s+(\d{4})$/i.exec(value.trim());
  if (!match) {
    return undefined;
  }
  const [, hourText, minuteText, meridiem, dayText, monthText, yearText] = match;
  const monthIndex = MONTHS.indexOf(monthText.toLowerCase());
  const hour12 = Number(hourText);
  if (monthIndex < 0 || hour12 < 1 || hour12 > 12 || Number(minuteText) > 59) {
    return undefined;
  }
  const hour = (hour12 % 12) + (meridiem.toLowerCase() === 'pm' ? 12 : 0);
  return toIso(Number(yearText), monthIndex, Number(dayText), hour, Number(minuteText));
}

/**
 * Parse LongMemEval session times such as "2023/05/20 (Sat) 02:21" as UTC.
 */
export function parseLongMemEvalDate(value: string): string | undefined {
  const match = /^(\d{4})\/(\d{2})\/(\d{2})\s+\([A-Za-z]{3}\)\s+(\d{2}):(\d{2})$/.exec(value.trim());
  if (!match) {
    return undefined;
  }
  const [, year, month, day, hour, minute] = match.map(Number);
  if (hour > 23 || minute > 59) {
    return undefined;
  }
  return toIso(year, month - 1, day, hour, minute);
}
