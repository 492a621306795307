import { DateTime, type Zone } from 'luxon';

export const RUSSIAN_WEEKDAYS = [
  'Понедельник',
  'Вторник',
  'Среда',
  'Четверг',
  'Пятница',
  'Суббота',
  'Воскресенье',
];

const HEADER_DATE_RE = /(\d{2}\.\d{2}\.\d{4})/;

/** Extracts `dd.mm.yyyy` from a table header and returns it as `yyyy-MM-dd`. */
export function parseHeaderDate(text: string | null | undefined): string | null {
  if (!text) return null;
  const match = text.match(HEADER_DATE_RE);
  if (!match) return null;

  const date = DateTime.fromFormat(match[1], 'dd.MM.yyyy');
  return date.isValid ? date.toFormat('yyyy-MM-dd') : null;
}

export interface WeekWindow {
  start: string;
  end: string;
}

export function getWeekWindow(referenceDate: string): WeekWindow | null {
  const reference = DateTime.fromISO(referenceDate);
  if (!reference.isValid) return null;

  const monday = reference.startOf('week');
  return {
    start: monday.toFormat('yyyy-MM-dd'),
    end: monday.plus({ days: 6 }).toFormat('yyyy-MM-dd'),
  };
}

export function getWeekdayName(isoDate: string): string {
  const date = DateTime.fromISO(isoDate);
  return date.isValid ? RUSSIAN_WEEKDAYS[date.weekday - 1] : '';
}

export function formatShortDate(isoDate: string): string {
  const date = DateTime.fromISO(isoDate);
  return date.isValid ? date.toFormat('dd.MM') : isoDate;
}

export function todayIn(zone: Zone): string {
  return DateTime.now().setZone(zone).toFormat('yyyy-MM-dd');
}
