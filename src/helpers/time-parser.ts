import type { Time } from '../schedule/schedule.types';

export interface TimeSlot {
  start: Time;
  end: Time;
  pairNumber?: number;
}

const TIME_TOKEN_RE = /(\d{1,2}):(\d{2})/g;
const PAIR_RE = /(\d+)\s*пара/i;

export function parseTimeToken(hours: string, minutes: string): Time | null {
  const h = parseInt(hours, 10);
  const m = parseInt(minutes, 10);
  if (isNaN(h) || isNaN(m) || h > 23 || m > 59) return null;
  return { hours: h, minutes: m };
}

/**
 * Разбирает ячейку времени вида "1 пара 09:00 10:30".
 * Возвращает null, если в ячейке нет двух корректных отметок времени.
 */
export function parseTimeSlot(text: string | null | undefined): TimeSlot | null {
  if (!text) return null;

  const tokens = [...text.matchAll(TIME_TOKEN_RE)];
  if (tokens.length < 2) return null;

  const start = parseTimeToken(tokens[0][1], tokens[0][2]);
  const end = parseTimeToken(tokens[1][1], tokens[1][2]);
  if (!start || !end) return null;

  const slot: TimeSlot = { start, end };
  const pairMatch = text.match(PAIR_RE);
  if (pairMatch) {
    const pairNumber = parseInt(pairMatch[1], 10);
    if (pairNumber > 0) slot.pairNumber = pairNumber;
  }
  return slot;
}

export function timeToMinutes(time: Time): number {
  return time.hours * 60 + time.minutes;
}

export function formatTime(time: Time): string {
  return (
    time.hours.toString().padStart(2, '0') +
    ':' +
    time.minutes.toString().padStart(2, '0')
  );
}
