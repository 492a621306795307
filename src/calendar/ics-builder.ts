import { createHash } from 'crypto';
import { DateTime } from 'luxon';
import { escapeIcsText, foldIcsLine } from '../helpers/ics-escaper';
import {
  getLessonKind,
  getLessonLetter,
  getTitleShortcut,
  type LessonKind,
} from '../helpers/lesson-kind';
import { formatTime } from '../helpers/time-parser';
import { compareEvents, type ScheduleEvent } from '../schedule/schedule.types';
import type { TimezoneHandle } from '../schedule/timezone';
import {
  formatUtcStamp,
  getDialectVariant,
  toZoned,
  type CalendarDialect,
  type DialectVariant,
} from './ics-dialects';

export const PRODUCT_ID = '-//rasp-calendar-bot//schedule//RU';
export const DEFAULT_UID_DOMAIN = 'rasp.rea.ru';
export const DEFAULT_CALENDAR_NAME = 'Расписание РЭУ';

export const LESSON_COLORS: Partial<Record<LessonKind, string>> = {
  lecture: '#1d9bf0',
  seminar: '#2ecc71',
  exam: '#e74c3c',
};

export interface IcsBuildOptions {
  timezone: TimezoneHandle;
  /** DTSTAMP of every event */
  generatedAt: Date;
  uidDomain?: string;
  calendarName?: string;
}

export type CalendarPair = Record<CalendarDialect, Buffer>;

export interface PreparedEntry {
  event: ScheduleEvent;
  uid: string;
  summary: string;
  description: string;
}

export function buildUid(event: ScheduleEvent, domain: string): string {
  if (event.elementId) return `${event.elementId}@${domain}`;

  const digest = createHash('sha1')
    .update(
      [
        event.title,
        event.date,
        formatTime(event.start),
        formatTime(event.end),
      ].join('|'),
    )
    .digest('hex')
    .slice(0, 16);
  return `${digest}@${domain}`;
}

export function buildDescription(event: ScheduleEvent): string {
  const parts: string[] = [];
  if (event.teacher) parts.push(`Преподаватель: ${event.teacher}`);
  if (event.location) parts.push(`Аудитория: ${event.location}`);
  if (event.extraInfo) parts.push(`Дополнительно: ${event.extraInfo}`);
  return parts.join('\n');
}

/** -PT70M and -PT10M, or only -PT10M for the mid-day pairs 2 and 3. */
export function getAlarmLeadMinutes(pairNumber?: number): number[] {
  return pairNumber === 2 || pairNumber === 3 ? [10] : [70, 10];
}

export function buildAlarms(event: ScheduleEvent): string[] {
  return getAlarmLeadMinutes(event.pairNumber).flatMap((minutes) => [
    'BEGIN:VALARM',
    'ACTION:DISPLAY',
    `TRIGGER:-PT${minutes}M`,
    `DESCRIPTION:${escapeIcsText(`Скоро: ${event.title}`)}`,
    'END:VALARM',
  ]);
}

/**
 * Orders events and assigns summaries: kind letter, a running counter per
 * letter and the abbreviated title.
 */
export function prepareEntries(
  events: readonly ScheduleEvent[],
  uidDomain: string,
): PreparedEntry[] {
  const counters = new Map<string, number>();

  return [...events].sort(compareEvents).map((event) => {
    const letter = getLessonLetter(event.lessonType);
    const count = (counters.get(letter) ?? 0) + 1;
    counters.set(letter, count);

    return {
      event,
      uid: buildUid(event, uidDomain),
      summary: `${letter}${count} ${getTitleShortcut(event.title)}`,
      description: buildDescription(event),
    };
  });
}

export function renderEvent(
  entry: PreparedEntry,
  variant: DialectVariant,
  options: IcsBuildOptions,
): string[] {
  const { event } = entry;
  const lines = [
    'BEGIN:VEVENT',
    `UID:${entry.uid}`,
    `DTSTAMP:${formatUtcStamp(DateTime.fromJSDate(options.generatedAt))}`,
    `SUMMARY:${escapeIcsText(entry.summary)}`,
    variant.instant('DTSTART', event.date, event.start, options.timezone),
    variant.instant('DTEND', event.date, event.end, options.timezone),
    `DESCRIPTION:${escapeIcsText(entry.description)}`,
    `LOCATION:${escapeIcsText(event.location)}`,
  ];

  if (variant.colors) {
    const color = LESSON_COLORS[getLessonKind(event.lessonType)];
    if (color) lines.push(`COLOR:${color}`);
  }
  if (variant.alarms) {
    lines.push(...buildAlarms(event));
  }

  lines.push('END:VEVENT');
  return lines;
}

export function serializeLines(lines: string[]): Buffer {
  return Buffer.from(lines.map(foldIcsLine).join('\r\n') + '\r\n', 'utf8');
}

function renderCalendar(
  entries: PreparedEntry[],
  variant: DialectVariant,
  options: IcsBuildOptions,
): Buffer {
  const lines = [
    'BEGIN:VCALENDAR',
    'VERSION:2.0',
    `PRODID:${PRODUCT_ID}`,
    'CALSCALE:GREGORIAN',
    'METHOD:PUBLISH',
    `X-WR-CALNAME:${escapeIcsText(options.calendarName ?? DEFAULT_CALENDAR_NAME)}`,
  ];

  const instants = entries
    .flatMap(({ event }) => [
      toZoned(event.date, event.start, options.timezone),
      toZoned(event.date, event.end, options.timezone),
    ])
    .sort((a, b) => a.toMillis() - b.toMillis());
  lines.push(...variant.headerLines(options.timezone, instants));

  for (const entry of entries) {
    lines.push(...renderEvent(entry, variant, options));
  }

  lines.push('END:VCALENDAR');
  return serializeLines(lines);
}

export function buildCalendar(
  events: readonly ScheduleEvent[],
  dialect: CalendarDialect,
  options: IcsBuildOptions,
): Buffer | null {
  if (events.length === 0) return null;

  const variant = getDialectVariant(dialect);
  const entries = prepareEntries(events, options.uidDomain ?? DEFAULT_UID_DOMAIN);
  return renderCalendar(entries, variant, options);
}

/**
 * Builds both calendar flavours. Returns null for an empty event list so the
 * caller reports the absence instead of sending an empty calendar.
 */
export function buildCalendars(
  events: readonly ScheduleEvent[],
  options: IcsBuildOptions,
): CalendarPair | null {
  if (events.length === 0) return null;

  const entries = prepareEntries(events, options.uidDomain ?? DEFAULT_UID_DOMAIN);
  return {
    mobile: renderCalendar(entries, getDialectVariant('mobile'), options),
    google: renderCalendar(entries, getDialectVariant('google'), options),
  };
}
