import { DateTime, FixedOffsetZone } from 'luxon';
import { formatTime } from '../helpers/time-parser';
import type { Time } from '../schedule/schedule.types';
import type { TimezoneHandle } from '../schedule/timezone';
import { UnsupportedDialectError } from './calendar.errors';

export type CalendarDialect = 'mobile' | 'google';

export const CALENDAR_DIALECTS: readonly CalendarDialect[] = [
  'mobile',
  'google',
];

export type InstantProperty = 'DTSTART' | 'DTEND';

/** Everything in which the two calendar flavours differ. */
export interface DialectVariant {
  id: CalendarDialect;
  /** `instants` are the event boundaries in chronological order */
  headerLines(timezone: TimezoneHandle, instants: readonly DateTime[]): string[];
  instant(
    property: InstantProperty,
    date: string,
    time: Time,
    timezone: TimezoneHandle,
  ): string;
  colors: boolean;
  alarms: boolean;
}

export function toZoned(
  date: string,
  time: Time,
  timezone: TimezoneHandle,
): DateTime {
  return DateTime.fromISO(`${date}T${formatTime(time)}`, {
    zone: timezone.zone,
  });
}

export function formatLocalStamp(date: string, time: Time): string {
  return `${date.replace(/-/g, '')}T${formatTime(time).replace(':', '')}00`;
}

export function formatUtcStamp(instant: DateTime): string {
  return instant.toUTC().toFormat("yyyyMMdd'T'HHmmss'Z'");
}

export function formatUtcOffset(minutes: number): string {
  const sign = minutes < 0 ? '-' : '+';
  const abs = Math.abs(minutes);
  return (
    sign +
    Math.floor(abs / 60)
      .toString()
      .padStart(2, '0') +
    (abs % 60).toString().padStart(2, '0')
  );
}

const MINUTE_MS = 60_000;

/** First minute at which the zone's offset differs from the one at `from`. */
export function findOffsetTransition(from: DateTime, to: DateTime): DateTime {
  const zone = from.zone;
  const offsetAt = (ms: number) => DateTime.fromMillis(ms, { zone }).offset;
  const initial = from.offset;
  let lo = from.toMillis();
  let hi = to.toMillis();
  while (hi - lo > MINUTE_MS) {
    const mid = lo + Math.floor((hi - lo) / 2);
    if (offsetAt(mid) === initial) lo = mid;
    else hi = mid;
  }
  return DateTime.fromMillis(Math.floor(hi / MINUTE_MS) * MINUTE_MS, { zone });
}

function observance(
  start: string,
  from: number,
  to: DateTime,
): string[] {
  const kind = to.isInDST ? 'DAYLIGHT' : 'STANDARD';
  return [
    `BEGIN:${kind}`,
    `DTSTART:${start}`,
    `TZOFFSETFROM:${formatUtcOffset(from)}`,
    `TZOFFSETTO:${formatUtcOffset(to.offset)}`,
    `END:${kind}`,
  ];
}

/**
 * VTIMEZONE with one observance for the offset of the first instant and one
 * more for every offset change between consecutive instants.
 */
export function buildTimezoneLines(
  timezone: TimezoneHandle,
  instants: readonly DateTime[],
): string[] {
  const zoned = instants.map((instant) => instant.setZone(timezone.zone));
  const first = zoned[0] ?? DateTime.now().setZone(timezone.zone);

  const lines = [
    'BEGIN:VTIMEZONE',
    `TZID:${timezone.name}`,
    ...observance('19700101T000000', first.offset, first),
  ];
  for (let i = 1; i < zoned.length; i++) {
    const previous = zoned[i - 1];
    if (zoned[i].offset === previous.offset) continue;

    const transition = findOffsetTransition(previous, zoned[i]);
    const localBefore = transition
      .setZone(FixedOffsetZone.instance(previous.offset))
      .toFormat("yyyyMMdd'T'HHmmss");
    lines.push(...observance(localBefore, previous.offset, transition));
  }
  lines.push('END:VTIMEZONE');
  return lines;
}

const mobileVariant: DialectVariant = {
  id: 'mobile',
  headerLines(timezone, instants) {
    return [
      `X-WR-TIMEZONE:${timezone.name}`,
      ...buildTimezoneLines(timezone, instants),
    ];
  },
  instant(property, date, time, timezone) {
    return `${property};TZID=${timezone.name}:${formatLocalStamp(date, time)}`;
  },
  colors: true,
  alarms: true,
};

const googleVariant: DialectVariant = {
  id: 'google',
  headerLines() {
    return [];
  },
  instant(property, date, time, timezone) {
    return `${property}:${formatUtcStamp(toZoned(date, time, timezone))}`;
  },
  colors: false,
  alarms: false,
};

const VARIANTS: Record<CalendarDialect, DialectVariant> = {
  mobile: mobileVariant,
  google: googleVariant,
};

export function isCalendarDialect(value: string): value is CalendarDialect {
  return CALENDAR_DIALECTS.some((dialect) => dialect === value);
}

export function getDialectVariant(dialect: string): DialectVariant {
  if (!isCalendarDialect(dialect)) {
    throw new UnsupportedDialectError(dialect);
  }
  return VARIANTS[dialect];
}
