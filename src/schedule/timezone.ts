import { Logger } from '@nestjs/common';
import { FixedOffsetZone, IANAZone, type Zone } from 'luxon';

export const SCHEDULE_TIMEZONE = 'SCHEDULE_TIMEZONE';
export const DEFAULT_TIMEZONE = 'Europe/Moscow';

const FALLBACK_OFFSET_MINUTES = 3 * 60;

export interface TimezoneHandle {
  /** TZID written into calendars; kept even when the zone falls back */
  name: string;
  zone: Zone;
  fallback: boolean;
}

const logger = new Logger('TimezoneResolver');

export function resolveTimezone(name: string = DEFAULT_TIMEZONE): TimezoneHandle {
  const zoneName = name.trim() || DEFAULT_TIMEZONE;
  const zone = IANAZone.create(zoneName);
  if (zone.isValid) {
    return { name: zoneName, zone, fallback: false };
  }

  logger.warn(
    `Часовой пояс ${zoneName} не найден, используем фиксированный UTC+3`,
  );
  return {
    name: zoneName,
    zone: FixedOffsetZone.instance(FALLBACK_OFFSET_MINUTES),
    fallback: true,
  };
}
