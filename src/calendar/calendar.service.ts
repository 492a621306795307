import { Inject, Injectable, Logger } from '@nestjs/common';
import { SCHEDULE_CONFIG, type ScheduleConfig } from '../config/schedule.config';
import { SCHEDULE_TIMEZONE, type TimezoneHandle } from '../schedule/timezone';
import type { WeekSchedule } from '../schedule/schedule.types';
import {
  DEFAULT_UID_DOMAIN,
  buildCalendars,
  type CalendarPair,
} from './ics-builder';

@Injectable()
export class CalendarService {
  private readonly logger = new Logger(CalendarService.name);

  constructor(
    @Inject(SCHEDULE_TIMEZONE) private readonly timezone: TimezoneHandle,
    @Inject(SCHEDULE_CONFIG) private readonly config: ScheduleConfig,
  ) {}

  private uidDomain(sourceUrl: string): string {
    for (const candidate of [sourceUrl, this.config.url]) {
      try {
        const { hostname } = new URL(candidate);
        if (hostname) return hostname;
      } catch {
        continue;
      }
    }
    return DEFAULT_UID_DOMAIN;
  }

  buildForSchedule(
    schedule: WeekSchedule,
    generatedAt: Date = new Date(),
  ): CalendarPair | null {
    const calendars = buildCalendars(schedule.events, {
      timezone: this.timezone,
      generatedAt,
      uidDomain: this.uidDomain(schedule.sourceUrl),
      calendarName: `Расписание ${schedule.group}`,
    });

    if (!calendars) {
      this.logger.warn(`Нет занятий для календаря группы ${schedule.group}`);
      return null;
    }

    this.logger.debug(
      `Собраны календари для ${schedule.group}: ${schedule.events.length} занятий`,
    );
    return calendars;
  }
}
