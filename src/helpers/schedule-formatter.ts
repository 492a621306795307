import { DateTime } from 'luxon';
import { ScheduleInputError } from '../schedule/schedule.errors';
import {
  compareEvents,
  type ScheduleEvent,
  type WeekSchedule,
} from '../schedule/schedule.types';
import { formatShortDate, getWeekWindow, getWeekdayName } from './date-parser';
import { formatTime } from './time-parser';

export const SCHEDULE_NOT_FOUND_MESSAGE = '❌ Расписание не найдено.';
export const NO_LESSONS_THIS_WEEK_MESSAGE = '🎉 На этой неделе занятий нет';
export const SCHEDULE_UNAVAILABLE_MESSAGE =
  '⚠️ Расписание недоступно, попробуйте позже.';

export function formatLesson(event: ScheduleEvent): string {
  let line = `${formatTime(event.start)}–${formatTime(event.end)} ${event.title}`;
  if (event.lessonType) line += ` (${event.lessonType})`;
  if (event.teacher) line += ` — ${event.teacher}`;
  if (event.location) line += ` [${event.location}]`;
  return line;
}

/**
 * Текст расписания на неделю (пн–вс), содержащую `referenceDate`.
 * Пустой список и неделя без занятий дают разные сообщения.
 */
export function formatWeek(
  events: readonly ScheduleEvent[],
  referenceDate?: string,
): string {
  if (events.length === 0) {
    return SCHEDULE_NOT_FOUND_MESSAGE;
  }

  const reference = referenceDate ?? DateTime.now().toFormat('yyyy-MM-dd');
  const window = getWeekWindow(reference);
  if (!window) {
    throw new ScheduleInputError(`Некорректная дата: ${reference}`);
  }

  const inWeek = events
    .filter((e) => e.date >= window.start && e.date <= window.end)
    .sort(compareEvents);
  if (inWeek.length === 0) {
    return NO_LESSONS_THIS_WEEK_MESSAGE;
  }

  const byDate = new Map<string, ScheduleEvent[]>();
  for (const event of inWeek) {
    const day = byDate.get(event.date) ?? [];
    day.push(event);
    byDate.set(event.date, day);
  }

  const blocks = [...byDate.entries()].map(([date, lessons]) =>
    [
      `━━━ ${getWeekdayName(date)}, ${formatShortDate(date)} ━━━`,
      ...lessons.map(formatLesson),
    ].join('\n'),
  );

  const header = `📅 Расписание на неделю ${formatShortDate(
    window.start,
  )}–${formatShortDate(window.end)}`;
  return [header, ...blocks].join('\n\n');
}

export function formatScheduleMessage(
  schedule: WeekSchedule,
  referenceDate?: string,
): string {
  if (!schedule.available) {
    return SCHEDULE_UNAVAILABLE_MESSAGE;
  }
  return `Группа ${schedule.group}\n\n${formatWeek(
    schedule.events,
    referenceDate,
  )}`;
}
