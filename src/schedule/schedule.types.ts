import { ScheduleParseError } from './schedule.errors';

export interface Time {
  hours: number;
  minutes: number;
}

export interface ScheduleEvent {
  /** ISO calendar date, `yyyy-MM-dd` */
  readonly date: string;
  readonly start: Readonly<Time>;
  readonly end: Readonly<Time>;
  readonly title: string;
  readonly lessonType?: string;
  readonly teacher?: string;
  readonly location?: string;
  readonly extraInfo?: string;
  readonly elementId?: string;
  /** 1-based ordinal of the class period within the day */
  readonly pairNumber?: number;
}

export interface LessonDetails {
  teacher?: string;
  extraInfo?: string;
}

export interface WeekSchedule {
  readonly group: string;
  readonly sourceUrl: string;
  readonly events: readonly ScheduleEvent[];
  /** false when the schedule markup could not be retrieved at all */
  readonly available: boolean;
}

const ISO_DATE_RE = /^\d{4}-\d{2}-\d{2}$/;

function minutesOf(time: Time): number {
  return time.hours * 60 + time.minutes;
}

function optional(value: string | undefined | null): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function createScheduleEvent(draft: ScheduleEvent): ScheduleEvent {
  const title = draft.title.trim();
  if (!title) {
    throw new ScheduleParseError('Lesson title is empty');
  }
  if (!ISO_DATE_RE.test(draft.date)) {
    throw new ScheduleParseError(`Invalid lesson date: ${draft.date}`);
  }
  if (minutesOf(draft.start) >= minutesOf(draft.end)) {
    throw new ScheduleParseError(
      `Lesson "${title}" starts at or after its end`,
    );
  }
  if (
    draft.pairNumber !== undefined &&
    (!Number.isInteger(draft.pairNumber) || draft.pairNumber < 1)
  ) {
    throw new ScheduleParseError(`Invalid pair number: ${draft.pairNumber}`);
  }

  return Object.freeze({
    date: draft.date,
    start: Object.freeze({ ...draft.start }),
    end: Object.freeze({ ...draft.end }),
    title,
    lessonType: optional(draft.lessonType),
    teacher: optional(draft.teacher),
    location: optional(draft.location),
    extraInfo: optional(draft.extraInfo),
    elementId: optional(draft.elementId),
    pairNumber: draft.pairNumber,
  });
}

export function withDetails(
  event: ScheduleEvent,
  details: LessonDetails,
): ScheduleEvent {
  return createScheduleEvent({
    ...event,
    teacher: details.teacher ?? event.teacher,
    extraInfo: details.extraInfo ?? event.extraInfo,
  });
}

export function compareEvents(a: ScheduleEvent, b: ScheduleEvent): number {
  if (a.date !== b.date) return a.date < b.date ? -1 : 1;
  const byStart = minutesOf(a.start) - minutesOf(b.start);
  if (byStart !== 0) return byStart;
  return a.title.localeCompare(b.title);
}
