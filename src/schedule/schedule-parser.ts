import { parseHTML } from 'linkedom';
import { parseHeaderDate } from '../helpers/date-parser';
import { parseTimeSlot } from '../helpers/time-parser';
import {
  createScheduleEvent,
  type LessonDetails,
  type ScheduleEvent,
} from './schedule.types';

const ELEMENT_NODE = 1;
const TEXT_NODE = 3;

export function parseHtml(html: string) {
  // fragments from the XHR endpoints come without <html>, wrap them so that
  // document-level selectors see every element
  const source = /<html[\s>]/i.test(html)
    ? html
    : `<!DOCTYPE html><html><head></head><body>${html}</body></html>`;
  return parseHTML(source).document;
}

/** Trimmed, non-empty text nodes of an element in document order. */
export function textFragments(node: Node): string[] {
  const fragments: string[] = [];
  for (const child of Array.from(node.childNodes)) {
    if (child.nodeType === TEXT_NODE) {
      const value = child.textContent?.trim();
      if (value) fragments.push(value);
    } else if (child.nodeType === ELEMENT_NODE) {
      fragments.push(...textFragments(child));
    }
  }
  return fragments;
}

export function text(el: Element | null): string {
  return el ? textFragments(el).join(' ') : '';
}

export function cleanLocation(chunks: string[]): string {
  return chunks.join(' ').replace(/\s+/g, ' ').trim();
}

export type RowOutcome =
  | { ok: true; event: ScheduleEvent }
  | { ok: false; reason: string };

export interface ParsedScheduleCard {
  events: ScheduleEvent[];
  diagnostics: string[];
}

export function parseLessonRow(anchor: Element, date: string): RowOutcome {
  const fragments = textFragments(anchor);
  const label = fragments[0] ?? '(без названия)';

  try {
    const row = anchor.closest('tr');
    if (!row) {
      return { ok: false, reason: `Занятие вне строки таблицы: ${label}` };
    }

    const slot = parseTimeSlot(text(row.querySelector('td')));
    if (!slot) {
      return { ok: false, reason: `Пропускаем строку без времени: ${label}` };
    }
    if (fragments.length === 0) {
      return { ok: false, reason: `Пустая ячейка занятия ${date}` };
    }

    const [title, lessonType, ...rest] = fragments;
    const event = createScheduleEvent({
      date,
      start: slot.start,
      end: slot.end,
      title,
      lessonType,
      location: rest.length > 0 ? cleanLocation(rest) : undefined,
      elementId: anchor.getAttribute('data-elementid') ?? undefined,
      pairNumber: slot.pairNumber,
    });
    return { ok: true, event };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return { ok: false, reason: `Ошибка разбора занятия "${label}": ${message}` };
  }
}

/**
 * Разбирает HTML карточки расписания (одна неделя): каждая таблица с
 * заголовком `<h5>` содержит дату, каждая ссылка `a.task` в ней описывает занятие.
 */
export function parseScheduleCard(html: string): ParsedScheduleCard {
  const outcomes: RowOutcome[] = [];

  if (html.trim()) {
    const doc = parseHtml(html);
    for (const table of doc.querySelectorAll('table')) {
      const header = table.querySelector('h5');
      if (!header) continue;

      const date = parseHeaderDate(text(header));
      if (!date) {
        outcomes.push({
          ok: false,
          reason: `Не удалось разобрать дату в заголовке: ${text(header)}`,
        });
        continue;
      }

      for (const anchor of table.querySelectorAll('a.task')) {
        outcomes.push(parseLessonRow(anchor, date));
      }
    }
  }

  return outcomes.reduce<ParsedScheduleCard>(
    (acc, outcome) => {
      if (outcome.ok) acc.events.push(outcome.event);
      else acc.diagnostics.push(outcome.reason);
      return acc;
    },
    { events: [], diagnostics: [] },
  );
}

export function extractTeacher(lines: string[]): string | undefined {
  for (let i = 0; i < lines.length; i++) {
    if (!lines[i].includes('Преподаватель')) continue;
    const candidate = lines
      .slice(i + 1)
      .find((line) => line.toLowerCase() !== 'school');
    if (candidate) return candidate;
  }
  return undefined;
}

export function extractExtraInfo(lines: string[]): string | undefined {
  const extras = lines.filter(
    (line) => line.startsWith('Площадка') || line.startsWith('('),
  );
  return extras.length > 0 ? extras.join(', ') : undefined;
}

export function parseLessonDetails(html: string): LessonDetails {
  if (!html.trim()) return {};

  const body = parseHtml(html).querySelector('div.element-info-body');
  if (!body) return {};

  const lines = textFragments(body)
    .flatMap((fragment) => fragment.split(/\r?\n/))
    .map((line) => line.trim())
    .filter(Boolean);

  return {
    teacher: extractTeacher(lines),
    extraInfo: extractExtraInfo(lines),
  };
}
