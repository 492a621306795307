import { Inject, Injectable, Logger } from '@nestjs/common';
import { SCHEDULE_CONFIG, type ScheduleConfig } from '../config/schedule.config';
import { ScheduleInputError } from './schedule.errors';
import { parseScheduleCard } from './schedule-parser';
import { ScheduleSession } from './schedule-session';
import { ScheduleSourceService } from './schedule-source.service';
import {
  withDetails,
  type ScheduleEvent,
  type WeekSchedule,
} from './schedule.types';

function requireInput(
  source: string,
  group: string,
): { sourceUrl: string; groupName: string } {
  const sourceUrl = (source ?? '').trim();
  const groupName = (group ?? '').trim();
  if (!sourceUrl) throw new ScheduleInputError('Не указан URL расписания');
  if (!groupName) throw new ScheduleInputError('Не указан код группы');
  return { sourceUrl, groupName };
}

@Injectable()
export class ScheduleService {
  private readonly logger = new Logger(ScheduleService.name);

  constructor(
    private readonly source: ScheduleSourceService,
    @Inject(SCHEDULE_CONFIG) private readonly config: ScheduleConfig,
  ) {}

  get defaults(): { url: string; group: string } {
    return { url: this.config.url, group: this.config.group };
  }

  /**
   * Загружает и разбирает недельное расписание группы. Сетевые ошибки и
   * ошибки разбора не пробрасываются: результат помечается `available: false`.
   */
  async fetchWeekSchedule(source: string, group: string): Promise<WeekSchedule> {
    const { sourceUrl, groupName } = requireInput(source, group);
    const session = this.source.openSession(
      this.source.resolveApiBase(sourceUrl),
    );
    try {
      const { key, events } = await this.loadWeek(sourceUrl, groupName, session);
      if (!events) {
        return { group: key, sourceUrl, events: [], available: false };
      }
      this.logger.log(`Получено занятий для группы ${key}: ${events.length}`);
      return { group: key, sourceUrl, events, available: true };
    } catch (error) {
      this.logger.error(
        `Ошибка загрузки расписания для группы ${groupName}`,
        error instanceof Error ? error.stack : String(error),
      );
      return { group: groupName, sourceUrl, events: [], available: false };
    } finally {
      session.close();
    }
  }

  async fetchAndParse(
    source: string,
    group: string,
    session: ScheduleSession,
  ): Promise<ScheduleEvent[]> {
    const { sourceUrl, groupName } = requireInput(source, group);
    const { events } = await this.loadWeek(sourceUrl, groupName, session);
    return events ?? [];
  }

  /** `events` is null when the schedule card could not be retrieved. */
  private async loadWeek(
    sourceUrl: string,
    groupName: string,
    session: ScheduleSession,
  ): Promise<{ key: string; events: ScheduleEvent[] | null }> {
    const key = await this.source.resolveGroupKey(sourceUrl, groupName, session);
    const html = await this.source.fetchMarkup(session.baseUrl, key, session);
    if (html === null) return { key, events: null };
    return { key, events: await this.parseMarkup(html, session) };
  }

  async parseMarkup(
    html: string,
    session: ScheduleSession,
  ): Promise<ScheduleEvent[]> {
    const { events, diagnostics } = parseScheduleCard(html);
    for (const diagnostic of diagnostics) {
      this.logger.warn(diagnostic);
    }

    if (!this.config.fetchDetails) return events;
    return Promise.all(events.map((event) => this.enrich(event, session)));
  }

  private async enrich(
    event: ScheduleEvent,
    session: ScheduleSession,
  ): Promise<ScheduleEvent> {
    const elementId = event.elementId;
    if (!elementId || session.closed) return event;

    try {
      const details = await session.runWithLimit(() =>
        this.source.fetchDetails(session.baseUrl, elementId, session),
      );
      return withDetails(event, details);
    } catch (error) {
      this.logger.warn(
        `Детали занятия ${elementId} не применены: ${
          error instanceof Error ? error.message : String(error)
        }`,
      );
      return event;
    }
  }
}
