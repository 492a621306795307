import { Inject, Injectable, Logger } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { firstValueFrom } from 'rxjs';
import { AxiosError } from 'axios';
import { SCHEDULE_CONFIG, type ScheduleConfig } from '../config/schedule.config';
import { parseLessonDetails } from './schedule-parser';
import { ScheduleSession } from './schedule-session';
import type { LessonDetails } from './schedule.types';

export const SUGGESTIONS_PATH = '/Schedule/SearchBarSuggestions';
export const SCHEDULE_CARD_PATH = '/Schedule/ScheduleCard';
export const DETAILS_PATH = '/Schedule/GetDetailsById';

interface Suggestion {
  key: string;
  name?: string;
}

function isSuggestion(item: unknown): item is Suggestion {
  return (
    typeof item === 'object' &&
    item !== null &&
    'key' in item &&
    typeof item.key === 'string'
  );
}

export function extractSelectionFromUrl(url: string): string | null {
  const match = url.match(/[?&]q=([^&#]+)/);
  if (!match) return null;
  try {
    return decodeURIComponent(match[1].replace(/\+/g, ' '));
  } catch {
    return match[1];
  }
}

export function describeError(error: unknown): string {
  if (error instanceof AxiosError) {
    return error.response
      ? `HTTP ${error.response.status}`
      : `${error.code ?? 'ERR_NETWORK'}: ${error.message}`;
  }
  return error instanceof Error ? error.message : String(error);
}

@Injectable()
export class ScheduleSourceService {
  private readonly logger = new Logger(ScheduleSourceService.name);

  constructor(
    private readonly httpService: HttpService,
    @Inject(SCHEDULE_CONFIG) private readonly config: ScheduleConfig,
  ) {}

  /** Origin of the source page if it is an http(s) URL, else of the configured one. */
  resolveApiBase(source: string): string {
    for (const candidate of [source, this.config.url]) {
      try {
        const url = new URL(candidate);
        if (url.protocol === 'http:' || url.protocol === 'https:') {
          return url.origin;
        }
      } catch {
        continue;
      }
    }
    return 'https://rasp.rea.ru';
  }

  openSession(baseUrl: string): ScheduleSession {
    return new ScheduleSession(baseUrl, this.config.detailsConcurrency);
  }

  private headers(baseUrl: string): Record<string, string> {
    return {
      'X-Requested-With': 'XMLHttpRequest',
      Referer: `${baseUrl}/`,
    };
  }

  async resolveGroupKey(
    sourceUrl: string,
    group: string,
    session: ScheduleSession,
  ): Promise<string> {
    const selection = extractSelectionFromUrl(sourceUrl);
    if (selection) return selection;

    try {
      const { data } = await firstValueFrom(
        this.httpService.get<unknown>(`${session.baseUrl}${SUGGESTIONS_PATH}`, {
          params: { searchFor: group },
          headers: this.headers(session.baseUrl),
          timeout: this.config.suggestionTimeoutMs,
          signal: session.signal,
        }),
      );

      if (!Array.isArray(data)) {
        this.logger.warn('API подсказок вернуло некорректный ответ');
        return group;
      }

      const match = data
        .filter(isSuggestion)
        .find((item) => item.key.toLowerCase() === group.toLowerCase());
      return match ? match.key : group;
    } catch (error) {
      this.logger.warn(
        `Не удалось уточнить ключ группы ${group}: ${describeError(error)}`,
      );
      return group;
    }
  }

  async fetchMarkup(
    baseUrl: string,
    key: string,
    session: ScheduleSession,
  ): Promise<string | null> {
    try {
      const { data } = await firstValueFrom(
        this.httpService.get<string>(`${baseUrl}${SCHEDULE_CARD_PATH}`, {
          params: { selection: key },
          headers: this.headers(baseUrl),
          timeout: this.config.requestTimeoutMs,
          responseType: 'text',
          signal: session.signal,
        }),
      );
      return typeof data === 'string' ? data : '';
    } catch (error) {
      this.logger.error(
        `Не удалось загрузить расписание для ${key}: ${describeError(error)}`,
      );
      return null;
    }
  }

  async fetchDetails(
    baseUrl: string,
    elementId: string,
    session: ScheduleSession,
  ): Promise<LessonDetails> {
    try {
      const { data } = await firstValueFrom(
        this.httpService.get<string>(`${baseUrl}${DETAILS_PATH}`, {
          params: { id: elementId },
          headers: this.headers(baseUrl),
          timeout: this.config.detailsTimeoutMs,
          responseType: 'text',
          signal: session.signal,
        }),
      );
      return typeof data === 'string' ? parseLessonDetails(data) : {};
    } catch (error) {
      this.logger.warn(
        `Не удалось получить детали занятия ${elementId}: ${describeError(error)}`,
      );
      return {};
    }
  }
}
