import type { FactoryProvider } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

export const SCHEDULE_CONFIG = 'SCHEDULE_CONFIG';

export const DEFAULT_SCHEDULE_URL =
  'https://rasp.rea.ru/?q=15.14%D0%B4-%D0%B3%D0%B301%2F24%D0%BC';
export const DEFAULT_SCHEDULE_GROUP = '15.14д-гг01/24м';

export interface ScheduleConfig {
  /** default source page; its origin is the API host */
  url: string;
  group: string;
  timezone: string;
  fetchDetails: boolean;
  requestTimeoutMs: number;
  suggestionTimeoutMs: number;
  detailsTimeoutMs: number;
  detailsConcurrency: number;
}

function toNumber(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value ?? '', 10);
  return isNaN(parsed) || parsed <= 0 ? fallback : parsed;
}

export function loadScheduleConfig(configService: ConfigService): ScheduleConfig {
  return {
    url: configService.get<string>('SCHEDULE_URL', DEFAULT_SCHEDULE_URL),
    group: configService
      .get<string>('SCHEDULE_GROUP', DEFAULT_SCHEDULE_GROUP)
      .trim(),
    timezone: configService.get<string>('SCHEDULE_TIMEZONE', 'Europe/Moscow'),
    fetchDetails: !['false', '0'].includes(
      configService.get<string>('SCHEDULE_FETCH_DETAILS', 'true'),
    ),
    requestTimeoutMs: toNumber(
      configService.get<string>('SCHEDULE_REQUEST_TIMEOUT_MS'),
      20000,
    ),
    suggestionTimeoutMs: toNumber(
      configService.get<string>('SCHEDULE_SUGGESTION_TIMEOUT_MS'),
      15000,
    ),
    detailsTimeoutMs: toNumber(
      configService.get<string>('SCHEDULE_DETAILS_TIMEOUT_MS'),
      5000,
    ),
    detailsConcurrency: toNumber(
      configService.get<string>('SCHEDULE_DETAILS_CONCURRENCY'),
      5,
    ),
  };
}

export const scheduleConfigProvider: FactoryProvider<ScheduleConfig> = {
  provide: SCHEDULE_CONFIG,
  useFactory: loadScheduleConfig,
  inject: [ConfigService],
};
