import { ConfigService } from '@nestjs/config';
import {
  DEFAULT_SCHEDULE_GROUP,
  DEFAULT_SCHEDULE_URL,
  loadScheduleConfig,
} from './schedule.config';

const configFrom = (values: Record<string, string>) =>
  loadScheduleConfig(new ConfigService(values));

describe('loadScheduleConfig', () => {
  it('applies the defaults', () => {
    expect(configFrom({})).toEqual({
      url: DEFAULT_SCHEDULE_URL,
      group: DEFAULT_SCHEDULE_GROUP,
      timezone: 'Europe/Moscow',
      fetchDetails: true,
      requestTimeoutMs: 20000,
      suggestionTimeoutMs: 15000,
      detailsTimeoutMs: 5000,
      detailsConcurrency: 5,
    });
  });

  it('reads overrides from the environment', () => {
    const config = configFrom({
      SCHEDULE_URL: 'http://localhost:8080/',
      SCHEDULE_GROUP: '  ИБ-21 ',
      SCHEDULE_TIMEZONE: 'Asia/Yekaterinburg',
      SCHEDULE_FETCH_DETAILS: '0',
      SCHEDULE_REQUEST_TIMEOUT_MS: '1000',
      SCHEDULE_DETAILS_CONCURRENCY: '2',
    });

    expect(config.url).toBe('http://localhost:8080/');
    expect(config.group).toBe('ИБ-21');
    expect(config.timezone).toBe('Asia/Yekaterinburg');
    expect(config.fetchDetails).toBe(false);
    expect(config.requestTimeoutMs).toBe(1000);
    expect(config.detailsConcurrency).toBe(2);
  });

  it('ignores non-positive numbers', () => {
    const config = configFrom({
      SCHEDULE_DETAILS_TIMEOUT_MS: '0',
      SCHEDULE_SUGGESTION_TIMEOUT_MS: '-5',
    });
    expect(config.detailsTimeoutMs).toBe(5000);
    expect(config.suggestionTimeoutMs).toBe(15000);
  });

  it('disables detail lookups only for false or 0', () => {
    expect(configFrom({ SCHEDULE_FETCH_DETAILS: 'false' }).fetchDetails).toBe(false);
    expect(configFrom({ SCHEDULE_FETCH_DETAILS: 'true' }).fetchDetails).toBe(true);
    expect(configFrom({ SCHEDULE_FETCH_DETAILS: '1' }).fetchDetails).toBe(true);
  });
});
