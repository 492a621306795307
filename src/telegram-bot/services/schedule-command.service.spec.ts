import { Logger } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { CalendarService } from '../../calendar/calendar.service';
import {
  SCHEDULE_NOT_FOUND_MESSAGE,
  SCHEDULE_UNAVAILABLE_MESSAGE,
} from '../../helpers/schedule-formatter';
import { ScheduleInputError } from '../../schedule/schedule.errors';
import { ScheduleService } from '../../schedule/schedule.service';
import type { WeekSchedule } from '../../schedule/schedule.types';
import { SCHEDULE_TIMEZONE, resolveTimezone } from '../../schedule/timezone';
import { BUTTON_TEXT_ICS, BUTTON_TEXT_WEEKLY } from '../helpers/keyboard.helper';
import {
  FILES_SEND_FAILED_MESSAGE,
  SCHEDULE_EMPTY_MESSAGE,
  ScheduleCommandService,
  getCommandArgs,
  isScheduleRequest,
  wantsCalendarFiles,
} from './schedule-command.service';

const DEFAULT_URL = 'https://rasp.rea.ru/?q=%D0%98%D0%91-21';

const schedule = (overrides: Partial<WeekSchedule> = {}): WeekSchedule => ({
  group: 'ИБ-21',
  sourceUrl: DEFAULT_URL,
  events: [],
  available: true,
  ...overrides,
});

describe('ScheduleCommandService', () => {
  let service: ScheduleCommandService;
  let fetchWeekSchedule: jest.Mock;
  let buildForSchedule: jest.Mock;
  let ctx: { reply: jest.Mock; replyWithDocument: jest.Mock };

  beforeEach(async () => {
    fetchWeekSchedule = jest.fn();
    buildForSchedule = jest.fn();
    ctx = { reply: jest.fn(), replyWithDocument: jest.fn() };
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => {});
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => {});
    jest.spyOn(Logger.prototype, 'error').mockImplementation(() => {});

    const moduleRef = await Test.createTestingModule({
      providers: [
        ScheduleCommandService,
        {
          provide: ScheduleService,
          useValue: {
            defaults: { url: DEFAULT_URL, group: 'ИБ-21' },
            fetchWeekSchedule,
          },
        },
        { provide: CalendarService, useValue: { buildForSchedule } },
        {
          provide: SCHEDULE_TIMEZONE,
          useValue: resolveTimezone('Europe/Moscow'),
        },
      ],
    }).compile();

    service = moduleRef.get(ScheduleCommandService);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('handleIcs', () => {
    it('sends both calendars for a populated schedule', async () => {
      const calendars = {
        mobile: Buffer.from('mobile'),
        google: Buffer.from('google'),
      };
      fetchWeekSchedule.mockResolvedValue(schedule());
      buildForSchedule.mockReturnValue(calendars);

      await service.handleIcs(ctx);

      expect(fetchWeekSchedule).toHaveBeenCalledWith(DEFAULT_URL, 'ИБ-21');
      expect(ctx.replyWithDocument).toHaveBeenCalledTimes(2);
      expect(ctx.replyWithDocument).toHaveBeenNthCalledWith(1, {
        source: calendars.mobile,
        filename: 'schedule_ib-21.ics',
      });
      expect(ctx.replyWithDocument).toHaveBeenNthCalledWith(2, {
        source: calendars.google,
        filename: 'schedule_ib-21_google.ics',
      });
      expect(ctx.reply).not.toHaveBeenCalled();
    });

    it('reports an unavailable schedule without building calendars', async () => {
      fetchWeekSchedule.mockResolvedValue(schedule({ available: false }));

      await service.handleIcs(ctx);

      expect(ctx.reply).toHaveBeenCalledWith(SCHEDULE_UNAVAILABLE_MESSAGE);
      expect(buildForSchedule).not.toHaveBeenCalled();
    });

    it('reports an empty schedule with its own message', async () => {
      fetchWeekSchedule.mockResolvedValue(schedule());
      buildForSchedule.mockReturnValue(null);

      await service.handleIcs(ctx);

      expect(ctx.reply).toHaveBeenCalledWith(SCHEDULE_EMPTY_MESSAGE);
      expect(SCHEDULE_EMPTY_MESSAGE).not.toBe(SCHEDULE_UNAVAILABLE_MESSAGE);
      expect(ctx.replyWithDocument).not.toHaveBeenCalled();
    });

    it('tells the user when sending a file fails', async () => {
      fetchWeekSchedule.mockResolvedValue(schedule());
      buildForSchedule.mockReturnValue({
        mobile: Buffer.from('mobile'),
        google: Buffer.from('google'),
      });
      ctx.replyWithDocument.mockRejectedValue(new Error('Request Entity Too Large'));

      await service.handleIcs(ctx);

      expect(ctx.reply).toHaveBeenCalledWith(FILES_SEND_FAILED_MESSAGE);
    });

    it('passes url and group arguments through', async () => {
      fetchWeekSchedule.mockResolvedValue(schedule({ available: false }));

      await service.handleIcs(ctx, ['https://rasp.rea.ru/', 'ЦИС-33']);

      expect(fetchWeekSchedule).toHaveBeenCalledWith(
        'https://rasp.rea.ru/',
        'ЦИС-33',
      );
    });
  });

  describe('handleWeek', () => {
    it('replies with the formatted week and the keyboard', async () => {
      fetchWeekSchedule.mockResolvedValue(schedule());

      await service.handleWeek(ctx, ['https://rasp.rea.ru/?q=X']);

      expect(fetchWeekSchedule).toHaveBeenCalledWith(
        'https://rasp.rea.ru/?q=X',
        'ИБ-21',
      );
      expect(ctx.reply).toHaveBeenCalledWith(
        `Группа ИБ-21\n\n${SCHEDULE_NOT_FOUND_MESSAGE}`,
        expect.objectContaining({ reply_markup: expect.anything() }),
      );
    });

    it('replies with the unavailable message when the fetch failed', async () => {
      fetchWeekSchedule.mockResolvedValue(schedule({ available: false }));

      await service.handleWeek(ctx);

      expect(ctx.reply).toHaveBeenCalledWith(
        SCHEDULE_UNAVAILABLE_MESSAGE,
        expect.anything(),
      );
    });

    it('answers invalid input with the usage hint', async () => {
      fetchWeekSchedule.mockRejectedValue(
        new ScheduleInputError('Не указан код группы'),
      );

      await service.handleWeek(ctx);

      expect(ctx.reply).toHaveBeenCalledWith(service.getUsageHint());
    });

    it('rethrows unexpected errors for the exception filter', async () => {
      fetchWeekSchedule.mockRejectedValue(new Error('unexpected'));

      await expect(service.handleWeek(ctx)).rejects.toThrow('unexpected');
    });
  });

  describe('handleText', () => {
    let week: jest.SpyInstance;
    let ics: jest.SpyInstance;

    beforeEach(() => {
      week = jest.spyOn(service, 'handleWeek').mockResolvedValue(undefined);
      ics = jest.spyOn(service, 'handleIcs').mockResolvedValue(undefined);
    });

    it('routes the keyboard buttons in any chat', async () => {
      await expect(
        service.handleText(ctx, BUTTON_TEXT_WEEKLY, 'group'),
      ).resolves.toBe(true);
      await expect(
        service.handleText(ctx, BUTTON_TEXT_ICS, 'supergroup'),
      ).resolves.toBe(true);
      expect(week).toHaveBeenCalledTimes(1);
      expect(ics).toHaveBeenCalledTimes(1);
    });

    it('sends files in private chats when asked for them', async () => {
      await service.handleText(ctx, 'скинь файл пожалуйста', 'private');
      await service.handleText(ctx, 'привет', 'private');

      expect(ics).toHaveBeenCalledTimes(1);
      expect(week).toHaveBeenCalledTimes(1);
    });

    it('answers group chats only on a schedule request', async () => {
      await expect(
        service.handleText(ctx, 'Бот, кинь расписание', 'group'),
      ).resolves.toBe(true);
      await expect(
        service.handleText(ctx, '@rasp_test_bot что там?', 'supergroup', 'rasp_test_bot'),
      ).resolves.toBe(true);
      await expect(
        service.handleText(ctx, 'всем привет', 'group', 'rasp_test_bot'),
      ).resolves.toBe(false);
      expect(week).toHaveBeenCalledTimes(2);
    });

    it('ignores unknown commands', async () => {
      await expect(service.handleText(ctx, '/unknown', 'private')).resolves.toBe(
        false,
      );
      expect(week).not.toHaveBeenCalled();
    });
  });

  it('mentions the defaults in the help text', () => {
    expect(service.getHelpMessage()).toContain(
      `По умолчанию: URL=${DEFAULT_URL}, группа=ИБ-21`,
    );
  });
});

describe('message helpers', () => {
  it('detects schedule requests', () => {
    expect(isScheduleRequest('Покажи РАСПИСАНИЕ')).toBe(true);
    expect(isScheduleRequest('бот дай расписание')).toBe(true);
    expect(isScheduleRequest('эй @Rasp_Test_Bot', 'rasp_test_bot')).toBe(true);
    expect(isScheduleRequest('как дела?', 'rasp_test_bot')).toBe(false);
  });

  it('detects requests for calendar files', () => {
    expect(wantsCalendarFiles('Дай ICS')).toBe(true);
    expect(wantsCalendarFiles('Файлы')).toBe(true);
    expect(wantsCalendarFiles('неделя')).toBe(false);
  });

  it('splits command arguments', () => {
    expect(getCommandArgs('/week  https://rasp.rea.ru/?q=X   ИБ-21 ')).toEqual([
      'https://rasp.rea.ru/?q=X',
      'ИБ-21',
    ]);
    expect(getCommandArgs('/ics')).toEqual([]);
  });
});
