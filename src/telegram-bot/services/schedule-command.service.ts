import { Inject, Injectable, Logger } from '@nestjs/common';
import { Context } from 'telegraf';
import { CalendarService } from '../../calendar/calendar.service';
import { todayIn } from '../../helpers/date-parser';
import {
  SCHEDULE_UNAVAILABLE_MESSAGE,
  formatScheduleMessage,
} from '../../helpers/schedule-formatter';
import { calendarFileNames } from '../../helpers/slug';
import { ScheduleInputError } from '../../schedule/schedule.errors';
import { ScheduleService } from '../../schedule/schedule.service';
import type { WeekSchedule } from '../../schedule/schedule.types';
import { SCHEDULE_TIMEZONE, type TimezoneHandle } from '../../schedule/timezone';
import {
  BUTTON_TEXT_ICS,
  BUTTON_TEXT_WEEKLY,
  getMainKeyboard,
} from '../helpers/keyboard.helper';

export type ReplyContext = Pick<Context, 'reply' | 'replyWithDocument'>;

export type ChatKind = 'private' | 'group' | 'supergroup' | 'channel';

export const SCHEDULE_EMPTY_MESSAGE =
  'Не удалось найти занятия для указанной группы. Проверьте URL и код группы.';
export const FILES_SEND_FAILED_MESSAGE =
  '❌ Ошибка при отправке файлов. Попробуйте позже.';

export const TRIGGER_PHRASES = [
  'бот, кинь расписание',
  'бот кинь расписание',
  'бот, дай расписание',
  'бот дай расписание',
  'бот покажи расписание',
];

export function isScheduleRequest(text: string, botUsername?: string): boolean {
  const normalized = text.toLowerCase();
  if (botUsername && normalized.includes(`@${botUsername.toLowerCase()}`)) {
    return true;
  }
  if (normalized.includes('распис')) return true;
  return TRIGGER_PHRASES.some((phrase) => normalized.includes(phrase));
}

export function wantsCalendarFiles(text: string): boolean {
  const normalized = text.toLowerCase();
  return normalized.includes('ics') || normalized.includes('файл');
}

/** Аргументы команды без самой команды: `/week url group` -> [url, group]. */
export function getCommandArgs(text: string): string[] {
  const [, ...args] = text.trim().split(/\s+/);
  return args.filter(Boolean);
}

@Injectable()
export class ScheduleCommandService {
  private readonly logger = new Logger(ScheduleCommandService.name);

  constructor(
    private readonly scheduleService: ScheduleService,
    private readonly calendarService: CalendarService,
    @Inject(SCHEDULE_TIMEZONE) private readonly timezone: TimezoneHandle,
  ) {}

  getHelpMessage(): string {
    const { url, group } = this.scheduleService.defaults;
    return [
      '👋 Привет! Я бот для расписания. Доступные команды:',
      '• /week [url] [group] — расписание недели текстом',
      '• /ics [url] [group] — .ics файлы (мобильный и Google)',
      "• В группе можно написать: 'Бот, кинь расписание'",
      '',
      `По умолчанию: URL=${url}, группа=${group}`,
    ].join('\n');
  }

  getUsageHint(): string {
    return '❌ Укажите URL и код группы: /week [url] [group] или /ics [url] [group]';
  }

  resolveArgs(args: string[]): { url: string; group: string } {
    const defaults = this.scheduleService.defaults;
    return {
      url: args[0] ?? defaults.url,
      group: args[1] ?? defaults.group,
    };
  }

  async handleStart(ctx: ReplyContext): Promise<void> {
    await ctx.reply(this.getHelpMessage(), getMainKeyboard());
  }

  async handleWeek(ctx: ReplyContext, args: string[] = []): Promise<void> {
    const schedule = await this.loadSchedule(ctx, args);
    if (!schedule) return;

    await ctx.reply(
      formatScheduleMessage(schedule, todayIn(this.timezone.zone)),
      getMainKeyboard(),
    );
    this.logger.log(`Расписание недели отправлено для группы ${schedule.group}`);
  }

  async handleIcs(ctx: ReplyContext, args: string[] = []): Promise<void> {
    const schedule = await this.loadSchedule(ctx, args);
    if (!schedule) return;

    if (!schedule.available) {
      await ctx.reply(SCHEDULE_UNAVAILABLE_MESSAGE);
      return;
    }

    const calendars = this.calendarService.buildForSchedule(schedule);
    if (!calendars) {
      await ctx.reply(SCHEDULE_EMPTY_MESSAGE);
      return;
    }

    const names = calendarFileNames(schedule.group);
    try {
      await ctx.replyWithDocument({
        source: calendars.mobile,
        filename: names.mobile,
      });
      await ctx.replyWithDocument({
        source: calendars.google,
        filename: names.google,
      });
      this.logger.log(`Файлы расписания отправлены для группы ${schedule.group}`);
    } catch (error) {
      this.logger.error(
        `Ошибка при отправке файлов для группы ${schedule.group}`,
        error instanceof Error ? error.stack : String(error),
      );
      await ctx.reply(FILES_SEND_FAILED_MESSAGE);
    }
  }

  /**
   * Разбор свободного текста. Возвращает false, если сообщение не относится
   * к расписанию и бот промолчал.
   */
  async handleText(
    ctx: ReplyContext,
    text: string,
    chatType: ChatKind | undefined,
    botUsername?: string,
  ): Promise<boolean> {
    if (text === BUTTON_TEXT_WEEKLY) {
      await this.handleWeek(ctx);
      return true;
    }
    if (text === BUTTON_TEXT_ICS) {
      await this.handleIcs(ctx);
      return true;
    }
    if (text.startsWith('/')) return false;

    if (chatType === 'private') {
      if (wantsCalendarFiles(text)) await this.handleIcs(ctx);
      else await this.handleWeek(ctx);
      return true;
    }

    if (
      (chatType === 'group' || chatType === 'supergroup') &&
      isScheduleRequest(text, botUsername)
    ) {
      await this.handleWeek(ctx);
      return true;
    }

    return false;
  }

  private async loadSchedule(
    ctx: ReplyContext,
    args: string[],
  ): Promise<WeekSchedule | null> {
    const { url, group } = this.resolveArgs(args);
    try {
      return await this.scheduleService.fetchWeekSchedule(url, group);
    } catch (error) {
      if (error instanceof ScheduleInputError) {
        this.logger.warn(`Некорректный запрос расписания: ${error.message}`);
        await ctx.reply(this.getUsageHint());
        return null;
      }
      throw error;
    }
  }
}
