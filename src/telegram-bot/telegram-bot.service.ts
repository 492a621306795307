import { Injectable, Logger, OnModuleInit, UseFilters } from '@nestjs/common';
import {
  Command,
  Ctx,
  Help,
  InjectBot,
  On,
  Start,
  Update,
} from 'nestjs-telegraf';
import { Context, Telegraf } from 'telegraf';
import { TelegrafExceptionFilter } from './filters/telegraf-exception.filter';
import {
  ScheduleCommandService,
  getCommandArgs,
} from './services/schedule-command.service';

function messageText(ctx: Context): string {
  const message = ctx.message;
  return message && 'text' in message ? message.text : '';
}

export interface MenuCommand {
  command: string;
  description: string;
}

export const BOT_COMMANDS: readonly MenuCommand[] = [
  { command: 'start', description: 'Вступление и примеры команд' },
  { command: 'help', description: 'Список команд' },
  { command: 'week', description: 'Расписание недели текстом' },
  { command: 'ics', description: 'Скачать .ics файлы' },
];

@Update()
@Injectable()
@UseFilters(TelegrafExceptionFilter)
export class TelegramBotService implements OnModuleInit {
  private readonly logger = new Logger(TelegramBotService.name);

  constructor(
    private readonly scheduleCommandService: ScheduleCommandService,
    @InjectBot() private readonly bot: Telegraf,
  ) {}

  async onModuleInit() {
    try {
      await this.bot.telegram.setMyCommands(BOT_COMMANDS);
      this.logger.log('Меню команд зарегистрировано');
    } catch (error) {
      // the bot keeps working without the menu
      this.logger.warn(
        `Не удалось зарегистрировать меню команд: ${
          error instanceof Error ? error.message : String(error)
        }`,
      );
    }
  }

  @Start()
  async onStart(@Ctx() ctx: Context) {
    this.logger.log(`/start от ${ctx.from?.id ?? 'unknown'}`);
    await this.scheduleCommandService.handleStart(ctx);
  }

  @Help()
  async onHelp(@Ctx() ctx: Context) {
    await this.scheduleCommandService.handleStart(ctx);
  }

  @Command(['week', 'schedule_text'])
  async onWeek(@Ctx() ctx: Context) {
    await this.scheduleCommandService.handleWeek(
      ctx,
      getCommandArgs(messageText(ctx)),
    );
  }

  @Command(['ics', 'schedule_files'])
  async onIcs(@Ctx() ctx: Context) {
    await this.scheduleCommandService.handleIcs(
      ctx,
      getCommandArgs(messageText(ctx)),
    );
  }

  @On('text')
  async onText(@Ctx() ctx: Context) {
    const text = messageText(ctx);
    if (!text) return;

    const handled = await this.scheduleCommandService.handleText(
      ctx,
      text,
      ctx.chat?.type,
      ctx.botInfo?.username,
    );
    if (!handled) {
      this.logger.debug(`Сообщение в чате ${ctx.chat?.id} пропущено`);
    }
  }
}
