import { ArgumentsHost, Catch, ExceptionFilter, Logger } from '@nestjs/common';
import { TelegrafArgumentsHost } from 'nestjs-telegraf';
import { Context, TelegramError } from 'telegraf';

@Catch()
export class TelegrafExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(TelegrafExceptionFilter.name);

  async catch(exception: unknown, host: ArgumentsHost): Promise<void> {
    const telegrafHost = TelegrafArgumentsHost.create(host);
    const ctx = telegrafHost.getContext<Context>();

    let userContext = 'Unknown User';
    if (ctx?.from) {
      userContext = `${ctx.from.first_name}${
        ctx.from.last_name ? ' ' + ctx.from.last_name : ''
      } (@${ctx.from.username || 'no_user'}, id: ${ctx.from.id})`;
    }

    let messageContext = '';
    const update = ctx?.update;
    if (update && 'message' in update) {
      messageContext = `\nMessage: ${
        'text' in update.message ? update.message.text : '[non-text message]'
      }`;
    }

    const errorDescription =
      exception instanceof TelegramError
        ? exception.description
        : exception instanceof Error
          ? exception.message
          : String(exception);
    const stack = exception instanceof Error ? exception.stack : undefined;

    this.logger.error(
      `Telegraf error in ${ctx?.updateType} update for ${userContext}: ${errorDescription}${messageContext}`,
      stack,
    );

    if (ctx?.chat?.type === 'private') {
      try {
        await ctx.reply(
          '❌ Ой! Что-то пошло не так при обработке запроса. Попробуйте позже.',
        );
      } catch (replyError) {
        this.logger.warn(
          `Не удалось уведомить пользователя об ошибке: ${
            replyError instanceof Error ? replyError.message : String(replyError)
          }`,
        );
      }
    }
  }
}
