import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TelegrafModule } from 'nestjs-telegraf';

import { CalendarModule } from './calendar/calendar.module';
import { validateEnv } from './config/env.validation';
import { HealthController } from './health.controller';
import { ScheduleModule } from './schedule/schedule.module';
import { TelegramBotModule } from './telegram-bot/telegram-bot.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validate: validateEnv,
    }),
    TelegrafModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: (configService: ConfigService) => {
        const token = configService.get<string>('TELEGRAM_BOT_TOKEN');
        if (!token) {
          throw new Error('TELEGRAM_BOT_TOKEN is not set');
        }
        return { token };
      },
      inject: [ConfigService],
    }),
    ScheduleModule,
    CalendarModule,
    TelegramBotModule,
  ],
  controllers: [HealthController],
})
export class AppModule {}
