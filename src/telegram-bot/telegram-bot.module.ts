import { Module } from '@nestjs/common';
import { CalendarModule } from '../calendar/calendar.module';
import { ScheduleModule } from '../schedule/schedule.module';
import { ScheduleCommandService } from './services/schedule-command.service';
import { TelegramBotService } from './telegram-bot.service';

@Module({
  imports: [ScheduleModule, CalendarModule],
  providers: [TelegramBotService, ScheduleCommandService],
  exports: [TelegramBotService],
})
export class TelegramBotModule {}
