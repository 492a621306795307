import { Module } from '@nestjs/common';
import { HttpModule } from '@nestjs/axios';
import {
  SCHEDULE_CONFIG,
  scheduleConfigProvider,
  type ScheduleConfig,
} from '../config/schedule.config';
import { ScheduleService } from './schedule.service';
import { ScheduleSourceService } from './schedule-source.service';
import { SCHEDULE_TIMEZONE, resolveTimezone } from './timezone';

@Module({
  imports: [HttpModule],
  providers: [
    scheduleConfigProvider,
    {
      provide: SCHEDULE_TIMEZONE,
      useFactory: (config: ScheduleConfig) => resolveTimezone(config.timezone),
      inject: [SCHEDULE_CONFIG],
    },
    ScheduleSourceService,
    ScheduleService,
  ],
  exports: [ScheduleService, SCHEDULE_CONFIG, SCHEDULE_TIMEZONE],
})
export class ScheduleModule {}
