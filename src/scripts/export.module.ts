import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { CalendarModule } from '../calendar/calendar.module';
import { validateEnv } from '../config/env.validation';
import { ScheduleModule } from '../schedule/schedule.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validate: validateEnv,
    }),
    ScheduleModule,
    CalendarModule,
  ],
})
export class ExportModule {}
