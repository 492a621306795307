import { Module } from '@nestjs/common';
import { ScheduleModule } from '../schedule/schedule.module';
import { CalendarService } from './calendar.service';
import { CalendarExportService } from './calendar-export.service';

@Module({
  imports: [ScheduleModule],
  providers: [CalendarService, CalendarExportService],
  exports: [CalendarService, CalendarExportService],
})
export class CalendarModule {}
