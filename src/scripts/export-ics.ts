import 'reflect-metadata';
import 'dotenv/config';
import { Logger, type LogLevel } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import chalk from 'chalk';
import { CalendarExportService } from '../calendar/calendar-export.service';
import { CalendarService } from '../calendar/calendar.service';
import { resolveLogLevels } from '../logger/log-levels';
import { ScheduleService } from '../schedule/schedule.service';
import {
  EXPORT_USAGE,
  ExportArgumentsError,
  parseExportArguments,
  type ExportArguments,
} from './export-args';
import { ExportModule } from './export.module';

const logger = new Logger('ExportIcsScript');

function logLevels(verbose: boolean): LogLevel[] {
  return resolveLogLevels(verbose ? 'debug' : process.env.LOG_LEVEL);
}

async function exportCalendars(args: ExportArguments): Promise<number> {
  const app = await NestFactory.createApplicationContext(ExportModule, {
    logger: logLevels(args.verbose),
  });

  try {
    const scheduleService = app.get(ScheduleService);
    const calendarService = app.get(CalendarService);
    const exportService = app.get(CalendarExportService);

    const url = args.url ?? scheduleService.defaults.url;
    const group = args.group ?? scheduleService.defaults.group;
    logger.log(`📅 Загружаю расписание группы ${group}...`);

    const schedule = await scheduleService.fetchWeekSchedule(url, group);
    if (!schedule.available) {
      logger.error('❌ Расписание недоступно');
      return 1;
    }

    const calendars = calendarService.buildForSchedule(schedule);
    if (!calendars) {
      logger.error('❌ Не удалось найти занятия для указанной группы');
      return 1;
    }

    const paths = await exportService.writeCalendars(
      calendars,
      args.output,
      group,
    );
    console.log(chalk.green(`✅ Мобильный календарь: ${paths.mobile}`));
    console.log(chalk.green(`✅ Google календарь: ${paths.google}`));
    return 0;
  } finally {
    await app.close();
  }
}

async function main(): Promise<number> {
  let args: ExportArguments;
  try {
    args = parseExportArguments(process.argv.slice(2));
  } catch (error) {
    if (error instanceof ExportArgumentsError) {
      console.error(chalk.red(error.message));
      console.error(EXPORT_USAGE);
      return 1;
    }
    throw error;
  }

  return exportCalendars(args);
}

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    logger.error(
      '❌ Фатальная ошибка:',
      error instanceof Error ? error.stack : String(error),
    );
    process.exit(1);
  });
