import { Injectable, Logger } from '@nestjs/common';
import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import { calendarFileNames } from '../helpers/slug';
import { CalendarExportError } from './calendar.errors';
import type { CalendarPair } from './ics-builder';

export interface ExportedCalendars {
  mobile: string;
  google: string;
}

@Injectable()
export class CalendarExportService {
  private readonly logger = new Logger(CalendarExportService.name);

  async writeCalendars(
    calendars: CalendarPair,
    directory: string,
    group: string,
  ): Promise<ExportedCalendars> {
    const names = calendarFileNames(group);
    const paths: ExportedCalendars = {
      mobile: join(directory, names.mobile),
      google: join(directory, names.google),
    };

    try {
      await mkdir(directory, { recursive: true });
    } catch (error) {
      throw this.toExportError(error, directory);
    }

    for (const dialect of ['mobile', 'google'] as const) {
      try {
        await writeFile(paths[dialect], calendars[dialect]);
      } catch (error) {
        throw this.toExportError(error, paths[dialect]);
      }
    }

    this.logger.log(`Календари сохранены: ${paths.mobile}, ${paths.google}`);
    return paths;
  }

  private toExportError(error: unknown, path: string): CalendarExportError {
    const reason = error instanceof Error ? error.message : String(error);
    this.logger.error(`Не удалось записать ${path}: ${reason}`);
    return new CalendarExportError(`Не удалось записать ${path}: ${reason}`, path);
  }
}
