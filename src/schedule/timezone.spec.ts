import { Logger } from '@nestjs/common';
import { DateTime } from 'luxon';
import { DEFAULT_TIMEZONE, resolveTimezone } from './timezone';

describe('resolveTimezone', () => {
  let warn: jest.SpyInstance;

  beforeEach(() => {
    warn = jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    warn.mockRestore();
  });

  it('resolves a known IANA zone', () => {
    const handle = resolveTimezone('Europe/Moscow');
    expect(handle.name).toBe('Europe/Moscow');
    expect(handle.fallback).toBe(false);
    expect(handle.zone.name).toBe('Europe/Moscow');
    expect(warn).not.toHaveBeenCalled();
  });

  it('falls back to a fixed UTC+3 zone and keeps the requested name', () => {
    const handle = resolveTimezone('Mars/Olympus_Mons');
    expect(handle.fallback).toBe(true);
    expect(handle.name).toBe('Mars/Olympus_Mons');
    expect(handle.zone.offset(Date.UTC(2024, 0, 1))).toBe(180);
    expect(handle.zone.offset(Date.UTC(2024, 6, 1))).toBe(180);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('uses the default zone for a blank name', () => {
    expect(resolveTimezone('  ').name).toBe(DEFAULT_TIMEZONE);
  });

  it('gives Moscow its +03:00 offset', () => {
    const { zone } = resolveTimezone('Europe/Moscow');
    const noon = DateTime.fromISO('2024-09-02T12:00', { zone });
    expect(noon.offset).toBe(180);
  });
});
