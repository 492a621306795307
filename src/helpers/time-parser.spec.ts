import {
  formatTime,
  parseTimeSlot,
  parseTimeToken,
  timeToMinutes,
} from './time-parser';

describe('parseTimeSlot', () => {
  it('reads the pair number and both times', () => {
    expect(parseTimeSlot('1 пара 09:00 10:30')).toEqual({
      start: { hours: 9, minutes: 0 },
      end: { hours: 10, minutes: 30 },
      pairNumber: 1,
    });
  });

  it('accepts single-digit hours and separators between times', () => {
    expect(parseTimeSlot('3 ПАРА 9:00-10:30')).toEqual({
      start: { hours: 9, minutes: 0 },
      end: { hours: 10, minutes: 30 },
      pairNumber: 3,
    });
  });

  it('leaves the pair number out when the cell has none', () => {
    const slot = parseTimeSlot('12:40 14:10');
    expect(slot).toEqual({
      start: { hours: 12, minutes: 40 },
      end: { hours: 14, minutes: 10 },
    });
    expect(slot?.pairNumber).toBeUndefined();
  });

  it('returns null for fewer than two time tokens', () => {
    expect(parseTimeSlot('1 пара 09:00')).toBeNull();
    expect(parseTimeSlot('—')).toBeNull();
    expect(parseTimeSlot('')).toBeNull();
    expect(parseTimeSlot(undefined)).toBeNull();
  });

  it('returns null for out-of-range times', () => {
    expect(parseTimeSlot('25:00 26:00')).toBeNull();
    expect(parseTimeSlot('09:00 10:75')).toBeNull();
  });
});

describe('parseTimeToken', () => {
  it('parses hours and minutes', () => {
    expect(parseTimeToken('08', '05')).toEqual({ hours: 8, minutes: 5 });
    expect(parseTimeToken('24', '00')).toBeNull();
  });
});

describe('formatTime / timeToMinutes', () => {
  it('pads to HH:MM', () => {
    expect(formatTime({ hours: 9, minutes: 5 })).toBe('09:05');
  });

  it('counts minutes since midnight', () => {
    expect(timeToMinutes({ hours: 10, minutes: 30 })).toBe(630);
  });
});
