import { computeWorkHours, formatHours, parseClock, parseTimeTracking } from './time-tracking.js';

describe('parseTimeTracking', () => {
  it('reads the template fields', () => {
    const content = [
      '# 2024-01-01 (Monday)',
      '## Time Tracking',
      '- **Start time**: 09:00',
      '- **End time**: 17:30',
      '- **Extra hours**: 1.5h',
      '## Ideas',
    ].join('\n');

    expect(parseTimeTracking(content)).toEqual({ startTime: '09:00', endTime: '17:30', extraHours: '1.5h' });
  });

  it('leaves blank fields unset', () => {
    const content = '## Time Tracking\n- **Start time**:\n- **End time**: 5 PM\n';
    expect(parseTimeTracking(content)).toEqual({ endTime: '5 PM' });
  });

  it('accepts other emphasis and casing', () => {
    const content = '## Time Tracking\n**start time:** 9:00 AM\nEnd Time: 6:00PM\n';
    expect(parseTimeTracking(content)).toEqual({ startTime: '9:00 AM', endTime: '6:00PM' });
  });

  it('ignores fields outside the section', () => {
    const content = '## Ideas\n- Start time: 09:00\n## Time Tracking\n- End time: 17:00\n';
    expect(parseTimeTracking(content)).toEqual({ endTime: '17:00' });
  });

  it('returns no fields without a section', () => {
    expect(parseTimeTracking('## Ideas\n- a\n')).toEqual({});
  });
});

describe('parseClock', () => {
  it('parses 24-hour and dotted times', () => {
    expect(parseClock('09:00')).toBe(540);
    expect(parseClock('17:30')).toBe(1050);
    expect(parseClock('17.30')).toBe(1050);
    expect(parseClock('9')).toBe(540);
  });

  it('parses 12-hour times', () => {
    expect(parseClock('9:00 AM')).toBe(540);
    expect(parseClock('5:30PM')).toBe(1050);
    expect(parseClock('12:15 am')).toBe(15);
    expect(parseClock('12 PM')).toBe(720);
    expect(parseClock('5 pm')).toBe(1020);
  });

  it('rejects invalid times', () => {
    expect(parseClock('25:00')).toBeNull();
    expect(parseClock('10:75')).toBeNull();
    expect(parseClock('13 PM')).toBeNull();
    expect(parseClock('noon')).toBeNull();
  });
});

describe('computeWorkHours', () => {
  it('subtracts a one-hour break', () => {
    expect(computeWorkHours({ startTime: '09:00', endTime: '17:00' })).toBe(7);
  });

  it('adds extra hours', () => {
    expect(computeWorkHours({ startTime: '09:00', endTime: '17:00', extraHours: '1.5h' })).toBe(8.5);
    expect(computeWorkHours({ startTime: '09:00', endTime: '17:00', extraHours: '2' })).toBe(9);
  });

  it('ignores unparsable extra hours', () => {
    expect(computeWorkHours({ startTime: '09:00', endTime: '17:00', extraHours: 'some' })).toBe(7);
  });

  it('wraps past midnight', () => {
    expect(computeWorkHours({ startTime: '22:00', endTime: '02:00' })).toBe(3);
  });

  it('never goes below zero before extras', () => {
    expect(computeWorkHours({ startTime: '09:00', endTime: '09:30', extraHours: '1h' })).toBe(1);
  });

  it('returns null when start or end is missing or unusable', () => {
    expect(computeWorkHours({ startTime: '09:00' })).toBeNull();
    expect(computeWorkHours({ startTime: 'morning', endTime: '17:00' })).toBeNull();
  });
});

describe('formatHours', () => {
  it('formats whole and fractional hours', () => {
    expect(formatHours(8)).toBe('8h');
    expect(formatHours(7.5)).toBe('7.5h');
    expect(formatHours(null)).toBe('-');
  });
});
