import moment from 'moment-timezone';

export interface SessionCalendar {
  timezone: string;
  offWeekdays: number[]; // ISO weekdays, 1 (Mon) - 7 (Sun)
  sessionStart: string; // HH:mm
}

const ISO_WEEKDAY_NAMES = ['Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday', 'Sunday'];

export const localTime = (now: Date, timezone: string) => moment.tz(now, timezone);

/**
 * Weekday-only gate: the market is considered open on every day that is not
 * configured as off. There is no intraday boundary here.
 */
export const isSessionOpen = (now: Date, calendar: SessionCalendar): boolean => {
  const weekday = localTime(now, calendar.timezone).isoWeekday();
  return !calendar.offWeekdays.includes(weekday);
};

/**
 * Next open day at the session start time, strictly after `now`.
 * Null when every weekday is configured as off.
 */
export const nextSessionStart = (now: Date, calendar: SessionCalendar): moment.Moment | null => {
  const [hour, minute] = calendar.sessionStart.split(':').map(Number);
  const today = localTime(now, calendar.timezone).startOf('day');

  for (let offset = 0; offset <= 7; offset++) {
    const candidate = today.clone().add(offset, 'days').hour(hour).minute(minute);
    if (candidate.valueOf() > now.getTime() && !calendar.offWeekdays.includes(candidate.isoWeekday())) {
      return candidate;
    }
  }
  return null;
};

/**
 * "Monday–Thursday" for a contiguous run of open days, a comma list otherwise.
 */
export const describeSessionDays = (offWeekdays: number[]): string => {
  const open = [1, 2, 3, 4, 5, 6, 7].filter((day) => !offWeekdays.includes(day));
  if (open.length === 0) return 'none';
  if (open.length === 1) return ISO_WEEKDAY_NAMES[open[0] - 1];

  const contiguous = open.every((day, i) => i === 0 || day === open[i - 1] + 1);
  if (contiguous) {
    return `${ISO_WEEKDAY_NAMES[open[0] - 1]}–${ISO_WEEKDAY_NAMES[open[open.length - 1] - 1]}`;
  }
  return open.map((day) => ISO_WEEKDAY_NAMES[day - 1]).join(', ');
};
