export interface TimeSpan {
  begin: number;
  end: number;
}

const toEpochSeconds = (date: Date): number => Math.floor(date.getTime() / 1000);

/**
 * Window from local midnight `days` days ago to the last second of today, in epoch seconds.
 * Evaluated against `now` on every call.
 */
export function daysSpanInTimestamps(days: number, now: Date = new Date()): TimeSpan {
  const firstDay = new Date(now.getTime());
  firstDay.setDate(firstDay.getDate() - days);
  firstDay.setHours(0, 0, 0, 0);

  const lastDay = new Date(now.getTime());
  lastDay.setHours(23, 59, 59, 999);

  return {
    begin: toEpochSeconds(firstDay),
    end: toEpochSeconds(lastDay),
  };
}
