/** 22:00 through 05:59. */
export const DEFAULT_NIGHT_HOURS: ReadonlySet<number> = new Set([
  22, 23, 0, 1, 2, 3, 4, 5,
]);

export const isNightTime = (
  hour: number,
  nightHours: ReadonlySet<number> = DEFAULT_NIGHT_HOURS
) => nightHours.has(hour);
