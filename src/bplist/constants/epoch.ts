/** 2001-01-01T00:00:00Z, the reference date of Core Foundation absolute time, in Unix milliseconds */
export const cfAbsoluteTimeEpochMilliseconds = 978_307_200_000;
