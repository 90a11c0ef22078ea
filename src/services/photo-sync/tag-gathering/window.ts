import type {
  CalendarDate,
  DateRange,
} from '@root/types/google-photos.types.js'
import { isValid, parseISO, subDays } from 'date-fns'

/**
 * Oldest capture time still inside a trailing window of `windowDays` days
 */
export function computeWindowCutoff(now: Date, windowDays: number): Date {
  return subDays(now, windowDays)
}

/**
 * @returns whether the capture time falls inside the window, or null when
 * the timestamp is missing or unparseable
 */
export function isWithinWindow(
  creationTime: string | null | undefined,
  cutoff: Date,
): boolean | null {
  if (!creationTime) {
    return null
  }
  const captured = parseISO(creationTime)
  if (!isValid(captured)) {
    return null
  }
  return captured.getTime() >= cutoff.getTime()
}

function toCalendarDate(date: Date): CalendarDate {
  return {
    year: date.getUTCFullYear(),
    month: date.getUTCMonth() + 1,
    day: date.getUTCDate(),
  }
}

/**
 * Calendar-date range covering the window, in UTC, for the remote date filter
 */
export function buildWindowDateRange(now: Date, windowDays: number): DateRange {
  return {
    startDate: toCalendarDate(computeWindowCutoff(now, windowDays)),
    endDate: toCalendarDate(now),
  }
}
