import { addDays, differenceInCalendarDays, format, isMonday, nextMonday } from 'date-fns'

export const REGULAR_SEASON_WEEKS = 18

// Kickoff is the Thursday after Labor Day.
export function seasonKickoff(season: number): Date {
  const septemberFirst = new Date(season, 8, 1)
  const laborDay = isMonday(septemberFirst) ? septemberFirst : nextMonday(septemberFirst)
  return addDays(laborDay, 3)
}

export function currentNflWeek(now: Date, season: number): number {
  const days = differenceInCalendarDays(now, seasonKickoff(season))
  if (days < 0) return 1
  return Math.min(REGULAR_SEASON_WEEKS, Math.floor(days / 7) + 1)
}

export function describeWeek(week: number, season: number): string {
  const start = addDays(seasonKickoff(season), (week - 1) * 7)
  return `Week ${week} (${format(start, 'MMM d, yyyy')})`
}
