import stringWidth from "string-width"

const MINUTE_MS = 60 * 1000
const HOUR_MS = 60 * MINUTE_MS
const DAY_MS = 24 * HOUR_MS

const MONTH_NAMES = ["Jan", "Feb", "Mar", "Apr", "May", "Jun", "Jul", "Aug", "Sep", "Oct", "Nov", "Dec"] as const

const plural = (count: number, unit: string): string => {
  return count === 1 ? `1 ${unit} ago` : `${String(count)} ${unit}s ago`
}

export const formatAge = (from: Date, now: Date = new Date()): string => {
  const elapsed = now.getTime() - from.getTime()
  if (elapsed < MINUTE_MS) {
    return "just now"
  }
  if (elapsed < HOUR_MS) {
    return plural(Math.floor(elapsed / MINUTE_MS), "minute")
  }
  if (elapsed < DAY_MS) {
    return plural(Math.floor(elapsed / HOUR_MS), "hour")
  }
  return plural(Math.floor(elapsed / DAY_MS), "day")
}

/** Like formatAge, but says "yesterday" and switches to a date after a week. */
export const formatRelativeTime = (from: Date, now: Date = new Date()): string => {
  const elapsed = now.getTime() - from.getTime()
  if (elapsed < DAY_MS) {
    return formatAge(from, now)
  }
  if (elapsed < 2 * DAY_MS) {
    return "yesterday"
  }
  if (elapsed < 7 * DAY_MS) {
    return `${String(Math.floor(elapsed / DAY_MS))} days ago`
  }
  return `${MONTH_NAMES[from.getMonth()] ?? ""} ${String(from.getDate())}, ${String(from.getFullYear())}`
}

export const padToDisplayWidth = (value: string, width: number): string => {
  const visibleLength = stringWidth(value)
  if (visibleLength >= width) {
    return value
  }
  return `${value}${" ".repeat(width - visibleLength)}`
}
