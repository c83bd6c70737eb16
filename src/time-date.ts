/**
 * Calendar Dates
 *
 * Pure functions over inclusive calendar dates. Period bounds are whole days,
 * so dates are carried as branded ISO strings and all arithmetic goes through
 * day numbers (Julian Day Number) to avoid month-length and DST edge cases.
 */

import { type Result, Ok, Err } from './result'

export { ParseError } from './errors'
import { ParseError } from './errors'

// ============================================================================
// Branded Types
// ============================================================================

declare const __localDate: unique symbol

/** ISO 8601 date string: YYYY-MM-DD */
export type LocalDate = string & { readonly [__localDate]: true }

// ============================================================================
// Calendar Helpers
// ============================================================================

const MONTH_LENGTHS = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31]

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0
}

export function daysInMonth(year: number, month: number): number {
  if (month === 2 && isLeapYear(year)) return 29
  return MONTH_LENGTHS[month - 1] ?? 0
}

function pad(n: number, width: number): string {
  return String(n).padStart(width, '0')
}

// ============================================================================
// Day Numbers
// ============================================================================

/** Julian Day Number of a proleptic Gregorian date. */
export function toDayNumber(date: LocalDate): number {
  const year = yearOf(date)
  const month = monthOf(date)
  const day = dayOf(date)
  const a = Math.floor((14 - month) / 12)
  const y = year + 4800 - a
  const m = month + 12 * a - 3
  return (
    day +
    Math.floor((153 * m + 2) / 5) +
    365 * y +
    Math.floor(y / 4) -
    Math.floor(y / 100) +
    Math.floor(y / 400) -
    32045
  )
}

export function fromDayNumber(jdn: number): LocalDate {
  const a = jdn + 32044
  const b = Math.floor((4 * a + 3) / 146097)
  const c = a - Math.floor((146097 * b) / 4)
  const d = Math.floor((4 * c + 3) / 1461)
  const e = c - Math.floor((1461 * d) / 4)
  const m = Math.floor((5 * e + 2) / 153)
  const day = e - Math.floor((153 * m + 2) / 5) + 1
  const month = m + 3 - 12 * Math.floor(m / 10)
  const year = 100 * b + d - 4800 + Math.floor(m / 10)
  return makeDate(year, month, day)
}

// ============================================================================
// Parsing & Construction
// ============================================================================

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/
const TIME_PATTERN = /^\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:\d{2})?$/

export function parseDate(str: string): Result<LocalDate, ParseError> {
  const match = DATE_PATTERN.exec(str)
  if (!match) return Err(new ParseError(`Invalid date format: '${str}'`))

  const year = Number(match[1])
  const month = Number(match[2])
  const day = Number(match[3])

  if (month < 1 || month > 12) return Err(new ParseError(`Invalid month in date: '${str}'`))
  if (day < 1 || day > daysInMonth(year, month)) return Err(new ParseError(`Invalid day in date: '${str}'`))

  return Ok(str as LocalDate)
}

/**
 * Parses the date part of a database value. Accepts a bare date or a date
 * followed by a time (`YYYY-MM-DD HH:MM:SS`, `YYYY-MM-DDTHH:MM:SS.sssZ`);
 * the time is dropped, not converted.
 */
export function parseDateValue(str: string): Result<LocalDate, ParseError> {
  if (str.length > 10) {
    const separator = str[10]
    if ((separator !== ' ' && separator !== 'T') || !TIME_PATTERN.test(str.substring(11))) {
      return Err(new ParseError(`Invalid date format: '${str}'`))
    }
    return parseDate(str.substring(0, 10))
  }
  return parseDate(str)
}

export function isValidDate(str: string): boolean {
  return parseDate(str).ok
}

export function makeDate(year: number, month: number, day: number): LocalDate {
  return `${pad(year, 4)}-${pad(month, 2)}-${pad(day, 2)}` as LocalDate
}

// ============================================================================
// Component Extraction
// ============================================================================

export function yearOf(date: LocalDate): number {
  return Number(date.substring(0, 4))
}

export function monthOf(date: LocalDate): number {
  return Number(date.substring(5, 7))
}

export function dayOf(date: LocalDate): number {
  return Number(date.substring(8, 10))
}

// ============================================================================
// Arithmetic
// ============================================================================

export function addDays(date: LocalDate, n: number): LocalDate {
  return fromDayNumber(toDayNumber(date) + n)
}

export function nextDay(date: LocalDate): LocalDate {
  return addDays(date, 1)
}

export function previousDay(date: LocalDate): LocalDate {
  return addDays(date, -1)
}

/** Signed number of days from `a` to `b`. */
export function daysBetween(a: LocalDate, b: LocalDate): number {
  return toDayNumber(b) - toDayNumber(a)
}

// ============================================================================
// Comparison
// ============================================================================

// Zero-padded ISO dates order lexicographically.
export function compareDates(a: LocalDate, b: LocalDate): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}

export function dateBefore(a: LocalDate, b: LocalDate): boolean {
  return a < b
}

export function dateAfter(a: LocalDate, b: LocalDate): boolean {
  return a > b
}

// ============================================================================
// Timestamps
// ============================================================================

/** Local wall-clock time as `YYYY-MM-DD HH:MM:SS`. */
export function formatTimestamp(at: Date): string {
  const date = makeDate(at.getFullYear(), at.getMonth() + 1, at.getDate())
  return `${date} ${pad(at.getHours(), 2)}:${pad(at.getMinutes(), 2)}:${pad(at.getSeconds(), 2)}`
}
