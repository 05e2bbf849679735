// utils/calendar.ts
import { DateTime } from 'luxon'

const FRIDAY = 5
const SATURDAY = 6
const SUNDAY = 7

/**
 * 指定月の第3金曜日
 */
export function thirdFriday(month: DateTime): DateTime {
  const first = month.startOf('month')
  const offset = (FRIDAY - first.weekday + 7) % 7
  return first.plus({ days: offset + 14 })
}

/**
 * 復活祭の日付 (グレゴリオ暦)
 */
export function easterSunday(year: number): DateTime {
  const a = year % 19
  const b = Math.floor(year / 100)
  const c = year % 100
  const d = Math.floor(b / 4)
  const e = b % 4
  const f = Math.floor((b + 8) / 25)
  const g = Math.floor((b - f + 1) / 3)
  const h = (19 * a + b - d - g + 15) % 30
  const i = Math.floor(c / 4)
  const k = c % 4
  const l = (32 + 2 * e + 2 * i - h - k) % 7
  const m = Math.floor((a + 11 * h + 22 * l) / 451)
  const month = Math.floor((h + l - 7 * m + 114) / 31)
  const day = ((h + l - 7 * m + 114) % 31) + 1

  return DateTime.utc(year, month, day)
}

// 土曜 → 前の金曜、日曜 → 翌月曜に振替
function observed(date: DateTime): DateTime {
  if (date.weekday === SATURDAY) return date.minus({ days: 1 })
  if (date.weekday === SUNDAY) return date.plus({ days: 1 })
  return date
}

/**
 * 水曜・金曜に重なりうる取引所休日
 * 月曜固定の祝日 (MLK, Presidents, Memorial, Labor) と感謝祭は満期計算に影響しないので含めない
 */
export function exchangeHolidays(year: number): Set<string> {
  const holidays: DateTime[] = [
    observed(DateTime.utc(year, 7, 4)),
    observed(DateTime.utc(year, 12, 25)),
    easterSunday(year).minus({ days: 2 }),
  ]

  // 元日が土曜の場合は振替なし
  const newYear = DateTime.utc(year, 1, 1)
  if (newYear.weekday !== SATURDAY) {
    holidays.push(observed(newYear))
  }

  if (year >= 2022) {
    holidays.push(observed(DateTime.utc(year, 6, 19)))
  }

  return new Set(holidays.map((date) => date.toISODate() ?? ''))
}

export function isExchangeHoliday(date: DateTime): boolean {
  return exchangeHolidays(date.year).has(date.toISODate() ?? '')
}

export function isBusinessDay(date: DateTime): boolean {
  return date.weekday < SATURDAY && !isExchangeHoliday(date)
}

/**
 * 直前の営業日 (当日は含まない)
 */
export function previousBusinessDay(date: DateTime): DateTime {
  let current = date.minus({ days: 1 })
  while (!isBusinessDay(current)) {
    current = current.minus({ days: 1 })
  }
  return current
}
