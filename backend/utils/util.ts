// utils/util.ts
import { DateTime } from 'luxon'

export const DATE_FORMAT = 'yyyy-MM-dd'

/**
 * "yyyy-MM-dd" 形式を厳密にパース (UTC の日付のみ)
 * 不正な形式は null を返す
 */
export function parseStrictDate(value: string, format: string = DATE_FORMAT): DateTime | null {
  const date = DateTime.fromFormat(value, format, { zone: 'utc' })
  return date.isValid ? date.startOf('day') : null
}

export function formatDate(date: DateTime): string {
  return date.toFormat(DATE_FORMAT)
}

/**
 * 数値文字列をパース。空文字や数値でないものは null
 */
export function parseDecimal(value: string): number | null {
  const trimmed = value.trim()
  if (trimmed === '') return null

  const parsed = Number(trimmed)
  return Number.isFinite(parsed) ? parsed : null
}

/**
 * 四捨五入 (0 から遠い方へ丸める)
 * 例: roundHalfAwayFromZero(-0.00005, 4) → -0.0001
 */
export function roundHalfAwayFromZero(value: number, digits: number): number {
  const factor = 10 ** digits
  // 2進数の誤差 (0.12345 * 10000 = 1234.4999...) を吸収してから丸める
  const scaled = Number((Math.abs(value) * factor).toPrecision(15))
  return (Math.sign(value) * Math.round(scaled)) / factor
}

export function startsWithDigit(line: string): boolean {
  return /^[0-9]/.test(line)
}
