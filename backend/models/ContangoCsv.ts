// models/ContangoCsv.ts
import type { ContangoRecord } from '../services/types'
import { DatasetFormatError } from '../services/errors'
import { formatDate, parseStrictDate, roundHalfAwayFromZero, startsWithDigit } from '../utils/util'

// 後方互換のためヘッダーは固定
export const CONTANGO_CSV_HEADER =
  'Date,First Month,F1,F2,F3,F4,F5,F6,F7,F8,F9,F10,F11,F12,Contango 2/1,Contango 7/4,Con 7/4 div 3'

// 綴り間違いの旧ファイル名も互換性のため出力し続ける
export const LEGACY_DATASET_FILE_NAME = 'vix_contago.csv'
export const DATASET_FILE_NAME = 'vix_contango.csv'

const RATIO_DIGITS = 4

function formatPrice(value: number | null): string {
  return value === null ? '' : String(value)
}

function formatRatio(value: number | null): string {
  return value === null ? '' : String(roundHalfAwayFromZero(value, RATIO_DIGITS))
}

/**
 * コンタンゴ1行分をCSVに整形
 */
export function formatContangoLine(record: ContangoRecord): string {
  return [
    record.date,
    String(record.frontMonth),
    formatPrice(record.f1),
    formatPrice(record.f2),
    formatPrice(record.f3),
    formatPrice(record.f4),
    formatPrice(record.f5),
    formatPrice(record.f6),
    formatPrice(record.f7),
    formatPrice(record.f8),
    formatPrice(record.f9),
    formatPrice(record.f10),
    formatPrice(record.f11),
    formatPrice(record.f12),
    formatRatio(record.contangoF2MinusF1),
    formatRatio(record.contangoF7MinusF4),
    formatRatio(record.contangoF7MinusF4Div3),
  ].join(',')
}

/**
 * 既存CSVを読み込み、取引日 → 行 のマップを返す
 * 行の内容は再計算せずそのまま保持する
 */
export function parseContangoDataset(content: string, source: string = 'dataset'): Map<string, string> {
  const rows = new Map<string, string>()

  for (const line of content.split(/\r?\n/)) {
    // ヘッダーと空行をスキップ
    if (line.trim() === '' || !startsWithDigit(line)) continue

    const dateField = line.split(',')[0]
    const date = parseStrictDate(dateField)
    if (!date) {
      throw new DatasetFormatError(`日付の形式が不正です: ${dateField}`, { source, line })
    }

    const key = formatDate(date)
    if (rows.has(key)) {
      throw new DatasetFormatError(`日付が重複しています: ${key}`, { source, line })
    }
    rows.set(key, line)
  }

  return rows
}

/**
 * 日付順に並べてヘッダーを付けたCSV全文
 */
export function serializeContangoDataset(rows: Map<string, string>): string {
  const sorted = Array.from(rows.entries())
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([, line]) => line)

  return [CONTANGO_CSV_HEADER, ...sorted].join('\n')
}
