// services/types.ts
import type { DateTime, Duration } from 'luxon'

export interface FutureSymbol {
  readonly ticker: string // "VX"
  readonly market: string // "cfe"
  readonly expiry: DateTime // 日付のみ (UTC 00:00)
  readonly id: string // "VX 2022-01-19"
}

export interface PriceBar {
  readonly date: string // "2021-04-26"
  readonly symbol: FutureSymbol
  readonly open: number
  readonly high: number
  readonly low: number
  readonly close: number // 清算値 (Settle)
  readonly period: Duration
}

// 取引日 → その日にデータがあった契約のバー (取得順)
export type BarsByDate = Map<string, PriceBar[]>

export interface ContangoRecord {
  date: string
  frontMonth: number
  f1: number
  f2: number
  f3: number
  f4: number
  f5: number
  f6: number
  f7: number
  f8: number
  f9: number | null
  f10: number | null
  f11: number | null
  f12: number | null
  // 分母が 0 の場合は null
  contangoF2MinusF1: number | null
  contangoF7MinusF4: number | null
  contangoF7MinusF4Div3: number | null
}

export type ExpiryFunc = (date: DateTime) => DateTime

export interface MarketResolver {
  getMarket(ticker: string): string
}

export interface PreviousExpiryResolver {
  getPreviousExpiry(chain: FutureSymbol[]): DateTime
}

/**
 * 清算値CSVの取得方法
 * 404 の場合は SettlementNotFoundError を投げること
 */
export interface SettlementFetchStrategy {
  download(url: string): Promise<string | null>
}

export interface RateLimiter {
  schedule<T>(fn: () => Promise<T>): Promise<T>
}

export interface MergeOptions {
  outputRoot: string
  existingRoot: string
  datasetName: string
  overwriteExisting: boolean
  onlyDeploymentDate: boolean
  deploymentDate: DateTime
}

export interface MergeSummary {
  added: number
  overwritten: number
  skipped: number
  totalRows: number
  existingSource: string | null
  outputPaths: string[]
}

export interface RunSummary {
  duration: string
  contracts: number
  tradingDates: number
  records: number
  merge: MergeSummary
}
