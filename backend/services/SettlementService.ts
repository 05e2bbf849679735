// services/SettlementService.ts
import { Duration } from 'luxon'
import type { BarsByDate, FutureSymbol, PriceBar, RateLimiter, SettlementFetchStrategy } from './types'
import {
  EmptySettlementResponseError,
  MaxRetriesExceededError,
  SettlementFormatError,
  SettlementNotFoundError,
} from './errors'
import { CBOE_FUTURES_BASE_URL, MAX_FETCH_ATTEMPTS, RATE_LIMIT_INTERVAL_MS } from './constants'
import { createRateLimiter } from '../utils/rateLimiter'
import { formatDate, parseDecimal, parseStrictDate, startsWithDigit } from '../utils/util'

// Trade Date,Futures,Open,High,Low,Close,Settle,Change,Total Volume,EFP,Open Interest
const MIN_COLUMNS = 7
const ONE_DAY = Duration.fromObject({ days: 1 })

export interface SettlementServiceOptions {
  baseUrl?: string
  limiter?: RateLimiter
  maxAttempts?: number
}

export class SettlementService {
  private readonly baseUrl: string
  private readonly limiter: RateLimiter
  private readonly maxAttempts: number

  constructor(private readonly client: SettlementFetchStrategy, options: SettlementServiceOptions = {}) {
    this.baseUrl = (options.baseUrl ?? CBOE_FUTURES_BASE_URL).replace(/\/+$/, '')
    this.limiter = options.limiter ?? createRateLimiter({ minTime: RATE_LIMIT_INTERVAL_MS, maxConcurrent: 1 })
    this.maxAttempts = options.maxAttempts ?? MAX_FETCH_ATTEMPTS
  }

  buildUrl(symbol: FutureSymbol): string {
    return `${this.baseUrl}/${symbol.ticker.toUpperCase()}/${formatDate(symbol.expiry)}/`
  }

  /**
   * 先物チェーンの清算値を順番に取得し、取引日ごとにまとめる
   * 404 が返った時点で以降の契約は未上場とみなし、それまでの結果を返す
   */
  async fetchSettlements(symbols: FutureSymbol[]): Promise<BarsByDate> {
    const barsByDate: BarsByDate = new Map()

    for (const symbol of symbols) {
      const url = this.buildUrl(symbol)

      let result: string | null = null
      for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
        try {
          result = await this.limiter.schedule(() => this.client.download(url))
          console.log(`清算値取得完了: ${symbol.id} (試行 ${attempt}/${this.maxAttempts})`)
          break
        } catch (error) {
          if (error instanceof SettlementNotFoundError) {
            console.log(`${symbol.id} のデータはまだ存在しません。取得可能なデータはすべて取得済みのため処理を開始します`)
            return barsByDate
          }

          const message = error instanceof Error ? error.message : String(error)
          console.warn(`清算値取得エラー ${symbol.id} (試行 ${attempt}/${this.maxAttempts}): ${message}`)

          if (attempt === this.maxAttempts) {
            throw new MaxRetriesExceededError(this.maxAttempts, { contract: symbol.id, url, lastError: message })
          }
        }
      }

      if (!result) {
        throw new EmptySettlementResponseError(symbol.id)
      }

      const added = this.parseSettlementCsv(result, symbol, barsByDate)
      console.log(`${symbol.id}: ${added}件`)
    }

    return barsByDate
  }

  /**
   * CSVをパースして barsByDate に追加。追加した件数を返す
   */
  parseSettlementCsv(content: string, symbol: FutureSymbol, barsByDate: BarsByDate): number {
    let added = 0

    for (const line of content.replace(/\r/g, '').split('\n')) {
      // ヘッダーと末尾の空行
      if (line.trim() === '' || !startsWithDigit(line)) continue

      const csv = line.split(',')
      if (csv.length < MIN_COLUMNS) continue

      const date = parseStrictDate(csv[0])
      if (!date) {
        throw new SettlementFormatError(`取引日の形式が不正です: ${csv[0]}`, { contract: symbol.id, line })
      }

      // 最終清算日のデータは含めない
      if (date >= symbol.expiry) continue

      // csv[1] は Futures 列、csv[5] の Close は 0 の場合があるので Settle を終値として使う
      const bar: PriceBar = {
        date: formatDate(date),
        symbol,
        open: this.parsePrice(csv[2], 'Open', symbol, line),
        high: this.parsePrice(csv[3], 'High', symbol, line),
        low: this.parsePrice(csv[4], 'Low', symbol, line),
        close: this.parsePrice(csv[6], 'Settle', symbol, line),
        period: ONE_DAY,
      }

      const bars = barsByDate.get(bar.date)
      if (bars) {
        bars.push(bar)
      } else {
        barsByDate.set(bar.date, [bar])
      }
      added++
    }

    return added
  }

  private parsePrice(value: string, column: string, symbol: FutureSymbol, line: string): number {
    const price = parseDecimal(value)
    if (price === null) {
      throw new SettlementFormatError(`${column} の値が不正です: ${value}`, { contract: symbol.id, line })
    }
    return price
  }
}
