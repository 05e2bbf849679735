// services/FutureChainService.ts
import { DateTime } from 'luxon'
import type { FutureSymbol, MarketResolver } from './types'
import { ExpirationService } from './ExpirationService'
import { LOOK_AHEAD_CONTRACTS, VIX_FUTURES_TICKER } from './constants'
import { createFutureSymbol } from '../models/FutureSymbol'
import { formatDate } from '../utils/util'

export interface FutureChainOptions {
  marketResolver?: MarketResolver
  today?: DateTime
}

export class FutureChainService {
  private readonly marketResolver: MarketResolver
  private readonly today: DateTime

  constructor(private readonly expirationService: ExpirationService, options: FutureChainOptions = {}) {
    this.marketResolver = options.marketResolver ?? expirationService
    this.today = (options.today ?? DateTime.utc()).startOf('day')
  }

  /**
   * 開始日以降の先物チェーンを満期日順に取得
   * 今日以降の満期が lookAheadCount 件見つかるまで1日ずつ進める。
   * 開始日が過去の場合、今日より前に満期を迎えた契約も含まれる。
   */
  buildChain(
    startDate: DateTime,
    lookAheadCount: number = LOOK_AHEAD_CONTRACTS,
    ticker: string = VIX_FUTURES_TICKER
  ): FutureSymbol[] {
    const market = this.marketResolver.getMarket(ticker)
    const expiryFunc = this.expirationService.getExpiryFunc(ticker, market)

    const start = startDate.toUTC().startOf('day')
    const expiries = new Map<string, DateTime>()
    let expiriesAfterToday = 0
    let currentTime = start

    while (expiriesAfterToday < lookAheadCount) {
      const expiry = expiryFunc(currentTime).startOf('day')
      currentTime = currentTime.plus({ days: 1 })

      // 満期済みの契約はスキップ
      if (expiry < start) continue

      const key = formatDate(expiry)
      if (expiries.has(key)) continue

      expiries.set(key, expiry)
      console.log(`満期日を追加: ${key} (${ticker} コンタンゴ計算用)`)

      if (expiry >= this.today) {
        expiriesAfterToday++
      }
    }

    return Array.from(expiries.values())
      .sort((a, b) => a.toMillis() - b.toMillis())
      .map((expiry) => createFutureSymbol(ticker, market, expiry))
  }
}
