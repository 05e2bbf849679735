// services/ExpirationService.ts
import type { DateTime } from 'luxon'
import type { ExpiryFunc, FutureSymbol, MarketResolver, PreviousExpiryResolver } from './types'
import { ConfigurationError } from './errors'
import { VIX_FUTURES_TICKER } from './constants'
import { isExchangeHoliday, previousBusinessDay, thirdFriday } from '../utils/calendar'

/**
 * VIX先物の最終清算日
 * 翌月第3金曜日の30日前の水曜日。金曜日が休日の場合はその前営業日から30日前。
 * 算出日が休日の場合は前営業日に繰り上げ。
 */
export const vixFutureExpiry: ExpiryFunc = (date: DateTime): DateTime => {
  const contractMonth = date.toUTC().startOf('month')

  let settlementFriday = thirdFriday(contractMonth.plus({ months: 1 }))
  if (isExchangeHoliday(settlementFriday)) {
    settlementFriday = previousBusinessDay(settlementFriday)
  }

  const expiry = settlementFriday.minus({ days: 30 })
  return isExchangeHoliday(expiry) ? previousBusinessDay(expiry) : expiry
}

const DEFAULT_MARKETS: Record<string, string> = {
  [VIX_FUTURES_TICKER]: 'cfe',
}

const DEFAULT_EXPIRY_FUNCTIONS: Record<string, ExpiryFunc> = {
  [`${VIX_FUTURES_TICKER}:cfe`]: vixFutureExpiry,
}

export class ExpirationService implements MarketResolver, PreviousExpiryResolver {
  private static instance: ExpirationService

  constructor(
    private readonly markets: Record<string, string> = DEFAULT_MARKETS,
    private readonly expiryFunctions: Record<string, ExpiryFunc> = DEFAULT_EXPIRY_FUNCTIONS
  ) {}

  static getInstance(): ExpirationService {
    if (!this.instance) {
      this.instance = new ExpirationService()
    }
    return this.instance
  }

  getMarket(ticker: string): string {
    const market = this.markets[ticker]
    if (!market) {
      throw new ConfigurationError(`市場が見つかりません: ${ticker}`, { ticker })
    }
    return market
  }

  getExpiryFunc(ticker: string, market: string): ExpiryFunc {
    const expiryFunc = this.expiryFunctions[`${ticker}:${market}`]
    if (!expiryFunc) {
      throw new ConfigurationError(`${ticker} expiry function not found with market: ${market}`, { ticker, market })
    }
    return expiryFunc
  }

  /**
   * 期近契約の1つ前の満期日
   * この日より前のデータは本当の期近を含まないため使えない
   */
  getPreviousExpiry(chain: FutureSymbol[]): DateTime {
    const frontMonth = chain[0]
    if (!frontMonth) {
      throw new Error('先物チェーンが空です')
    }
    const expiryFunc = this.getExpiryFunc(frontMonth.ticker, frontMonth.market)
    return expiryFunc(frontMonth.expiry.minus({ months: 1 }))
  }
}
