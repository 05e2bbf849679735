// models/FutureSymbol.ts
import type { DateTime } from 'luxon'
import type { FutureSymbol } from '../services/types'
import { formatDate } from '../utils/util'

export function createFutureSymbol(ticker: string, market: string, expiry: DateTime): FutureSymbol {
  const expiryDate = expiry.toUTC().startOf('day')

  return Object.freeze({
    ticker,
    market,
    expiry: expiryDate,
    id: `${ticker} ${formatDate(expiryDate)}`,
  })
}

export function compareByExpiry(a: FutureSymbol, b: FutureSymbol): number {
  return a.expiry.toMillis() - b.expiry.toMillis()
}
