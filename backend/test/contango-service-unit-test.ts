// test/contango-service-unit-test.ts
import { describe, it, expect, vi } from 'vitest'
import { DateTime, Duration } from 'luxon'
import { ContangoService } from '../services/ContangoService'
import { ExpirationService } from '../services/ExpirationService'
import type { BarsByDate, FutureSymbol, PriceBar, PreviousExpiryResolver } from '../services/types'
import { createFutureSymbol } from '../models/FutureSymbol'

const symbols = Array.from({ length: 13 }, (_, i) =>
  createFutureSymbol('VX', 'cfe', DateTime.utc(2022, 1, 19).plus({ months: i }))
)

function bar(date: string, symbol: FutureSymbol, close: number): PriceBar {
  return { date, symbol, open: 0, high: 0, low: 0, close, period: Duration.fromObject({ days: 1 }) }
}

// settlement 10, 11, 12, ... in expiry order, inserted in reverse
function barsFor(date: string, count: number, closes?: number[]): PriceBar[] {
  return symbols
    .slice(0, count)
    .map((symbol, i) => bar(date, symbol, closes ? closes[i] : 10 + i))
    .reverse()
}

const anyDate: PreviousExpiryResolver = { getPreviousExpiry: () => DateTime.utc(2000, 1, 1) }

describe('ContangoService', () => {
  it('computes positional settlements and ratios', () => {
    const dates = ['2021-04-26', '2021-04-27', '2021-04-28', '2021-04-29']
    const barsByDate: BarsByDate = new Map(dates.map((date): [string, PriceBar[]] => [date, barsFor(date, 9)]))

    const records = new ContangoService(anyDate).computeContango(barsByDate, symbols.slice(0, 9))

    expect(records).toHaveLength(4)
    expect(records.map((record) => record.date).sort()).toEqual(dates)
    for (const record of records) {
      expect(record.frontMonth).toBe(1)
      expect([record.f1, record.f2, record.f3, record.f4, record.f5, record.f6, record.f7, record.f8]).toEqual([
        10, 11, 12, 13, 14, 15, 16, 17,
      ])
      expect(record.f9).toBe(18)
      expect(record.f10).toBeNull()
      expect(record.f11).toBeNull()
      expect(record.f12).toBeNull()
      expect(record.contangoF2MinusF1).toBe(0.1)
      expect(record.contangoF7MinusF4).toBe(3 / 13)
      expect(record.contangoF7MinusF4).toBeCloseTo(0.2308, 4)
      expect(record.contangoF7MinusF4Div3).toBe(3 / 13 / 3)
    }
  })

  it('fills F9 to F12 only up to the available contracts', () => {
    const barsByDate: BarsByDate = new Map([['2021-05-03', barsFor('2021-05-03', 13)]])
    const [record] = new ContangoService(anyDate).computeContango(barsByDate, symbols)

    expect([record.f9, record.f10, record.f11, record.f12]).toEqual([18, 19, 20, 21])
  })

  it('skips dates with fewer than 8 contracts', () => {
    const barsByDate: BarsByDate = new Map([
      ['2021-04-26', barsFor('2021-04-26', 7)],
      ['2021-04-27', barsFor('2021-04-27', 8)],
    ])
    const records = new ContangoService(anyDate).computeContango(barsByDate, symbols)

    expect(records.map((record) => record.date)).toEqual(['2021-04-27'])
    expect(records[0].f9).toBeNull()
  })

  it('skips dates before the previous expiry of the front month', () => {
    const resolver: PreviousExpiryResolver = { getPreviousExpiry: () => DateTime.utc(2021, 4, 28) }
    const dates = ['2021-04-26', '2021-04-27', '2021-04-28', '2021-04-29']
    const barsByDate: BarsByDate = new Map(dates.map((date): [string, PriceBar[]] => [date, barsFor(date, 9)]))

    const records = new ContangoService(resolver).computeContango(barsByDate, symbols)

    expect(records.map((record) => record.date).sort()).toEqual(['2021-04-28', '2021-04-29'])
  })

  it('derives the cutoff from the expiry calendar', () => {
    // front month 2022-01-19 → previous contract expired 2021-12-22
    const barsByDate: BarsByDate = new Map([
      ['2021-12-21', barsFor('2021-12-21', 8)],
      ['2021-12-22', barsFor('2021-12-22', 8)],
    ])
    const records = new ContangoService(new ExpirationService()).computeContango(barsByDate, symbols)

    expect(records.map((record) => record.date)).toEqual(['2021-12-22'])
  })

  it('returns nothing for an empty chain', () => {
    const resolver = { getPreviousExpiry: vi.fn(() => DateTime.utc(2000, 1, 1)) }
    const barsByDate: BarsByDate = new Map([['2021-04-26', barsFor('2021-04-26', 9)]])

    expect(new ContangoService(resolver).computeContango(barsByDate, [])).toEqual([])
    expect(resolver.getPreviousExpiry).not.toHaveBeenCalled()
  })

  it('uses null for ratios with a zero denominator', () => {
    const closes = [0, 11, 12, 0, 14, 15, 16, 17]
    const barsByDate: BarsByDate = new Map([['2021-04-26', barsFor('2021-04-26', 8, closes)]])
    const [record] = new ContangoService(anyDate).computeContango(barsByDate, symbols)

    expect(record.f1).toBe(0)
    expect(record.contangoF2MinusF1).toBeNull()
    expect(record.contangoF7MinusF4).toBeNull()
    expect(record.contangoF7MinusF4Div3).toBeNull()
  })
})
