// test/future-chain-unit-test.ts
import { describe, it, expect } from 'vitest'
import { DateTime } from 'luxon'
import { ExpirationService } from '../services/ExpirationService'
import { FutureChainService } from '../services/FutureChainService'
import { ConfigurationError } from '../services/errors'

const today = DateTime.utc(2024, 5, 10)

describe('FutureChainService', () => {
  const expirationService = new ExpirationService()

  it('loads exactly 12 contracts when starting from today', () => {
    const service = new FutureChainService(expirationService, { today })
    const chain = service.buildChain(today)

    expect(chain).toHaveLength(12)
    expect(chain.every((symbol) => symbol.expiry >= today)).toBe(true)
    expect(chain[0].id).toBe('VX 2024-05-22')
    expect(chain[1].id).toBe('VX 2024-06-18')
    expect(chain[11].id).toBe('VX 2025-04-16')
  })

  it('includes already expired contracts when starting from a past date', () => {
    const service = new FutureChainService(expirationService, { today })
    const chain = service.buildChain(DateTime.utc(2024, 2, 10))

    expect(chain).toHaveLength(15)
    expect(chain.every((symbol) => symbol.expiry >= today)).toBe(false)
    expect(chain.slice(0, 4).map((symbol) => symbol.id)).toEqual([
      'VX 2024-02-14',
      'VX 2024-03-20',
      'VX 2024-04-17',
      'VX 2024-05-22',
    ])
  })

  it('returns contracts sorted by expiry without duplicates', () => {
    const service = new FutureChainService(expirationService, { today })
    const chain = service.buildChain(DateTime.utc(2024, 1, 1))
    const ids = chain.map((symbol) => symbol.id)

    expect(new Set(ids).size).toBe(ids.length)
    expect([...ids].sort()).toEqual(ids)
  })

  it('skips the current month contract once it has expired', () => {
    const afterExpiry = DateTime.utc(2024, 5, 25)
    const service = new FutureChainService(expirationService, { today: afterExpiry })
    const chain = service.buildChain(afterExpiry, 3)

    expect(chain.map((symbol) => symbol.id)).toEqual(['VX 2024-06-18', 'VX 2024-07-17', 'VX 2024-08-21'])
  })

  it('attaches ticker and market to every contract', () => {
    const service = new FutureChainService(expirationService, { today })
    const chain = service.buildChain(today, 2)

    expect(chain.map((symbol) => [symbol.ticker, symbol.market])).toEqual([
      ['VX', 'cfe'],
      ['VX', 'cfe'],
    ])
  })

  it('fails with a configuration error when the market has no expiry function', () => {
    const service = new FutureChainService(expirationService, {
      today,
      marketResolver: { getMarket: () => 'cme' },
    })

    expect(() => service.buildChain(today)).toThrow(ConfigurationError)
  })
})
