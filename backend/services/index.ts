// services/index.ts
import type { DateTime } from 'luxon'
import type { ProcessorConfig } from '../config/environment'
import type { MarketResolver, PreviousExpiryResolver, RateLimiter, SettlementFetchStrategy } from './types'
import { ExpirationService } from './ExpirationService'
import { FutureChainService } from './FutureChainService'
import { SettlementService } from './SettlementService'
import { CboeSettlementClient } from './CboeSettlementClient'
import { ContangoService } from './ContangoService'
import { ContangoDatasetService } from './ContangoDatasetService'

export { ExpirationService, vixFutureExpiry } from './ExpirationService'
export { FutureChainService } from './FutureChainService'
export { SettlementService } from './SettlementService'
export { CboeSettlementClient } from './CboeSettlementClient'
export { ContangoService } from './ContangoService'
export { ContangoDatasetService } from './ContangoDatasetService'

export * from './types'
export * from './errors'

// テストで差し替えるための注入ポイント
export interface ContangoServiceOverrides {
  settlementClient?: SettlementFetchStrategy
  marketResolver?: MarketResolver
  previousExpiryResolver?: PreviousExpiryResolver
  limiter?: RateLimiter
  today?: DateTime
}

// 便利なファクトリー関数
export function createContangoServices(config: ProcessorConfig, overrides: ContangoServiceOverrides = {}) {
  const expirations = ExpirationService.getInstance()
  return {
    expirations,
    chain: new FutureChainService(expirations, {
      marketResolver: overrides.marketResolver,
      today: overrides.today,
    }),
    settlements: new SettlementService(overrides.settlementClient ?? new CboeSettlementClient(), {
      baseUrl: config.futuresBaseUrl,
      limiter: overrides.limiter,
    }),
    contango: new ContangoService(overrides.previousExpiryResolver ?? expirations),
    dataset: new ContangoDatasetService(),
  }
}

export type ContangoServices = ReturnType<typeof createContangoServices>
