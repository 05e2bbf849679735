// services/constants.ts

export const VIX_FUTURES_TICKER = 'VX'

// CBOE が公開している契約数は最大でも12本程度
export const LOOK_AHEAD_CONTRACTS = 12

// 1日あたり最低限必要な契約数 (F1〜F8)
export const MIN_BARS_PER_DATE = 8

export const MAX_FETCH_ATTEMPTS = 5

// CBOE サーバーへの負荷軽減: 5秒に1リクエスト
export const RATE_LIMIT_INTERVAL_MS = 5000

// 開始日より前の期近契約も取得するための余裕
export const CHAIN_WARMUP_MONTHS = 2

export const CBOE_FUTURES_BASE_URL = 'https://www.cboe.com/us/futures/market_statistics/historical_data/products/csv'

export const USER_AGENT = 'Mozilla/5.0 (X11; Ubuntu; Linux x86_64; rv:91.0) Gecko/20100101 Firefox/91.0'
