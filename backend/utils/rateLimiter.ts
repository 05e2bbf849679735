// utils/rateLimiter.ts
import Bottleneck from 'bottleneck'

export type RateLimitConfig = {
  minTime: number // リクエスト間隔 (ms)
  maxConcurrent: number
}

/**
 * 逐次実行のレートリミッターを生成
 * 1インスタンスを1回の処理全体で共有する (リトライも含めて全リクエストがここを通る)
 */
export function createRateLimiter(config: RateLimitConfig): Bottleneck {
  const limiter = new Bottleneck({
    minTime: config.minTime,
    maxConcurrent: config.maxConcurrent,
  })

  limiter.on('error', (error) => {
    console.error('[RateLimiter] エラー:', error)
  })

  return limiter
}
