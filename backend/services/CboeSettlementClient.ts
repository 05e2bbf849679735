// services/CboeSettlementClient.ts
import axios, { type AxiosInstance } from 'axios'
import type { SettlementFetchStrategy } from './types'
import { SettlementNotFoundError } from './errors'
import { USER_AGENT } from './constants'

export class CboeSettlementClient implements SettlementFetchStrategy {
  constructor(private readonly http: AxiosInstance = axios.create({ timeout: 30000 })) {}

  /**
   * CBOE の清算値CSVを取得
   * 404 はまだ上場していない契約 → SettlementNotFoundError
   */
  async download(url: string): Promise<string | null> {
    try {
      const response = await this.http.get<string>(url, {
        responseType: 'text',
        headers: { 'User-Agent': USER_AGENT },
      })
      return typeof response.data === 'string' ? response.data : null
    } catch (error) {
      if (axios.isAxiosError(error) && error.response?.status === 404) {
        throw new SettlementNotFoundError(url)
      }
      throw error
    }
  }
}
