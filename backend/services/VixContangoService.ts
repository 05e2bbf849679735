// services/VixContangoService.ts
import type { ProcessorConfig } from '../config/environment'
import type { RunSummary } from './types'
import { createContangoServices, type ContangoServices } from '.'
import { CHAIN_WARMUP_MONTHS } from './constants'
import { formatDate } from '../utils/util'

export class VixContangoService {
  constructor(
    private readonly config: ProcessorConfig,
    private readonly services: ContangoServices = createContangoServices(config)
  ) {}

  /**
   * 先物チェーン取得 → 清算値ダウンロード → コンタンゴ計算 → CSVマージ
   * どこかで失敗した場合はファイルを書き込まずに例外を投げる
   */
  async process(): Promise<RunSummary> {
    const startTime = Date.now()
    console.log(
      `VIXコンタンゴ処理開始 (デプロイ日: ${formatDate(this.config.deploymentDate)}, 開始日: ${formatDate(this.config.startDate)})`
    )

    try {
      // 1. 先物チェーン
      // 開始日時点の期近より前の契約も含めないと F1 がずれるため、2ヶ月前から探す
      const chainStart = this.config.startDate.minus({ months: CHAIN_WARMUP_MONTHS })
      const chain = this.services.chain.buildChain(chainStart)
      console.log(`先物チェーン: ${chain.length}件 (${chain[0]?.id ?? '-'} 〜 ${chain[chain.length - 1]?.id ?? '-'})`)

      // 2. 清算値ダウンロード
      const barsByDate = await this.services.settlements.fetchSettlements(chain)
      console.log(`取引日数: ${barsByDate.size}日`)

      // 3. コンタンゴ計算
      const records = this.services.contango.computeContango(barsByDate, chain)

      // 4. マージして書き込み
      const merge = await this.services.dataset.merge(records, {
        outputRoot: this.config.tempOutputDirectory,
        existingRoot: this.config.processedDataDirectory,
        datasetName: this.config.outputVendorDirectory,
        overwriteExisting: this.config.overwriteExistingEntries,
        onlyDeploymentDate: this.config.processOnlyDeploymentDate,
        deploymentDate: this.config.deploymentDate,
      })

      const duration = Date.now() - startTime
      const summary: RunSummary = {
        duration: `${(duration / 1000).toFixed(1)}秒`,
        contracts: chain.length,
        tradingDates: barsByDate.size,
        records: records.length,
        merge,
      }

      console.log('処理完了:', {
        duration: summary.duration,
        contracts: summary.contracts,
        records: summary.records,
        added: merge.added,
        overwritten: merge.overwritten,
      })

      return summary
    } catch (error) {
      console.error('VIXコンタンゴ処理でエラー発生:', error)
      throw error
    }
  }
}
