// services/ContangoDatasetService.ts
import fs from 'fs'
import path from 'path'
import type { ContangoRecord, MergeOptions, MergeSummary } from './types'
import {
  DATASET_FILE_NAME,
  LEGACY_DATASET_FILE_NAME,
  formatContangoLine,
  parseContangoDataset,
  serializeContangoDataset,
} from '../models/ContangoCsv'
import { formatDate } from '../utils/util'

export class ContangoDatasetService {
  getOutputPaths(outputRoot: string, datasetName: string): string[] {
    const outputDirectory = path.join(outputRoot, 'alternative', datasetName)
    return [path.join(outputDirectory, LEGACY_DATASET_FILE_NAME), path.join(outputDirectory, DATASET_FILE_NAME)]
  }

  /**
   * 既存データのパス (正しい綴り → 旧ファイル名の順に探す)
   */
  findExistingDataset(existingRoot: string, datasetName: string): string | null {
    const directory = path.join(existingRoot, 'alternative', datasetName)
    const candidates = [path.join(directory, DATASET_FILE_NAME), path.join(directory, LEGACY_DATASET_FILE_NAME)]
    return candidates.find((candidate) => fs.existsSync(candidate)) ?? null
  }

  async readExistingData(filePath: string): Promise<Map<string, string>> {
    const content = await fs.promises.readFile(filePath, 'utf-8')
    return parseContangoDataset(content, filePath)
  }

  /**
   * 新しく計算したコンタンゴを既存データにマージし、2つのファイルに同じ内容を書き込む
   */
  async merge(records: ContangoRecord[], options: MergeOptions): Promise<MergeSummary> {
    const outputPaths = this.getOutputPaths(options.outputRoot, options.datasetName)
    const existingSource = this.findExistingDataset(options.existingRoot, options.datasetName)

    let rows = new Map<string, string>()
    if (existingSource) {
      console.log(`既存データを読み込み: ${existingSource}`)
      rows = await this.readExistingData(existingSource)
    } else {
      console.log(`新規作成: ${outputPaths.join(', ')}`)
    }

    const deploymentDate = formatDate(options.deploymentDate)
    let added = 0
    let overwritten = 0
    let skipped = 0

    for (const record of records) {
      const exists = rows.has(record.date)

      // 既存データは上書き設定でない限り触らない
      if (exists && !options.overwriteExisting) {
        skipped++
        continue
      }
      // デプロイ日のデータのみ更新する設定
      if (options.onlyDeploymentDate && record.date !== deploymentDate) {
        skipped++
        continue
      }

      rows.set(record.date, formatContangoLine(record))
      if (exists) {
        overwritten++
      } else {
        added++
      }
    }

    const content = serializeContangoDataset(rows)

    await fs.promises.mkdir(path.dirname(outputPaths[0]), { recursive: true })
    for (const outputPath of outputPaths) {
      await fs.promises.writeFile(outputPath, content, 'utf-8')
    }

    console.log(
      `書き込み完了: ${outputPaths.join(', ')} (追加 ${added}件, 上書き ${overwritten}件, スキップ ${skipped}件, 合計 ${rows.size}行)`
    )

    return {
      added,
      overwritten,
      skipped,
      totalRows: rows.size,
      existingSource,
      outputPaths,
    }
  }
}
