// config/environment.ts
import { DateTime } from 'luxon'
import { ConfigurationError } from '../services/errors'
import { CBOE_FUTURES_BASE_URL } from '../services/constants'

const ENV_DATE_FORMAT = 'yyyyMMdd'

export interface ProcessorConfig {
  tempOutputDirectory: string
  processedDataDirectory: string
  outputVendorDirectory: string
  overwriteExistingEntries: boolean
  processOnlyDeploymentDate: boolean
  deploymentDate: DateTime
  startDate: DateTime
  futuresBaseUrl: string
}

function readString(env: NodeJS.ProcessEnv, key: string, defaultValue: string): string {
  const value = env[key]?.trim()
  return value ? value : defaultValue
}

function readBoolean(env: NodeJS.ProcessEnv, key: string): boolean {
  const value = env[key]?.trim().toLowerCase()
  if (!value) return false
  if (value === 'true' || value === '1') return true
  if (value === 'false' || value === '0') return false
  throw new ConfigurationError(`環境変数 ${key} の値が不正です: ${value}`, { key, value })
}

function readDate(env: NodeJS.ProcessEnv, key: string): DateTime | null {
  const value = env[key]?.trim()
  if (!value) return null

  const date = DateTime.fromFormat(value, ENV_DATE_FORMAT, { zone: 'utc' })
  if (!date.isValid) {
    throw new ConfigurationError(`環境変数 ${key} は ${ENV_DATE_FORMAT} 形式で指定してください: ${value}`, {
      key,
      value,
    })
  }
  return date
}

/**
 * 環境変数から設定を読み込む (dotenv.config() の後に呼ぶこと)
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, now: DateTime = DateTime.utc()): ProcessorConfig {
  const deploymentDate = readDate(env, 'DEPLOYMENT_DATE') ?? now.toUTC().startOf('day')
  const startDate = readDate(env, 'START_DATE') ?? deploymentDate.minus({ days: 1 })

  return {
    tempOutputDirectory: readString(env, 'TEMP_OUTPUT_DIRECTORY', '/temp-output-directory'),
    processedDataDirectory: readString(env, 'PROCESSED_DATA_DIRECTORY', './data'),
    outputVendorDirectory: readString(env, 'OUTPUT_VENDOR_DIRECTORY', 'vixcentral'),
    overwriteExistingEntries: readBoolean(env, 'OVERWRITE_EXISTING_ENTRIES'),
    processOnlyDeploymentDate: readBoolean(env, 'PROCESS_ONLY_DEPLOYMENT_DATE'),
    deploymentDate,
    startDate,
    futuresBaseUrl: readString(env, 'CBOE_FUTURES_BASE_URL', CBOE_FUTURES_BASE_URL),
  }
}
