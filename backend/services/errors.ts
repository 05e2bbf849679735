// services/errors.ts

export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message)
    this.name = 'AppError'
  }
}

/**
 * 市場・満期関数が未登録、環境変数が不正など (ネットワークアクセス前に停止)
 */
export class ConfigurationError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', context)
    this.name = 'ConfigurationError'
  }
}

/**
 * 404: まだデータが公開されていない契約。エラーではなく取得終了の合図
 */
export class SettlementNotFoundError extends AppError {
  constructor(url: string) {
    super(`データが存在しません: ${url}`, 'SETTLEMENT_NOT_FOUND', { url })
    this.name = 'SettlementNotFoundError'
  }
}

export class MaxRetriesExceededError extends AppError {
  constructor(attempts: number, context?: Record<string, unknown>) {
    super(`Max retries exceeded (${attempts}/${attempts})`, 'MAX_RETRIES_EXCEEDED', context)
    this.name = 'MaxRetriesExceededError'
  }
}

export class EmptySettlementResponseError extends AppError {
  constructor(contract: string) {
    super(`レスポンスが空です: ${contract}`, 'EMPTY_SETTLEMENT_RESPONSE', { contract })
    this.name = 'EmptySettlementResponseError'
  }
}

export class SettlementFormatError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'SETTLEMENT_FORMAT_ERROR', context)
    this.name = 'SettlementFormatError'
  }
}

export class DatasetFormatError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'DATASET_FORMAT_ERROR', context)
    this.name = 'DatasetFormatError'
  }
}
