// main.ts
import dotenv from 'dotenv'
import { loadConfig } from './config/environment'
import { VixContangoService } from './services/VixContangoService'

dotenv.config()

export async function main(): Promise<void> {
  const config = loadConfig()
  const service = new VixContangoService(config)
  const summary = await service.process()
  console.log(`🚀 ${summary.merge.totalRows}行を書き込みました (${summary.duration})`)
}

if (require.main === module) {
  main()
    .then(() => {
      process.exit(0)
    })
    .catch((error) => {
      console.error('💥 処理失敗:', error instanceof Error ? error.message : error)
      process.exit(1)
    })
}
