// services/ContangoService.ts
import type { BarsByDate, ContangoRecord, FutureSymbol, PreviousExpiryResolver } from './types'
import { MIN_BARS_PER_DATE } from './constants'
import { compareByExpiry } from '../models/FutureSymbol'
import { formatDate } from '../utils/util'

// 分母が 0 の場合は null (Infinity/NaN を出力しない)
function ratio(numerator: number, denominator: number): number | null {
  return denominator === 0 ? null : numerator / denominator
}

export class ContangoService {
  constructor(private readonly previousExpiryResolver: PreviousExpiryResolver) {}

  /**
   * 取引日ごとのコンタンゴを計算 (VIXCentral と同じ計算式)
   * 戻り値は日付順ではない。並び替えは書き込み側で行う
   */
  computeContango(barsByDate: BarsByDate, chain: FutureSymbol[]): ContangoRecord[] {
    if (chain.length === 0) {
      return []
    }

    // 期近の1つ前の満期より前の日付は、本当の期近契約のデータを含まない
    const cutoff = formatDate(this.previousExpiryResolver.getPreviousExpiry(chain))
    const records: ContangoRecord[] = []

    for (const [date, dateBars] of barsByDate) {
      if (dateBars.length < MIN_BARS_PER_DATE || date < cutoff) continue

      const bars = [...dateBars].sort((a, b) => compareByExpiry(a.symbol, b.symbol))
      const settle = bars.map((bar) => bar.close)
      const optional = (index: number): number | null => (index < settle.length ? settle[index] : null)

      const contangoF7MinusF4 = ratio(settle[6] - settle[3], settle[3])

      records.push({
        date,
        frontMonth: bars[0].symbol.expiry.month,
        f1: settle[0],
        f2: settle[1],
        f3: settle[2],
        f4: settle[3],
        f5: settle[4],
        f6: settle[5],
        f7: settle[6],
        f8: settle[7],
        f9: optional(8),
        f10: optional(9),
        f11: optional(10),
        f12: optional(11),
        contangoF2MinusF1: ratio(settle[1] - settle[0], settle[0]),
        contangoF7MinusF4,
        contangoF7MinusF4Div3: contangoF7MinusF4 === null ? null : contangoF7MinusF4 / 3,
      })
    }

    console.log(`コンタンゴ計算完了: ${records.length}件 (基準日: ${cutoff} 以降)`)
    return records
  }
}
