import type { ReceivedFrame } from '@/domain/models/DepthFrame';
import type { MarketKind } from '@/domain/models/MarketKind';

/**
 * 取引所固有のフレーム形式のデコーダー（インフラ層で実装される）。
 */
export interface FrameDecoder {
  /**
   * テキストフレームをパースし、市場種別に応じたエンベロープを外す。
   * @throws {MalformedFrameError} 期待した構造としてパースできない場合
   */
  decode(raw: string, marketKind: MarketKind): ReceivedFrame;
}
