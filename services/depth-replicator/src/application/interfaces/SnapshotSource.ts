import type { DepthSnapshot } from '@/domain/models/DepthFrame';
import type { MarketKind } from '@/domain/models/MarketKind';

/**
 * 板スナップショットの取得元（インフラ層で実装される）。
 */
export interface SnapshotSource {
  /**
   * 指定シンボルの板スナップショットを1回だけ取得する。
   * @param symbol 取引ペア
   * @param marketKind 市場種別（エンドポイントの選択に使う）
   * @param depthLimit 取得する板の深さ
   * @throws {SnapshotFetchError} 非 2xx・不正なボディ・通信エラーの場合
   */
  fetch(symbol: string, marketKind: MarketKind, depthLimit: number): Promise<DepthSnapshot>;
}
