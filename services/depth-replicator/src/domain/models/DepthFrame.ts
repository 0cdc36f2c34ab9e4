import type Decimal from 'decimal.js';

/**
 * 板の片側。
 */
export type BookSide = 'bid' | 'ask';

/**
 * 価格レベル（価格と、その価格に並ぶ数量の合計）。
 */
export interface PriceLevel {
  price: Decimal;
  qty: Decimal;
}

/**
 * REST スナップショットから得た板の初期状態。並び順は保証しない。
 */
export interface DepthSnapshot {
  /** スナップショット時点の更新 ID（参照用、整合チェックには使わない） */
  lastUpdateId: number | null;
  bids: PriceLevel[];
  asks: PriceLevel[];
}

/**
 * 差分更新イベント（depthUpdate）。
 * a / b の各要素はその価格の新しい絶対数量で、0 はレベル削除を意味する。
 */
export interface DepthUpdateEvent {
  /** イベント時刻（エポックミリ秒） */
  eventTime: number;
  symbol: string;
  /** 最初の更新 ID（U）。存在しない場合は null */
  firstUpdateId: number | null;
  /** 最後の更新 ID（u）。存在しない場合は null */
  finalUpdateId: number | null;
  asks: PriceLevel[];
  bids: PriceLevel[];
}

/**
 * セッションが受信したフレーム。depthUpdate 以外のフレームもコールバックに渡す。
 */
export type ReceivedFrame =
  | {
      kind: 'depthUpdate';
      event: DepthUpdateEvent;
      /** エンベロープを外した後のパース済みペイロード */
      payload: Record<string, unknown>;
    }
  | {
      kind: 'other';
      payload: Record<string, unknown>;
    };
