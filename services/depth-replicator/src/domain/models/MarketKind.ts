/**
 * 市場種別。現物（spot）とデリバティブ（無期限先物）でエンドポイントとフレームの包み方が異なる。
 */
export type MarketKind = 'spot' | 'derivative';

/**
 * 購読対象（シンボルと市場種別の組）。
 */
export interface StreamTarget {
  /** 取引ペア（例: 'BTCUSDT', 'BTCUSD_PERP'） */
  symbol: string;
  marketKind: MarketKind;
}

/**
 * シンボル名から市場種別を推定する。
 * 取引所の命名規則上、'_' を含むシンボル（BTCUSD_PERP など）はデリバティブ。
 */
export function inferMarketKind(symbol: string): MarketKind {
  return symbol.includes('_') ? 'derivative' : 'spot';
}

/**
 * セッション ID を導出する。重複購読の排除に使う。
 * @returns 例: 'depth_btcusdt', 'depth_perp_btcusd_perp'
 */
export function sessionIdOf(target: StreamTarget): string {
  const lower = target.symbol.toLowerCase();
  return target.marketKind === 'derivative' ? `depth_perp_${lower}` : `depth_${lower}`;
}
