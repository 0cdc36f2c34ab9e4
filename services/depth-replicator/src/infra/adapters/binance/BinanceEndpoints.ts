import type { StreamEndpoints } from '@/application/interfaces/StreamEndpoints';
import type { MarketKind, StreamTarget } from '@/domain/models/MarketKind';

/**
 * 市場種別ごとのベース URL
 */
export interface BinanceEndpointUrls {
  spotRest: string;
  derivativeRest: string;
  spotStream: string;
  derivativeStream: string;
}

export const DEFAULT_BINANCE_URLS: BinanceEndpointUrls = {
  spotRest: 'https://api.binance.com/api/v3/depth',
  derivativeRest: 'https://dapi.binance.com/dapi/v1/depth',
  spotStream: 'wss://stream.binance.com:9443/ws',
  derivativeStream: 'wss://dstream.binance.com/stream',
};

/**
 * インフラ層: Binance のエンドポイント解決
 *
 * - 現物: `<spotStream>/<symbol>@depth`（ペイロードはそのまま）
 * - デリバティブ: `<derivativeStream>?streams=<symbol>@depth`（ペイロードは data の下）
 */
export class BinanceEndpoints implements StreamEndpoints {
  constructor(private readonly urls: BinanceEndpointUrls = DEFAULT_BINANCE_URLS) {}

  streamUrl(target: StreamTarget): string {
    const stream = `${target.symbol.toLowerCase()}@depth`;
    if (target.marketKind === 'derivative') {
      return `${this.urls.derivativeStream}?streams=${stream}`;
    }
    return `${this.urls.spotStream}/${stream}`;
  }

  /**
   * 板スナップショットの REST URL（クエリ付き）
   */
  depthUrl(symbol: string, marketKind: MarketKind, limit: number): string {
    const base = marketKind === 'derivative' ? this.urls.derivativeRest : this.urls.spotRest;
    const query = new URLSearchParams({ symbol, limit: String(limit) });
    return `${base}?${query.toString()}`;
  }
}
