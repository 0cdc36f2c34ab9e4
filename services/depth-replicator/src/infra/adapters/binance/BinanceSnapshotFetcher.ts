import { request } from 'undici';
import type { Logger } from '@/application/interfaces/Logger';
import type { SnapshotSource } from '@/application/interfaces/SnapshotSource';
import { SnapshotFetchError } from '@/domain/errors/ReplicatorError';
import type { DepthSnapshot } from '@/domain/models/DepthFrame';
import type { MarketKind } from '@/domain/models/MarketKind';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import { BinanceEndpoints } from './BinanceEndpoints';
import { parseLevels } from './levels';

const DEFAULT_TIMEOUT_MS = 10_000;

/**
 * インフラ層: Binance の REST depth エンドポイントから板スナップショットを1回取得する
 *
 * 失敗はリトライせず SnapshotFetchError として呼び出し元（セッション）に伝播する。
 */
export class BinanceSnapshotFetcher implements SnapshotSource {
  private readonly logger: Logger;

  /**
   * @param endpoints エンドポイント解決
   * @param timeoutMs リクエストのタイムアウト（ミリ秒）
   * @param logger ロガー（オプショナル、未指定の場合は LoggerFactory から取得）
   */
  constructor(
    private readonly endpoints: BinanceEndpoints = new BinanceEndpoints(),
    private readonly timeoutMs: number = DEFAULT_TIMEOUT_MS,
    logger?: Logger
  ) {
    this.logger = logger ?? LoggerFactory.create();
  }

  async fetch(symbol: string, marketKind: MarketKind, depthLimit: number): Promise<DepthSnapshot> {
    const url = this.endpoints.depthUrl(symbol, marketKind, depthLimit);
    this.logger.debug('fetching depth snapshot', { url });

    let statusCode: number;
    let body: string;
    try {
      const response = await request(url, {
        method: 'GET',
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      statusCode = response.statusCode;
      body = await response.body.text();
    } catch (error) {
      throw new SnapshotFetchError(`depth snapshot request failed for ${symbol}`, null, '', { cause: error });
    }

    if (statusCode < 200 || statusCode >= 300) {
      throw new SnapshotFetchError(`depth snapshot for ${symbol} returned HTTP ${statusCode}`, statusCode, body);
    }

    return parseSnapshot(symbol, statusCode, body);
  }
}

function parseSnapshot(symbol: string, statusCode: number, body: string): DepthSnapshot {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (error) {
    throw new SnapshotFetchError(`depth snapshot for ${symbol} is not valid JSON`, statusCode, body, {
      cause: error,
    });
  }
  if (typeof parsed !== 'object' || parsed === null || !('bids' in parsed) || !('asks' in parsed)) {
    throw new SnapshotFetchError(`depth snapshot for ${symbol} has no bids/asks`, statusCode, body);
  }

  const bids = parseLevels(parsed.bids, 'bids');
  if (!bids.ok) {
    throw new SnapshotFetchError(`depth snapshot for ${symbol}: ${bids.reason}`, statusCode, body);
  }
  const asks = parseLevels(parsed.asks, 'asks');
  if (!asks.ok) {
    throw new SnapshotFetchError(`depth snapshot for ${symbol}: ${asks.reason}`, statusCode, body);
  }

  const lastUpdateId = 'lastUpdateId' in parsed && typeof parsed.lastUpdateId === 'number' ? parsed.lastUpdateId : null;
  return { lastUpdateId, bids: bids.levels, asks: asks.levels };
}
