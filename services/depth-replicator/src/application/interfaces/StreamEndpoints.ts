import type { StreamTarget } from '@/domain/models/MarketKind';

/**
 * 購読対象から WebSocket の URL を導出する（インフラ層で実装される）。
 */
export interface StreamEndpoints {
  streamUrl(target: StreamTarget): string;
}
