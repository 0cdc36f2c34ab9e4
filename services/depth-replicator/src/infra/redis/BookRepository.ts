import Redis from 'ioredis';
import type { Logger } from '@/application/interfaces/Logger';
import type { PublishedBook } from '@/domain/models/PublishedBook';
import type { BookPublisher } from '@/domain/repositories/BookPublisher';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';

/** ハッシュ内で板スナップショットを保持するフィールド名 */
export const SNAPSHOT_FIELD = 'snapshot';

/**
 * インフラ層: Redis ハッシュへの板スナップショット書き込み
 *
 * 責務: シンボルをキーにした HSET で最新の板を上書きする。
 * ダッシュボード側は latest() と同じキー・フィールドで読み出す。
 */
export class BookRepository implements BookPublisher {
  private readonly redis: Redis;
  private readonly logger: Logger;

  /**
   * @param redis Redis 接続 URL、または生成済みのクライアント
   * @param logger ロガー（オプショナル、未指定の場合は LoggerFactory から取得）
   */
  constructor(redis: string | Redis, logger?: Logger) {
    this.redis = typeof redis === 'string' ? new Redis(redis) : redis;
    this.logger = logger ?? LoggerFactory.create();
  }

  async publish(symbol: string, payload: PublishedBook): Promise<void> {
    await this.redis.hset(symbol, SNAPSHOT_FIELD, JSON.stringify(payload));
  }

  /**
   * 最後に配信された板スナップショットを読み出す。
   * @returns 未配信、または壊れた値の場合は null
   */
  async latest(symbol: string): Promise<PublishedBook | null> {
    const stored = await this.redis.hget(symbol, SNAPSHOT_FIELD);
    if (stored === null) {
      return null;
    }
    try {
      const parsed: unknown = JSON.parse(stored);
      return isPublishedBook(parsed) ? parsed : null;
    } catch (error) {
      this.logger.warn('stored snapshot is not valid JSON', { symbol, err: error });
      return null;
    }
  }

  /**
   * Redis 接続を閉じる。
   */
  async close(): Promise<void> {
    await this.redis.quit();
  }
}

function isPublishedBook(value: unknown): value is PublishedBook {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return (
    'symbol' in value &&
    typeof value.symbol === 'string' &&
    'exchangeTs' in value &&
    typeof value.exchangeTs === 'string' &&
    'spread' in value &&
    (value.spread === null || typeof value.spread === 'string') &&
    'book' in value &&
    typeof value.book === 'object' &&
    value.book !== null
  );
}
