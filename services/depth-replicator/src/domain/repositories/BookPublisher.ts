import type { PublishedBook } from '@/domain/models/PublishedBook';

/**
 * 板スナップショットのパブリッシャーのインターフェイス（インフラ層で実装される）。
 */
export interface BookPublisher {
  /**
   * シンボルをキーに最新の板スナップショットを書き込む。
   * @param symbol 取引ペア
   * @param payload 書き込む板スナップショット
   */
  publish(symbol: string, payload: PublishedBook): Promise<void>;
}
