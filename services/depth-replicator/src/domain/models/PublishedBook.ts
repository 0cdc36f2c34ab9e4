import type { BookLevels } from './PriceLevelBook';

/**
 * 配信先に書き込む板のスナップショット。
 * ダッシュボードなどの外部コンシューマーがシンボルをキーに取り出す。
 */
export interface PublishedBook {
  symbol: string;
  /** 取引所のイベント時刻（ISO 8601） */
  exchangeTs: string;
  /** bestAsk - bestBid（10進文字列）。片側が空の場合は null */
  spread: string | null;
  book: BookLevels;
}
