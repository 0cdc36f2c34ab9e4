import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import type { ReceivedFrame } from '@/domain/models/DepthFrame';
import type { ReadonlyPriceLevelBook } from '@/domain/models/PriceLevelBook';
import type { PublishedBook } from '@/domain/models/PublishedBook';
import type { BookPublisher } from '@/domain/repositories/BookPublisher';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';

/**
 * アプリケーション層: 板配信ユースケース
 *
 * 責務: セッションから渡されたフレームとマージ後の板から、
 * 時刻・スプレッド・価格順の板をまとめてシンボルごとに配信する。
 */
export class PublishBookUsecase {
  private readonly logger: Logger;
  /** 片側が空の状態で最後に配信したシンボル */
  private readonly oneSidedSymbols = new Set<string>();

  /**
   * @param publisher 配信先
   * @param publishDepth 片側あたりの配信レベル数の上限（未指定なら全レベル）
   */
  constructor(
    private readonly publisher: BookPublisher,
    private readonly publishDepth?: number,
    logger?: Logger,
    private readonly metricsCollector?: MetricsCollector
  ) {
    this.logger = logger ?? LoggerFactory.create();
  }

  async execute(frame: ReceivedFrame, book: ReadonlyPriceLevelBook): Promise<void> {
    // 1. 板の差分以外（購読応答など）は配信しない
    if (frame.kind !== 'depthUpdate') {
      this.logger.debug('skipping non-depth frame', { payload: frame.payload });
      return;
    }

    // 2. 配信用のスナップショットを組み立てる
    const { event } = frame;
    const spread = book.spread();
    const payload: PublishedBook = {
      symbol: event.symbol,
      exchangeTs: new Date(event.eventTime).toISOString(),
      spread: spread === null ? null : spread.toFixed(),
      book: book.toJSON(this.publishDepth),
    };

    this.trackOneSided(event.symbol, spread === null, book);

    // 3. 配信（インフラ層のパブリッシャーを使用）
    await this.publisher.publish(event.symbol, payload);
    this.metricsCollector?.incrementPublished(event.symbol);
  }

  /**
   * 片側が空になった・両側に戻ったときだけログを出す（毎フレームは出さない）。
   */
  private trackOneSided(symbol: string, oneSided: boolean, book: ReadonlyPriceLevelBook): void {
    if (oneSided && !this.oneSidedSymbols.has(symbol)) {
      this.oneSidedSymbols.add(symbol);
      this.logger.warn('one side of the book is empty', { symbol, ...book.size });
    } else if (!oneSided && this.oneSidedSymbols.delete(symbol)) {
      this.logger.info('both sides of the book are populated again', { symbol, ...book.size });
    }
  }
}
