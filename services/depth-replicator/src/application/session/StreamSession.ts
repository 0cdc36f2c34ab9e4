import type { FrameDecoder } from '@/application/interfaces/FrameDecoder';
import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import type { SnapshotSource } from '@/application/interfaces/SnapshotSource';
import type { StreamEndpoints } from '@/application/interfaces/StreamEndpoints';
import type { DepthStreamConnection, StreamTransport } from '@/application/interfaces/StreamTransport';
import { MalformedFrameError, ReceiveCancelledError } from '@/domain/errors/ReplicatorError';
import type { DepthSnapshot, ReceivedFrame } from '@/domain/models/DepthFrame';
import { type StreamTarget, sessionIdOf } from '@/domain/models/MarketKind';
import { PriceLevelBook, type ReadonlyPriceLevelBook } from '@/domain/models/PriceLevelBook';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import type { SessionLease, SessionRunner } from './SessionRegistry';

export type SessionState = 'created' | 'connecting' | 'open' | 'closing' | 'closed';

/**
 * フレームを受け取るコンシューマー。マージ後に毎フレーム呼ばれ、完了までセッションは次を受信しない。
 */
export type FrameConsumer = (frame: ReceivedFrame, book: ReadonlyPriceLevelBook) => void | Promise<void>;

/**
 * StreamSession の初期化オプション
 */
export interface StreamSessionOptions {
  transport: StreamTransport;
  endpoints: StreamEndpoints;
  decoder: FrameDecoder;
  snapshotSource: SnapshotSource;
  onFrame: FrameConsumer;
  /** スナップショットの深さ（デフォルト 1000） */
  depthLimit?: number;
  /** フレーム処理後、次の受信までの待機時間（ミリ秒、デフォルト 100） */
  pacingMs?: number;
  logger?: Logger;
  metricsCollector?: MetricsCollector;
}

const DEFAULT_DEPTH_LIMIT = 1000;
const DEFAULT_PACING_MS = 100;

/**
 * アプリケーション層: 1シンボル・1接続・1板のセッション
 *
 * 状態遷移: created → connecting → open → closing → closed
 *
 * 責務:
 * - WebSocket 接続を1本持ち、受信は常に1件だけ保留する
 * - 最初の差分で板が空ならスナップショットを取得してから差分を適用する
 * - 毎フレーム、マージ後にコンシューマーを呼ぶ
 *
 * 注意: スナップショットと差分の更新 ID は突き合わせていない。
 * スナップショットの時点が差分より前である保証はない（既知のギャップ）。
 */
export class StreamSession implements SessionRunner {
  readonly id: string;
  private readonly orderBook = new PriceLevelBook();
  private readonly logger: Logger;
  private readonly depthLimit: number;
  private readonly pacingMs: number;
  private currentState: SessionState = 'created';

  constructor(
    readonly target: StreamTarget,
    private readonly options: StreamSessionOptions
  ) {
    this.id = sessionIdOf(target);
    this.depthLimit = options.depthLimit ?? DEFAULT_DEPTH_LIMIT;
    this.pacingMs = options.pacingMs ?? DEFAULT_PACING_MS;
    this.logger = (options.logger ?? LoggerFactory.create()).child({
      sessionId: this.id,
      symbol: target.symbol,
    });
  }

  get state(): SessionState {
    return this.currentState;
  }

  get book(): ReadonlyPriceLevelBook {
    return this.orderBook;
  }

  /**
   * セッションのループを実行する。lease が open でなくなると終了する。
   * 接続中・受信中の shutdown はエラーではなく正常終了として扱う。
   * @throws {ConnectionError} 接続失敗・受信中の切断
   * @throws {MalformedFrameError} フレームが不正な場合
   * @throws {SnapshotFetchError} 初期スナップショットの取得に失敗した場合
   */
  async run(lease: SessionLease): Promise<void> {
    this.transition('connecting');
    const url = this.options.endpoints.streamUrl(this.target);
    this.logger.info('starting stream', { url });

    // 接続中も shutdown で打ち切れるよう、保留中の操作として登録する
    const controller = new AbortController();
    lease.trackOperation(controller);
    let connection: DepthStreamConnection;
    try {
      connection = await this.options.transport.connect(url, controller.signal);
    } catch (error) {
      this.transition('closed');
      if (controller.signal.aborted) {
        this.logger.debug('connect cancelled');
        return;
      }
      throw error;
    } finally {
      lease.clearOperation(controller);
    }

    try {
      this.transition('open');
      while (lease.isOpen()) {
        const raw = await this.receiveNext(connection, lease);
        if (raw === null) {
          break;
        }
        await this.process(raw);
        await this.pace();
      }
    } finally {
      this.transition('closing');
      connection.close();
      this.orderBook.clear();
      this.transition('closed');
    }
  }

  /**
   * 受信を1件だけ保留する。shutdown によるキャンセルは null を返す（エラーではない）。
   */
  private async receiveNext(connection: DepthStreamConnection, lease: SessionLease): Promise<string | null> {
    const controller = new AbortController();
    lease.trackOperation(controller);
    try {
      return await connection.receive(controller.signal);
    } catch (error) {
      if (error instanceof ReceiveCancelledError) {
        this.logger.debug('receive cancelled');
        return null;
      }
      throw error;
    } finally {
      lease.clearOperation(controller);
    }
  }

  private async process(raw: string): Promise<void> {
    const frame = this.options.decoder.decode(raw, this.target.marketKind);
    this.options.metricsCollector?.incrementFramesReceived(this.id, frame.kind);

    if (frame.kind === 'depthUpdate') {
      const { event } = frame;
      if (event.symbol.toUpperCase() !== this.target.symbol.toUpperCase()) {
        throw new MalformedFrameError(`unexpected symbol ${event.symbol}`, raw);
      }

      // 初回の差分: 板が両側とも空ならスナップショットで初期化してから差分を適用する
      if (this.orderBook.isEmpty()) {
        await this.bootstrap();
      }

      for (const level of event.asks) {
        this.orderBook.applyDelta('ask', level.price, level.qty);
      }
      for (const level of event.bids) {
        this.orderBook.applyDelta('bid', level.price, level.qty);
      }
    }

    await this.options.onFrame(frame, this.orderBook);
  }

  private async bootstrap(): Promise<void> {
    const { symbol, marketKind } = this.target;
    let snapshot: DepthSnapshot;
    try {
      snapshot = await this.options.snapshotSource.fetch(symbol, marketKind, this.depthLimit);
    } catch (error) {
      this.options.metricsCollector?.incrementSnapshotFetched(symbol, 'failure');
      throw error;
    }
    this.options.metricsCollector?.incrementSnapshotFetched(symbol, 'success');
    this.orderBook.applySnapshot(snapshot.bids, snapshot.asks);
    this.logger.info('order book initialized from snapshot', {
      lastUpdateId: snapshot.lastUpdateId,
      bids: snapshot.bids.length,
      asks: snapshot.asks.length,
    });
  }

  private async pace(): Promise<void> {
    if (this.pacingMs <= 0) {
      return;
    }
    await new Promise((resolve) => setTimeout(resolve, this.pacingMs));
  }

  private transition(next: SessionState): void {
    this.logger.debug('session state changed', { from: this.currentState, to: next });
    this.currentState = next;
  }
}
