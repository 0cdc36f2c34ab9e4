import { afterEach, beforeEach, describe, expect, it, type Mock, vi } from 'vitest';
import type { SnapshotSource } from '@/application/interfaces/SnapshotSource';
import { SessionRegistry } from '@/application/session/SessionRegistry';
import { type FrameConsumer, StreamSession, type StreamSessionOptions } from '@/application/session/StreamSession';
import { ConnectionError, MalformedFrameError, SnapshotFetchError } from '@/domain/errors/ReplicatorError';
import type { ReceivedFrame } from '@/domain/models/DepthFrame';
import type { MarketKind } from '@/domain/models/MarketKind';
import type { BookLevels, ReadonlyPriceLevelBook } from '@/domain/models/PriceLevelBook';
import { BinanceEndpoints } from '@/infra/adapters/binance/BinanceEndpoints';
import { BinanceFrameDecoder } from '@/infra/adapters/binance/BinanceFrameDecoder';
import { FakeStreamTransport } from '@test/unit/helpers/fakes/FakeStreamTransport';
import { derivativeDepthFrame, snapshotOf, spotDepthFrame } from '@test/unit/helpers/fixtures/frames';
import { LoggerMock } from '@test/unit/helpers/mocks/LoggerMock';

interface Delivered {
  kind: ReceivedFrame['kind'];
  book: BookLevels;
}

/**
 * 単体テスト: StreamSession
 *
 * 優先度1: セッションのループ（フェイクのトランスポートで駆動）
 * - 初回差分でのスナップショット取得（1回だけ）
 * - フレームの到着順の処理
 * - シンボル不一致・接続エラー・スナップショット失敗での終了
 * - shutdown による受信の中断
 */
describe('StreamSession', () => {
  let transport: FakeStreamTransport;
  let registry: SessionRegistry;
  let loggerMock: LoggerMock;
  let fetchSnapshot: Mock<SnapshotSource['fetch']>;
  let delivered: Delivered[];

  const collect: FrameConsumer = (frame, book) => {
    delivered.push({ kind: frame.kind, book: book.toJSON() });
  };

  const createSession = (
    symbol = 'BTCUSDT',
    marketKind: MarketKind = 'spot',
    overrides: Partial<StreamSessionOptions> = {}
  ) =>
    new StreamSession(
      { symbol, marketKind },
      {
        transport,
        endpoints: new BinanceEndpoints(),
        decoder: new BinanceFrameDecoder(),
        snapshotSource: { fetch: fetchSnapshot },
        onFrame: collect,
        pacingMs: 0,
        logger: loggerMock,
        ...overrides,
      }
    );

  const startSession = (session: StreamSession) => {
    registry.start(session.id, session);
    return session;
  };

  const waitForReceive = () => vi.waitFor(() => expect(transport.latest().hasPendingReceive).toBe(true));

  beforeEach(() => {
    transport = new FakeStreamTransport();
    loggerMock = new LoggerMock();
    registry = new SessionRegistry(loggerMock);
    delivered = [];
    fetchSnapshot = vi.fn<SnapshotSource['fetch']>(async () => snapshotOf([['100.0', '2']], [['101.0', '3']]));
  });

  afterEach(async () => {
    registry.shutdown();
    await registry.whenSettled();
    vi.restoreAllMocks();
  });

  it('現物のストリーム URL に接続する', async () => {
    const session = startSession(createSession());

    await waitForReceive();

    expect(session.id).toBe('depth_btcusdt');
    expect(session.state).toBe('open');
    expect(transport.urls).toEqual(['wss://stream.binance.com:9443/ws/btcusdt@depth']);
  });

  it('初回の差分でスナップショットを取得し、その後に差分を適用する', async () => {
    startSession(createSession());
    await waitForReceive();

    transport.latest().push(
      spotDepthFrame({
        asks: [['101.0', '0'], ['102.0', '1']],
        bids: [['100.0', '0'], ['99.5', '4']],
      })
    );

    await vi.waitFor(() => expect(delivered).toHaveLength(1));
    expect(fetchSnapshot).toHaveBeenCalledWith('BTCUSDT', 'spot', 1000);
    expect(delivered[0]).toEqual({
      kind: 'depthUpdate',
      book: { bids: [['99.5', '4']], asks: [['102', '1']] },
    });
  });

  it('板が空でない間はスナップショットを再取得しない', async () => {
    startSession(createSession());
    await waitForReceive();

    transport
      .latest()
      .push(
        spotDepthFrame({ bids: [['100.5', '1']] }),
        spotDepthFrame({ asks: [['101.5', '2']] }),
        spotDepthFrame({ bids: [['100.5', '0']] })
      );

    await vi.waitFor(() => expect(delivered).toHaveLength(3));
    expect(fetchSnapshot).toHaveBeenCalledTimes(1);
    expect(delivered[2]?.book).toEqual({
      bids: [['100', '2']],
      asks: [['101', '3'], ['101.5', '2']],
    });
  });

  it('板が両側とも空に戻った後の差分では再度スナップショットを取得する', async () => {
    fetchSnapshot.mockResolvedValueOnce(snapshotOf([['100', '1']], []));
    startSession(createSession());
    await waitForReceive();

    transport.latest().push(spotDepthFrame({ bids: [['100', '0']] }), spotDepthFrame({ asks: [['105', '1']] }));

    await vi.waitFor(() => expect(delivered).toHaveLength(2));
    expect(fetchSnapshot).toHaveBeenCalledTimes(2);
    expect(delivered[0]?.book).toEqual({ bids: [], asks: [] });
  });

  it('コンシューマーが遅くてもフレームは到着順に1件ずつ処理される', async () => {
    const seen: string[] = [];
    let inFlight = 0;
    let maxInFlight = 0;
    const slowConsumer: FrameConsumer = async (_frame, book: ReadonlyPriceLevelBook) => {
      inFlight += 1;
      maxInFlight = Math.max(maxInFlight, inFlight);
      await new Promise((resolve) => setTimeout(resolve, 5));
      seen.push(book.bestBid()?.qty.toFixed() ?? 'none');
      inFlight -= 1;
    };
    startSession(createSession('BTCUSDT', 'spot', { onFrame: slowConsumer }));
    await waitForReceive();

    transport
      .latest()
      .push(
        spotDepthFrame({ bids: [['100', '5']] }),
        spotDepthFrame({ bids: [['100', '6']] }),
        spotDepthFrame({ bids: [['100', '7']] })
      );

    await vi.waitFor(() => expect(seen).toHaveLength(3));
    expect(seen).toEqual(['5', '6', '7']);
    expect(maxInFlight).toBe(1);
  });

  it('depthUpdate 以外のフレームは板を変えずにコンシューマーへ渡す', async () => {
    startSession(createSession());
    await waitForReceive();

    transport.latest().push(JSON.stringify({ result: null, id: 1 }));

    await vi.waitFor(() => expect(delivered).toHaveLength(1));
    expect(delivered[0]).toEqual({ kind: 'other', book: { bids: [], asks: [] } });
    expect(fetchSnapshot).not.toHaveBeenCalled();
  });

  it('デリバティブは data エンベロープを外して処理する', async () => {
    const session = startSession(createSession('BTCUSD_PERP', 'derivative'));
    await waitForReceive();

    transport.latest().push(derivativeDepthFrame({ asks: [['30000.1', '7']] }));

    await vi.waitFor(() => expect(delivered).toHaveLength(1));
    expect(session.id).toBe('depth_perp_btcusd_perp');
    expect(transport.urls).toEqual(['wss://dstream.binance.com/stream?streams=btcusd_perp@depth']);
    expect(fetchSnapshot).toHaveBeenCalledWith('BTCUSD_PERP', 'derivative', 1000);
    expect(delivered[0]?.book.asks).toEqual([['101', '3'], ['30000.1', '7']]);
  });

  it('depthLimit をスナップショット取得に渡す', async () => {
    startSession(createSession('BTCUSDT', 'spot', { depthLimit: 50 }));
    await waitForReceive();

    transport.latest().push(spotDepthFrame());

    await vi.waitFor(() => expect(fetchSnapshot).toHaveBeenCalledWith('BTCUSDT', 'spot', 50));
  });

  it('別シンボルのフレームを受け取るとセッションを終了する', async () => {
    const session = startSession(createSession());
    await waitForReceive();
    const connection = transport.latest();

    connection.push(spotDepthFrame({ symbol: 'ETHUSDT' }));

    await registry.whenSettled();
    expect(session.state).toBe('closed');
    expect(connection.closed).toBe(true);
    expect(registry.isOpen('depth_btcusdt')).toBe(false);
    const [message, meta] = loggerMock.error.mock.calls[0] ?? [];
    expect(message).toBe('session terminated');
    expect(meta).toMatchObject({ sessionId: 'depth_btcusdt' });
    expect(meta).toHaveProperty('err', expect.any(MalformedFrameError));
  });

  it('シンボルの大文字小文字の違いは不一致として扱わない', async () => {
    startSession(createSession());
    await waitForReceive();

    transport.latest().push(spotDepthFrame({ symbol: 'btcusdt' }));

    await vi.waitFor(() => expect(delivered).toHaveLength(1));
  });

  it('不正なフレームでセッションを終了する', async () => {
    const session = startSession(createSession());
    await waitForReceive();

    transport.latest().push('not json');

    await registry.whenSettled();
    expect(session.state).toBe('closed');
    expect(delivered).toEqual([]);
  });

  it('スナップショットの取得に失敗するとセッションを終了する', async () => {
    fetchSnapshot.mockRejectedValueOnce(new SnapshotFetchError('depth snapshot for BTCUSDT returned HTTP 500', 500, ''));
    const session = startSession(createSession());
    await waitForReceive();

    transport.latest().push(spotDepthFrame({ bids: [['100', '1']] }));

    await registry.whenSettled();
    expect(session.state).toBe('closed');
    expect(session.book.isEmpty()).toBe(true);
    expect(delivered).toEqual([]);
    expect(loggerMock.error.mock.calls[0]?.[1]).toHaveProperty('err', expect.any(SnapshotFetchError));
  });

  it('接続に失敗するとセッションを終了し、ID を解放する', async () => {
    transport.connectError = new ConnectionError('websocket connection failed', 'wss://example.invalid');
    const session = startSession(createSession());

    await registry.whenSettled();

    expect(session.state).toBe('closed');
    expect(registry.isOpen(session.id)).toBe(false);
    expect(loggerMock.messages('error')).toEqual(['session terminated']);
  });

  it('接続待ちの間に shutdown されたら接続を打ち切り、エラーとして扱わずに閉じる', async () => {
    transport.hangConnects = true;
    const session = startSession(createSession());
    await vi.waitFor(() => expect(transport.pendingConnects).toBe(1));
    expect(session.state).toBe('connecting');
    expect(registry.pendingCount()).toBe(1);

    registry.shutdown();
    await registry.whenSettled();

    expect(transport.connectCancellations).toBe(1);
    expect(transport.connections).toEqual([]);
    expect(session.state).toBe('closed');
    expect(loggerMock.error).not.toHaveBeenCalled();
    expect(loggerMock.messages('debug')).toContain('connect cancelled');
  });

  it('受信中の切断でセッションを終了する', async () => {
    const session = startSession(createSession());
    await waitForReceive();

    transport.latest().fail(new ConnectionError('socket closed (1006)', 'wss://example.invalid'));

    await registry.whenSettled();
    expect(session.state).toBe('closed');
    expect(loggerMock.error.mock.calls[0]?.[1]).toHaveProperty('err', expect.any(ConnectionError));
  });

  it('shutdown で保留中の受信を中断し、エラーとして扱わずに閉じる', async () => {
    const session = startSession(createSession());
    await waitForReceive();
    const connection = transport.latest();

    registry.shutdown();
    await registry.whenSettled();

    expect(connection.cancellations).toBe(1);
    expect(connection.closed).toBe(true);
    expect(session.state).toBe('closed');
    expect(loggerMock.error).not.toHaveBeenCalled();
    expect(loggerMock.messages('info')).toContain('session closed');
  });

  it('コンシューマーの処理中に shutdown されたら次の受信をせずに抜ける', async () => {
    let release: () => void = () => undefined;
    const blocked = new Promise<void>((resolve) => {
      release = resolve;
    });
    const blockingConsumer: FrameConsumer = async () => {
      await blocked;
    };
    const session = startSession(createSession('BTCUSDT', 'spot', { onFrame: blockingConsumer }));
    await waitForReceive();
    const connection = transport.latest();

    connection.push(spotDepthFrame({ bids: [['100', '1']] }));
    await vi.waitFor(() => expect(session.book.isEmpty()).toBe(false));
    registry.shutdown();
    release();
    await registry.whenSettled();

    expect(connection.receives).toBe(1);
    expect(connection.cancellations).toBe(0);
    expect(session.state).toBe('closed');
    expect(session.book.isEmpty()).toBe(true);
  });

  it('フレーム処理後 pacingMs の間は次の受信をしない', async () => {
    startSession(createSession('BTCUSDT', 'spot', { pacingMs: 200 }));
    await waitForReceive();
    const connection = transport.latest();

    connection.push(spotDepthFrame({ bids: [['100', '1']] }));
    await vi.waitFor(() => expect(delivered).toHaveLength(1));
    const deliveredAt = Date.now();

    expect(connection.hasPendingReceive).toBe(false);
    expect(connection.receives).toBe(1);

    await vi.waitFor(() => expect(connection.hasPendingReceive).toBe(true));
    expect(connection.receives).toBe(2);
    expect(Date.now() - deliveredAt).toBeGreaterThanOrEqual(100);
  });
});
