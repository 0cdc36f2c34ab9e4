import 'dotenv/config';
import process from 'node:process';
import { SessionRegistry } from '@/application/session/SessionRegistry';
import { StreamSession } from '@/application/session/StreamSession';
import { PublishBookUsecase } from '@/application/usecases/PublishBookUsecase';
import { BinanceEndpoints } from '@/infra/adapters/binance/BinanceEndpoints';
import { BinanceFrameDecoder } from '@/infra/adapters/binance/BinanceFrameDecoder';
import { BinanceSnapshotFetcher } from '@/infra/adapters/binance/BinanceSnapshotFetcher';
import { loadConfig } from '@/infra/config/loadConfig';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import { MetricsServer } from '@/infra/metrics/MetricsServer';
import { PrometheusMetricsCollector } from '@/infra/metrics/PrometheusMetricsCollector';
import { BookRepository } from '@/infra/redis/BookRepository';
import { WsStreamTransport } from '@/infra/websocket/WsStreamTransport';
import { Dispatcher } from '@/presentation/Dispatcher';

const SHUTDOWN_TIMEOUT_MS = 5_000;

/**
 * エントリーポイント: アプリケーションの起動処理、依存関係の注入、シグナルハンドリング
 *
 * 責務:
 * - `.env` 読み込みと環境変数の検証
 * - コンポーネントの生成と初期化
 * - シグナルハンドリング
 *
 * 注意: 板のマージやセッションの制御は main.ts に置かず、ただ「配線するだけ」にする。
 */
async function bootstrap(): Promise<void> {
  const config = loadConfig(process.env);
  const logger = LoggerFactory.create();
  const metricsCollector = new PrometheusMetricsCollector();

  // インフラ層: 配信先と取引所アダプタ
  const publisher = new BookRepository(config.redisUrl, logger);
  const endpoints = new BinanceEndpoints(config.urls);
  const snapshotSource = new BinanceSnapshotFetcher(endpoints, config.snapshotTimeoutMs, logger);
  const decoder = new BinanceFrameDecoder();
  const transport = new WsStreamTransport();

  // アプリケーション層: 板配信ユースケースとセッション表
  const usecase = new PublishBookUsecase(publisher, config.publishDepth, logger, metricsCollector);
  const registry = new SessionRegistry(logger, metricsCollector);

  const dispatcher = new Dispatcher(
    registry,
    (target) =>
      new StreamSession(target, {
        transport,
        endpoints,
        decoder,
        snapshotSource,
        onFrame: (frame, book) => usecase.execute(frame, book),
        depthLimit: config.depthLimit,
        pacingMs: config.pacingMs,
        logger,
        metricsCollector,
      }),
    logger
  );

  let metricsServer: MetricsServer | null = null;
  if (config.metricsPort !== undefined) {
    metricsServer = new MetricsServer(metricsCollector, config.metricsPort, logger);
    metricsServer.start();
  }

  dispatcher.start(config.targets);

  let shuttingDown = false;
  const shutdown = async () => {
    shuttingDown = true;
    logger.info('Shutting down replicator...');
    // SIGINT/SIGTERM で全セッションの接続・受信を中断し、ループが抜けてから Redis を閉じる。
    dispatcher.stop();
    const stopped = await dispatcher.whenStopped(SHUTDOWN_TIMEOUT_MS);
    if (!stopped) {
      logger.warn('sessions did not stop in time, closing anyway', { timeoutMs: SHUTDOWN_TIMEOUT_MS });
    }
    metricsServer?.stop();
    await publisher.close();
    process.exit(stopped ? 0 : 1);
  };

  const onSignal = () => {
    // 2回目のシグナルは待たずに終了する
    if (shuttingDown) {
      logger.warn('Forced exit on repeated signal');
      process.exit(1);
    }
    shutdown().catch((error: unknown) => {
      logger.error('Failed to shut down cleanly', { err: error });
      process.exit(1);
    });
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}

bootstrap().catch((error: unknown) => {
  LoggerFactory.create().error('Failed to bootstrap replicator', { err: error });
  process.exit(1);
});
