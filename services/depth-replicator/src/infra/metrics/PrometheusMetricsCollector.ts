import { Counter, Gauge, Registry } from 'prom-client';
import type { MetricsCollector, MetricsRegistry } from '@/application/interfaces/MetricsCollector';

/**
 * Prometheus メトリクスコレクター実装
 * テストで別レジストリを使用するため、シングルトンにはしていない。
 */
export class PrometheusMetricsCollector implements MetricsCollector {
  private readonly register = new Registry();
  private readonly framesCounter: Counter;
  private readonly snapshotCounter: Counter;
  private readonly publishedCounter: Counter;
  private readonly errorCounter: Counter;
  private readonly openSessionsGauge: Gauge;

  constructor() {
    this.framesCounter = new Counter({
      name: 'replicator_frames_received_total',
      help: 'Total number of frames received from depth streams',
      labelNames: ['session', 'kind'],
      registers: [this.register],
    });

    this.snapshotCounter = new Counter({
      name: 'replicator_snapshots_fetched_total',
      help: 'Total number of REST depth snapshot fetches',
      labelNames: ['symbol', 'outcome'],
      registers: [this.register],
    });

    this.publishedCounter = new Counter({
      name: 'replicator_books_published_total',
      help: 'Total number of order book snapshots published',
      labelNames: ['symbol'],
      registers: [this.register],
    });

    this.errorCounter = new Counter({
      name: 'replicator_errors_total',
      help: 'Total number of session-terminating errors',
      labelNames: ['error_type'],
      registers: [this.register],
    });

    this.openSessionsGauge = new Gauge({
      name: 'replicator_open_sessions',
      help: 'Number of sessions currently in the open set',
      registers: [this.register],
    });
  }

  incrementFramesReceived(sessionId: string, kind: string): void {
    this.framesCounter.inc({ session: sessionId, kind });
  }

  incrementSnapshotFetched(symbol: string, outcome: 'success' | 'failure'): void {
    this.snapshotCounter.inc({ symbol, outcome });
  }

  incrementPublished(symbol: string): void {
    this.publishedCounter.inc({ symbol });
  }

  incrementError(errorType: string): void {
    this.errorCounter.inc({ error_type: errorType });
  }

  setOpenSessions(count: number): void {
    this.openSessionsGauge.set(count);
  }

  async getMetrics(): Promise<string> {
    return await this.register.metrics();
  }

  getRegistry(): MetricsRegistry {
    return this.register;
  }
}
