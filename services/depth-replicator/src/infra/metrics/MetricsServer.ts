import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';

/**
 * メトリクス HTTP サーバー
 *
 * 責務: GET /metrics で Prometheus 形式のメトリクスを公開
 */
export class MetricsServer {
  private server: Server | null = null;

  constructor(
    private readonly metricsCollector: MetricsCollector,
    private readonly port: number,
    private readonly logger: Logger
  ) {}

  start(): void {
    this.server = createServer((req, res) => {
      void this.handle(req, res);
    });

    this.server.listen(this.port, () => {
      this.logger.info('Metrics server started', { port: this.port });
    });
  }

  stop(): void {
    if (this.server) {
      this.server.close();
      this.server = null;
    }
  }

  private async handle(req: IncomingMessage, res: ServerResponse): Promise<void> {
    if (req.url !== '/metrics' || req.method !== 'GET') {
      res.statusCode = 404;
      res.end('Not Found');
      return;
    }
    try {
      const metrics = await this.metricsCollector.getMetrics();
      res.setHeader('Content-Type', this.metricsCollector.getRegistry().contentType);
      res.statusCode = 200;
      res.end(metrics);
    } catch (error) {
      this.logger.error('Failed to get metrics', { err: error });
      res.statusCode = 500;
      res.end('Internal Server Error');
    }
  }
}
