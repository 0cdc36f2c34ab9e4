/**
 * メトリクスレジストリの最小インターフェース
 * prom-client の Registry 型を抽象化
 */
export interface MetricsRegistry {
  contentType: string;
}

/**
 * レプリケーションの稼働状況を数えるメトリクス収集インターフェース
 */
export interface MetricsCollector {
  /**
   * 受信フレーム数をカウント
   * @param sessionId セッション ID（depth_btcusdt など）
   * @param kind フレーム種別（depthUpdate, other）
   */
  incrementFramesReceived(sessionId: string, kind: string): void;

  /**
   * REST スナップショット取得回数をカウント
   * @param symbol シンボル
   * @param outcome 'success' | 'failure'
   */
  incrementSnapshotFetched(symbol: string, outcome: 'success' | 'failure'): void;

  /**
   * 板の配信回数をカウント
   */
  incrementPublished(symbol: string): void;

  /**
   * エラー数をカウント
   * @param errorType エラー名（SnapshotFetchError, MalformedFrameError, ConnectionError など）
   */
  incrementError(errorType: string): void;

  /**
   * open 中のセッション数を設定
   */
  setOpenSessions(count: number): void;

  /**
   * Prometheus 形式のメトリクス文字列を取得
   */
  getMetrics(): Promise<string>;

  /**
   * メトリクスレジストリを取得（HTTP サーバーで使用）
   */
  getRegistry(): MetricsRegistry;
}
