import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import { DuplicateSessionError, ReplicatorError } from '@/domain/errors/ReplicatorError';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';

/**
 * セッションのループから見たレジストリ。
 * 自分の ID が open の間だけループを回し、保留中の接続・受信を登録する。
 */
export interface SessionLease {
  readonly sessionId: string;

  /**
   * ID が open セットに残っているか。shutdown 後や別世代の開始後は false。
   */
  isOpen(): boolean;

  /**
   * 保留中の操作（接続または受信）を登録する。登録できるのはセッションごとに1つだけ。
   * 既に open でなければ即座に中断する。
   */
  trackOperation(controller: AbortController): void;

  /**
   * 操作の完了後に登録を外す。
   */
  clearOperation(controller: AbortController): void;
}

/**
 * レジストリから起動されるセッション。
 */
export interface SessionRunner {
  run(lease: SessionLease): Promise<void>;
}

/**
 * アプリケーション層: プロセス全体のセッション表
 *
 * 責務: セッション ID ごとに高々1つのセッションを保証し、shutdown で一括キャンセルする。
 * - open セット: 生きているセッション ID（世代トークン付き）
 * - 保留中の操作（接続・受信）: セッション ID → AbortController
 *
 * 状態の変更はすべてイベントループ上で同期的に行うので、ロックは不要。
 */
export class SessionRegistry {
  private readonly openIds = new Map<string, symbol>();
  private readonly pending = new Map<string, AbortController>();
  private readonly running = new Set<Promise<void>>();
  private readonly logger: Logger;

  /**
   * @param logger ロガー（オプショナル、未指定の場合は LoggerFactory から取得）
   * @param metricsCollector メトリクスコレクター（オプショナル）
   */
  constructor(
    logger?: Logger,
    private readonly metricsCollector?: MetricsCollector
  ) {
    this.logger = logger ?? LoggerFactory.create();
  }

  /**
   * セッションを開始する。ID が open 中なら warn を出して何もしない。
   * @returns 開始した場合 true、重複で破棄した場合 false
   */
  start(sessionId: string, runner: SessionRunner): boolean {
    if (this.openIds.has(sessionId)) {
      const error = new DuplicateSessionError(sessionId);
      this.logger.warn('session already opened, ignoring start', { sessionId, err: error });
      return false;
    }

    const token = Symbol(sessionId);
    this.openIds.set(sessionId, token);
    this.reportOpenSessions();

    const task: Promise<void> = this.supervise(sessionId, token, runner).then(() => {
      this.running.delete(task);
    });
    this.running.add(task);
    return true;
  }

  /**
   * 保留中の接続・受信をすべてキャンセルし、open セットを空にする。
   * ループの終了は待たない（待つ場合は whenSettled を使う）。
   */
  shutdown(): void {
    this.logger.info('closing all streams', { sessions: this.openIds.size, pending: this.pending.size });
    for (const controller of this.pending.values()) {
      controller.abort();
    }
    this.pending.clear();
    this.openIds.clear();
    this.reportOpenSessions();
  }

  /**
   * 起動済みのすべてのループが終了するまで待つ。
   */
  async whenSettled(): Promise<void> {
    await Promise.all([...this.running]);
  }

  isOpen(sessionId: string): boolean {
    return this.openIds.has(sessionId);
  }

  openSessionIds(): string[] {
    return [...this.openIds.keys()];
  }

  pendingCount(): number {
    return this.pending.size;
  }

  private async supervise(sessionId: string, token: symbol, runner: SessionRunner): Promise<void> {
    try {
      await runner.run(this.leaseFor(sessionId, token));
      this.logger.info('session closed', { sessionId });
    } catch (error) {
      // シンボル単位の致命的エラー。他のセッションは止めない
      this.logger.error('session terminated', { sessionId, err: error });
      this.metricsCollector?.incrementError(error instanceof Error ? error.name : 'UnknownError');
    } finally {
      this.release(sessionId, token);
    }
  }

  private leaseFor(sessionId: string, token: symbol): SessionLease {
    return {
      sessionId,
      isOpen: () => this.openIds.get(sessionId) === token,
      trackOperation: (controller) => {
        if (this.openIds.get(sessionId) !== token) {
          controller.abort();
          return;
        }
        if (this.pending.has(sessionId)) {
          throw new ReplicatorError(`session ${sessionId} already has a pending operation`);
        }
        this.pending.set(sessionId, controller);
      },
      clearOperation: (controller) => {
        if (this.pending.get(sessionId) === controller) {
          this.pending.delete(sessionId);
        }
      },
    };
  }

  private release(sessionId: string, token: symbol): void {
    if (this.openIds.get(sessionId) !== token) {
      return;
    }
    this.openIds.delete(sessionId);
    this.pending.delete(sessionId);
    this.reportOpenSessions();
  }

  private reportOpenSessions(): void {
    this.metricsCollector?.setOpenSessions(this.openIds.size);
  }
}
