import type { Logger } from '@/application/interfaces/Logger';
import type { SessionRegistry, SessionRunner } from '@/application/session/SessionRegistry';
import type { StreamTarget } from '@/domain/models/MarketKind';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';

/**
 * ディスパッチャーが起動するセッション（ID と実行本体）
 */
export interface DispatchedSession extends SessionRunner {
  readonly id: string;
}

export type SessionFactory = (target: StreamTarget) => DispatchedSession;

/**
 * プレゼンテーション層: 設定されたシンボルごとにセッションを起動する
 *
 * 責務:
 * - 購読対象ごとにセッションを生成し、レジストリ経由で起動する
 * - 停止要求をレジストリの shutdown に委譲する
 *
 * 同じシンボルが重複して設定されていても、レジストリが同じ ID を1回しか起動しない。
 */
export class Dispatcher {
  private readonly logger: Logger;

  constructor(
    private readonly registry: SessionRegistry,
    private readonly createSession: SessionFactory,
    logger?: Logger
  ) {
    this.logger = logger ?? LoggerFactory.create();
  }

  /**
   * @returns 実際に起動したセッション ID
   */
  start(targets: readonly StreamTarget[]): string[] {
    const started: string[] = [];
    for (const target of targets) {
      const session = this.createSession(target);
      if (this.registry.start(session.id, session)) {
        started.push(session.id);
      }
    }
    this.logger.info('sessions started', { sessions: started });
    return started;
  }

  stop(): void {
    this.registry.shutdown();
  }

  /**
   * 停止後、すべてのセッションのループが抜けるまで待つ。
   * @param timeoutMs 待つ上限（ミリ秒）。未指定なら無制限
   * @returns 上限内に抜けた場合 true
   */
  async whenStopped(timeoutMs?: number): Promise<boolean> {
    const settled = this.registry.whenSettled().then((): true => true);
    if (timeoutMs === undefined) {
      return await settled;
    }

    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<false>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });
    try {
      return await Promise.race([settled, timedOut]);
    } finally {
      clearTimeout(timer);
    }
  }
}
