/**
 * ドメイン層: 板レプリケーションのエラー分類
 *
 * セッション単位の致命的エラー（SnapshotFetchError, MalformedFrameError, ConnectionError）は
 * そのシンボルのセッションだけを終了させる。プロセス全体は止めない。
 */
export class ReplicatorError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ReplicatorError';
  }
}

/**
 * REST スナップショットの取得に失敗した（非 2xx / 不正なボディ / 通信エラー）。
 */
export class SnapshotFetchError extends ReplicatorError {
  /**
   * @param status HTTP ステータスコード。レスポンスを受け取れなかった場合は null
   * @param body 受信した生のレスポンスボディ
   */
  constructor(
    message: string,
    readonly status: number | null,
    readonly body: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'SnapshotFetchError';
  }
}

/**
 * 既に open 中のセッション ID で開始しようとした。
 * 重複排除は意図した挙動なので warn で記録して破棄する。
 */
export class DuplicateSessionError extends ReplicatorError {
  constructor(readonly sessionId: string) {
    super(`session ${sessionId} already opened`);
    this.name = 'DuplicateSessionError';
  }
}

/**
 * 受信フレームを期待した構造としてパースできなかった。
 */
export class MalformedFrameError extends ReplicatorError {
  constructor(
    reason: string,
    readonly raw: string
  ) {
    super(`malformed frame: ${reason}`);
    this.name = 'MalformedFrameError';
  }
}

/**
 * WebSocket の接続確立失敗、または受信中の切断。
 */
export class ConnectionError extends ReplicatorError {
  constructor(
    message: string,
    readonly url: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ConnectionError';
  }
}

/**
 * 板の内部不変条件違反（空でない板への applySnapshot など）。プログラムのバグを示す。
 */
export class BookInvariantError extends ReplicatorError {
  constructor(message: string) {
    super(message);
    this.name = 'BookInvariantError';
  }
}

/**
 * shutdown によって保留中の受信がキャンセルされたことを示す。
 * エラーではないので error ログには出さない。
 */
export class ReceiveCancelledError extends ReplicatorError {
  constructor() {
    super('receive cancelled');
    this.name = 'ReceiveCancelledError';
  }
}
