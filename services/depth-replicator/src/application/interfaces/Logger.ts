/**
 * ロガーインターフェース
 *
 * 実装は pino（PinoLogger）。テストでは LoggerMock に差し替える。
 * エラーは `{ err }` としてメタデータに載せる。
 */
export interface Logger {
  debug(msg: string, meta?: object): void;
  info(msg: string, meta?: object): void;
  warn(msg: string, meta?: object): void;
  error(msg: string, meta?: object): void;

  /**
   * セッション ID やシンボルを自動付与する子ロガーを作成する。
   * @param bindings 子ロガーに付与するコンテキスト情報
   */
  child(bindings: object): Logger;
}
