/**
 * 差分ストリームの接続。受信は1件ずつ要求する（pull 型）。
 *
 * 受信の保留中に届いたフレームは到着順にバッファされ、並べ替え・間引きはしない。
 */
export interface DepthStreamConnection {
  /**
   * 次のフレームを受信する。同時に保留できる receive は1つだけ。
   * @param signal 中断すると ReceiveCancelledError で reject される
   * @returns 受信したテキストフレーム
   * @throws {ConnectionError} ソケットが閉じられた・エラーになった場合
   * @throws {ReceiveCancelledError} signal が中断された場合
   */
  receive(signal: AbortSignal): Promise<string>;

  /**
   * ソケットを解放する。
   */
  close(): void;
}

/**
 * WebSocket 接続を張るトランスポート（インフラ層で実装される）。
 */
export interface StreamTransport {
  /**
   * @param signal 中断されたら接続の確立を打ち切り、reject する
   * @throws {ConnectionError} 接続の確立に失敗した・中断された場合
   */
  connect(url: string, signal: AbortSignal): Promise<DepthStreamConnection>;
}
