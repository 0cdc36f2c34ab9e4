import WebSocket from 'ws';
import type { DepthStreamConnection, StreamTransport } from '@/application/interfaces/StreamTransport';
import { ConnectionError } from '@/domain/errors/ReplicatorError';
import { WsDepthConnection } from './WsDepthConnection';

const DEFAULT_HANDSHAKE_TIMEOUT_MS = 10_000;

/**
 * インフラ層: ws パッケージを使った WebSocket トランスポート
 *
 * 責務: 接続の確立のみ。受信は WsDepthConnection が担当する。
 */
export class WsStreamTransport implements StreamTransport {
  /**
   * @param handshakeTimeoutMs ハンドシェイクのタイムアウト（ミリ秒）
   */
  constructor(private readonly handshakeTimeoutMs: number = DEFAULT_HANDSHAKE_TIMEOUT_MS) {}

  /**
   * WebSocket 接続を確立する。
   * @param url WebSocket エンドポイント URL
   * @param signal 中断されたらソケットを破棄して reject する
   * @returns 接続が確立されたら解決される
   */
  async connect(url: string, signal: AbortSignal): Promise<DepthStreamConnection> {
    if (signal.aborted) {
      throw new ConnectionError(`websocket connection aborted: ${url}`, url);
    }

    return new Promise<DepthStreamConnection>((resolve, reject) => {
      const socket = new WebSocket(url, { handshakeTimeout: this.handshakeTimeoutMs });
      // open 直後のフレームを取りこぼさないよう、先に接続オブジェクトでリスナーを張る
      const connection = new WsDepthConnection(socket, url);

      const settle = () => {
        socket.off('open', onOpen);
        socket.off('error', onError);
        signal.removeEventListener('abort', onAbort);
      };

      const onOpen = () => {
        settle();
        resolve(connection);
      };

      const onError = (error: Error) => {
        settle();
        reject(new ConnectionError(`websocket connection failed: ${url}`, url, { cause: error }));
      };

      const onAbort = () => {
        settle();
        socket.terminate();
        reject(new ConnectionError(`websocket connection aborted: ${url}`, url));
      };

      socket.once('open', onOpen);
      socket.once('error', onError);
      signal.addEventListener('abort', onAbort, { once: true });
    });
  }
}
