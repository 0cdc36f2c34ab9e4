import WebSocket, { type RawData } from 'ws';
import type { DepthStreamConnection } from '@/application/interfaces/StreamTransport';
import { ConnectionError, ReceiveCancelledError, ReplicatorError } from '@/domain/errors/ReplicatorError';

interface PendingReceive {
  resolve(text: string): void;
  reject(error: Error): void;
}

/**
 * インフラ層: ws のソケットを pull 型の受信に変換する接続
 *
 * ws はイベントでフレームを押し込んでくるので、receive が保留されていない間に届いた
 * フレームは到着順にバッファする。切断後もバッファ済みのフレームを先に返す。
 */
export class WsDepthConnection implements DepthStreamConnection {
  private readonly buffered: string[] = [];
  private waiter: PendingReceive | null = null;
  private failure: ConnectionError | null = null;

  constructor(
    private readonly socket: WebSocket,
    private readonly url: string
  ) {
    socket.on('message', (data: RawData) => {
      this.deliver(toText(data));
    });

    socket.on('close', (code: number, reason: Buffer) => {
      const detail = reason.length > 0 ? `${code}: ${reason.toString('utf-8')}` : String(code);
      this.fail(new ConnectionError(`socket closed (${detail})`, this.url));
    });

    socket.on('error', (error: Error) => {
      this.fail(new ConnectionError(`socket error: ${error.message}`, this.url, { cause: error }));
    });
  }

  receive(signal: AbortSignal): Promise<string> {
    if (signal.aborted) {
      return Promise.reject(new ReceiveCancelledError());
    }
    const next = this.buffered.shift();
    if (next !== undefined) {
      return Promise.resolve(next);
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    if (this.waiter) {
      return Promise.reject(new ReplicatorError(`a receive is already pending on ${this.url}`));
    }

    return new Promise<string>((resolve, reject) => {
      const onAbort = () => {
        this.waiter = null;
        reject(new ReceiveCancelledError());
      };
      signal.addEventListener('abort', onAbort, { once: true });
      this.waiter = {
        resolve: (text) => {
          signal.removeEventListener('abort', onAbort);
          resolve(text);
        },
        reject: (error) => {
          signal.removeEventListener('abort', onAbort);
          reject(error);
        },
      };
    });
  }

  close(): void {
    // リスナーは外さない（close 後に届く error イベントを未処理にしないため）
    if (this.socket.readyState === WebSocket.CLOSING || this.socket.readyState === WebSocket.CLOSED) {
      return;
    }
    this.socket.close();
  }

  private deliver(text: string): void {
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      waiter.resolve(text);
      return;
    }
    this.buffered.push(text);
  }

  private fail(error: ConnectionError): void {
    if (this.failure) {
      return;
    }
    this.failure = error;
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      waiter.reject(error);
    }
  }
}

function toText(data: RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf-8');
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString('utf-8');
  }
  return data.toString('utf-8');
}
