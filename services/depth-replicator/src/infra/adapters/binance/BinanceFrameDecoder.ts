import type { FrameDecoder } from '@/application/interfaces/FrameDecoder';
import { MalformedFrameError } from '@/domain/errors/ReplicatorError';
import type { ReceivedFrame } from '@/domain/models/DepthFrame';
import type { MarketKind } from '@/domain/models/MarketKind';
import { parseLevels } from './levels';

/** Date が表現できるエポックミリ秒の上限 */
const MAX_EPOCH_MS = 8.64e15;

/**
 * インフラ層: Binance の depth ストリームのフレームを解釈する
 *
 * - 現物: `{ e: 'depthUpdate', E, s, U, u, b, a }`
 * - デリバティブ: `{ stream, data: { e: 'depthUpdate', E, s, U, u, pu, b, a } }`
 *
 * depthUpdate 以外（購読応答など）は kind: 'other' として返す。
 */
export class BinanceFrameDecoder implements FrameDecoder {
  decode(raw: string, marketKind: MarketKind): ReceivedFrame {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      throw new MalformedFrameError('not valid JSON', raw);
    }
    if (!isRecord(parsed)) {
      throw new MalformedFrameError('frame is not an object', raw);
    }

    // デリバティブはエンベロープを1段外す
    let payload = parsed;
    if (marketKind === 'derivative') {
      const data = parsed.data;
      if (!isRecord(data)) {
        throw new MalformedFrameError('derivative frame has no data envelope', raw);
      }
      payload = data;
    }

    if (payload.e !== 'depthUpdate') {
      return { kind: 'other', payload };
    }

    const { E: eventTime, s: symbol } = payload;
    if (typeof eventTime !== 'number') {
      throw new MalformedFrameError('depthUpdate has no event time', raw);
    }
    if (!Number.isSafeInteger(eventTime) || Math.abs(eventTime) > MAX_EPOCH_MS) {
      throw new MalformedFrameError(`depthUpdate event time ${eventTime} is out of range`, raw);
    }
    if (typeof symbol !== 'string' || symbol === '') {
      throw new MalformedFrameError('depthUpdate has no symbol', raw);
    }

    const asks = parseLevels(payload.a, 'a');
    if (!asks.ok) {
      throw new MalformedFrameError(asks.reason, raw);
    }
    const bids = parseLevels(payload.b, 'b');
    if (!bids.ok) {
      throw new MalformedFrameError(bids.reason, raw);
    }

    return {
      kind: 'depthUpdate',
      payload,
      event: {
        eventTime,
        symbol,
        firstUpdateId: optionalNumber(payload.U),
        finalUpdateId: optionalNumber(payload.u),
        asks: asks.levels,
        bids: bids.levels,
      },
    };
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalNumber(value: unknown): number | null {
  return typeof value === 'number' ? value : null;
}
