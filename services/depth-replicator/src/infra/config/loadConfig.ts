import { ReplicatorError } from '@/domain/errors/ReplicatorError';
import { type MarketKind, type StreamTarget, inferMarketKind } from '@/domain/models/MarketKind';
import { type BinanceEndpointUrls, DEFAULT_BINANCE_URLS } from '@/infra/adapters/binance/BinanceEndpoints';

/**
 * 環境変数の不足・不正
 */
export class ConfigError extends ReplicatorError {
  constructor(
    readonly variable: string,
    message: string
  ) {
    super(`${variable}: ${message}`);
    this.name = 'ConfigError';
  }
}

/**
 * 起動設定
 */
export interface ReplicatorConfig {
  targets: StreamTarget[];
  redisUrl: string;
  depthLimit: number;
  pacingMs: number;
  snapshotTimeoutMs: number;
  /** 配信する板の片側あたりのレベル数。未指定なら全レベル */
  publishDepth: number | undefined;
  /** 未指定なら /metrics を公開しない */
  metricsPort: number | undefined;
  urls: BinanceEndpointUrls;
}

type Env = Record<string, string | undefined>;

const MARKET_PREFIXES = new Map<string, MarketKind>([
  ['spot', 'spot'],
  ['perp', 'derivative'],
]);

/**
 * 環境変数から起動設定を組み立てる。
 * @throws {ConfigError} 必須項目の不足、または値が不正な場合
 */
export function loadConfig(env: Env): ReplicatorConfig {
  return {
    targets: parseTargets(requireEnv(env, 'SYMBOLS')),
    redisUrl: requireEnv(env, 'REDIS_URL'),
    depthLimit: readInteger(env, 'DEPTH_LIMIT', 1000, 1),
    pacingMs: readInteger(env, 'PACING_MS', 100, 0),
    snapshotTimeoutMs: readInteger(env, 'SNAPSHOT_TIMEOUT_MS', 10_000, 1),
    publishDepth: readOptionalInteger(env, 'PUBLISH_DEPTH', 1),
    metricsPort: readOptionalInteger(env, 'METRICS_PORT', 1, 65_535),
    urls: {
      spotRest: readUrl(env, 'SPOT_REST_URL', DEFAULT_BINANCE_URLS.spotRest),
      derivativeRest: readUrl(env, 'DERIVATIVE_REST_URL', DEFAULT_BINANCE_URLS.derivativeRest),
      spotStream: readUrl(env, 'SPOT_STREAM_URL', DEFAULT_BINANCE_URLS.spotStream),
      derivativeStream: readUrl(env, 'DERIVATIVE_STREAM_URL', DEFAULT_BINANCE_URLS.derivativeStream),
    },
  };
}

/**
 * SYMBOLS（カンマ区切り）を購読対象に変換する。
 * `spot:` / `perp:` の接頭辞で市場種別を明示でき、無ければシンボル名から推定する。
 * 重複はここでは除かない（レジストリで排除される）。
 */
export function parseTargets(value: string): StreamTarget[] {
  const entries = value
    .split(',')
    .map((entry) => entry.trim())
    .filter(Boolean);
  if (entries.length === 0) {
    throw new ConfigError('SYMBOLS', 'no symbols configured');
  }

  return entries.map((entry) => {
    const separator = entry.indexOf(':');
    if (separator === -1) {
      const symbol = entry.toUpperCase();
      return { symbol, marketKind: inferMarketKind(symbol) };
    }

    const prefix = entry.slice(0, separator).toLowerCase();
    const symbol = entry.slice(separator + 1).trim().toUpperCase();
    const marketKind = MARKET_PREFIXES.get(prefix);
    if (marketKind === undefined) {
      throw new ConfigError('SYMBOLS', `unknown market prefix "${prefix}" in "${entry}"`);
    }
    if (symbol === '') {
      throw new ConfigError('SYMBOLS', `missing symbol in "${entry}"`);
    }
    return { symbol, marketKind };
  });
}

function requireEnv(env: Env, key: string): string {
  const value = env[key]?.trim();
  if (!value) {
    throw new ConfigError(key, 'missing required environment variable');
  }
  return value;
}

function readInteger(env: Env, key: string, fallback: number, min: number): number {
  return readOptionalInteger(env, key, min) ?? fallback;
}

function readOptionalInteger(
  env: Env,
  key: string,
  min: number,
  max: number = Number.MAX_SAFE_INTEGER
): number | undefined {
  const raw = env[key]?.trim();
  if (!raw) {
    return undefined;
  }
  if (!/^\d+$/.test(raw)) {
    throw new ConfigError(key, `expected an integer, got "${raw}"`);
  }
  const value = Number(raw);
  if (value < min || value > max) {
    throw new ConfigError(key, `must be between ${min} and ${max}, got ${value}`);
  }
  return value;
}

function readUrl(env: Env, key: string, fallback: string): string {
  const raw = env[key]?.trim();
  if (!raw) {
    return fallback;
  }
  if (!URL.canParse(raw)) {
    throw new ConfigError(key, `not a valid URL: "${raw}"`);
  }
  return raw.replace(/\/+$/, '');
}
