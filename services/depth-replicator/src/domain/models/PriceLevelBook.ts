import type Decimal from 'decimal.js';
import { BookInvariantError } from '@/domain/errors/ReplicatorError';
import type { BookSide, PriceLevel } from './DepthFrame';

/**
 * 公開用の板表現。価格・数量は指数表記を含まない10進文字列。
 */
export interface BookLevels {
  /** 価格の降順 */
  bids: Array<[string, string]>;
  /** 価格の昇順 */
  asks: Array<[string, string]>;
}

/**
 * 読み取り専用の板ビュー（コンシューマーに渡す）。
 */
export interface ReadonlyPriceLevelBook {
  readonly size: { bids: number; asks: number };
  isEmpty(): boolean;
  bids(depth?: number): PriceLevel[];
  asks(depth?: number): PriceLevel[];
  bestBid(): PriceLevel | null;
  bestAsk(): PriceLevel | null;
  spread(): Decimal | null;
  toJSON(depth?: number): BookLevels;
}

/**
 * ドメイン層: シンボルごとの価格レベル板
 *
 * 責務: price → qty の対応を bids / asks ごとに保持し、差分をマージする。
 * - 数量 0 以下のレベルはキーとして保持しない
 * - 価格キーは正規化する（'101.0' と '101' は同じレベル）
 * - 並び替えは読み出し時に行う
 * - bestBid < bestAsk はここでは強制しない（交差した板は下流で検知する）
 */
export class PriceLevelBook implements ReadonlyPriceLevelBook {
  private readonly bidLevels = new Map<string, PriceLevel>();
  private readonly askLevels = new Map<string, PriceLevel>();

  get size(): { bids: number; asks: number } {
    return { bids: this.bidLevels.size, asks: this.askLevels.size };
  }

  isEmpty(): boolean {
    return this.bidLevels.size === 0 && this.askLevels.size === 0;
  }

  /**
   * スナップショットで板を初期化する。両側が空のときだけ呼べる。
   * @throws {BookInvariantError} 板が空でない場合
   */
  applySnapshot(bids: readonly PriceLevel[], asks: readonly PriceLevel[]): void {
    if (!this.isEmpty()) {
      throw new BookInvariantError(
        `applySnapshot on a non-empty book (bids=${this.bidLevels.size}, asks=${this.askLevels.size})`
      );
    }
    for (const level of bids) {
      this.applyDelta('bid', level.price, level.qty);
    }
    for (const level of asks) {
      this.applyDelta('ask', level.price, level.qty);
    }
  }

  /**
   * 差分を1件適用する。
   * qty > 0 なら挿入または置き換え、qty <= 0 なら削除（存在しなければ何もしない）。
   */
  applyDelta(side: BookSide, price: Decimal, qty: Decimal): void {
    const levels = this.levelsOf(side);
    const key = price.toString();
    if (qty.greaterThan(0)) {
      levels.set(key, { price, qty });
    } else {
      // 手元の板に無いレベルの削除通知は取引所の仕様上あり得るので正常系
      levels.delete(key);
    }
  }

  bids(depth?: number): PriceLevel[] {
    return this.sorted(this.bidLevels, (a, b) => b.price.comparedTo(a.price), depth);
  }

  asks(depth?: number): PriceLevel[] {
    return this.sorted(this.askLevels, (a, b) => a.price.comparedTo(b.price), depth);
  }

  bestBid(): PriceLevel | null {
    let best: PriceLevel | null = null;
    for (const level of this.bidLevels.values()) {
      if (best === null || level.price.greaterThan(best.price)) {
        best = level;
      }
    }
    return best;
  }

  bestAsk(): PriceLevel | null {
    let best: PriceLevel | null = null;
    for (const level of this.askLevels.values()) {
      if (best === null || level.price.lessThan(best.price)) {
        best = level;
      }
    }
    return best;
  }

  /**
   * bestAsk - bestBid。片側でも空なら null。
   */
  spread(): Decimal | null {
    const bid = this.bestBid();
    const ask = this.bestAsk();
    if (bid === null || ask === null) {
      return null;
    }
    return ask.price.minus(bid.price);
  }

  /**
   * セッション終了時に板を破棄する。
   */
  clear(): void {
    this.bidLevels.clear();
    this.askLevels.clear();
  }

  toJSON(depth?: number): BookLevels {
    const encode = (level: PriceLevel): [string, string] => [level.price.toFixed(), level.qty.toFixed()];
    return {
      bids: this.bids(depth).map(encode),
      asks: this.asks(depth).map(encode),
    };
  }

  private levelsOf(side: BookSide): Map<string, PriceLevel> {
    return side === 'bid' ? this.bidLevels : this.askLevels;
  }

  private sorted(
    levels: Map<string, PriceLevel>,
    compare: (a: PriceLevel, b: PriceLevel) => number,
    depth?: number
  ): PriceLevel[] {
    const result = [...levels.values()].sort(compare);
    return depth === undefined ? result : result.slice(0, depth);
  }
}
