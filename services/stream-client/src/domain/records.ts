import type { DealingFlag, MarketState } from './fields';
import type { StreamUpdate } from './types';

/**
 * ドメイン層: 型付きレコード
 *
 * 値なし（欠損・空文字の数値）は null。数値の 0 で埋めることはしない。
 */

export interface MarketFields {
  midOpen: number | null;
  high: number | null;
  low: number | null;
  change: number | null;
  changePct: number | null;
  /** ブローカー現地時刻（HH:MM:SS） */
  updateTime: string | null;
  /** 遅延配信なら 1 */
  marketDelay: number | null;
  marketState: MarketState | null;
  bid: number | null;
  offer: number | null;
}

/** レベル 1..5 の順に並ぶ */
export type Ladder = readonly (number | null)[];

export interface PriceFields {
  midOpen: number | null;
  high: number | null;
  low: number | null;
  bidQuoteId: string | null;
  askQuoteId: string | null;
  bidPrices: Ladder;
  askPrices: Ladder;
  bidSizes: Ladder;
  askSizes: Ladder;
  /** CURRENCY0..5 */
  currencies: readonly (string | null)[];
  /** C1..C5 の順 */
  currencyBidSizes: readonly Ladder[];
  currencyAskSizes: readonly Ladder[];
  timestamp: Date | null;
  dealingFlag: DealingFlag | null;
}

/**
 * 取引イベント。各値は JSON 文字列のまま渡す。
 */
export interface TradeFields {
  confirms: string | null;
  openPositionUpdate: string | null;
  workingOrderUpdate: string | null;
}

export interface AccountFields {
  pnl: number | null;
  deposit: number | null;
  availableCash: number | null;
  pnlLr: number | null;
  pnlNlr: number | null;
  funds: number | null;
  margin: number | null;
  marginLr: number | null;
  marginNlr: number | null;
  availableToDeal: number | null;
  equity: number | null;
  equityUsed: number | null;
}

export interface Candle {
  open: number | null;
  high: number | null;
  low: number | null;
  close: number | null;
}

export interface ChartFields {
  /** 直近の取引量 */
  lastTradedVolume: number | null;
  /** 増分取引量 */
  incrementalTradingVolume: number | null;
  updateTime: Date | null;
  dayOpenMid: number | null;
  dayNetChangeMid: number | null;
  dayPercentChangeMid: number | null;
  dayHigh: number | null;
  dayLow: number | null;
  offerCandle: Candle;
  bidCandle: Candle;
  lastTradedCandle: Candle;
  /** ローソク足確定なら 1 */
  candleEnd: number | null;
  candleTickCount: number | null;
  /** TICK 購読時のみ */
  bid: number | null;
  offer: number | null;
  lastTraded: number | null;
}

export type MarketUpdate = StreamUpdate<MarketFields>;
export type PriceUpdate = StreamUpdate<PriceFields>;
export type TradeUpdate = StreamUpdate<TradeFields>;
export type AccountUpdate = StreamUpdate<AccountFields>;
export type ChartUpdate = StreamUpdate<ChartFields>;

/**
 * ドメイン種別ごとの型付きフィールド
 */
export interface FieldsByDomain {
  market: MarketFields;
  price: PriceFields;
  trade: TradeFields;
  account: AccountFields;
  chart: ChartFields;
}
