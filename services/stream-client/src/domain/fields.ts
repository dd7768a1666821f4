/**
 * ドメイン層: ワイヤー上のフィールド名と列挙トークン
 *
 * フィールド名・トークンはブローカー側の定義そのまま（大文字小文字を区別する）。
 */

// ---- market ----

export const MARKET_FIELDS = [
  'MID_OPEN',
  'HIGH',
  'LOW',
  'CHANGE',
  'CHANGE_PCT',
  'UPDATE_TIME',
  'MARKET_DELAY',
  'MARKET_STATE',
  'BID',
  'OFFER',
] as const;
export type MarketField = (typeof MARKET_FIELDS)[number];

export const MARKET_STATES = [
  'CLOSED',
  'OFFLINE',
  'TRADEABLE',
  'EDIT',
  'AUCTION',
  'AUCTION_NO_EDIT',
  'SUSPENDED',
] as const;
export type MarketState = (typeof MARKET_STATES)[number];

// ---- price ladder ----

export const LADDER_LEVELS = [1, 2, 3, 4, 5] as const;
export type LadderLevel = (typeof LADDER_LEVELS)[number];

/** C1..C5 の通貨別ラダー */
export const CURRENCY_SLOTS = [1, 2, 3, 4, 5] as const;
export type CurrencySlot = (typeof CURRENCY_SLOTS)[number];

/** CURRENCY0 は基準通貨 */
export const CURRENCY_INDEXES = [0, 1, 2, 3, 4, 5] as const;

export type PriceField =
  | 'MID_OPEN'
  | 'HIGH'
  | 'LOW'
  | 'BIDQUOTEID'
  | 'ASKQUOTEID'
  | `BIDPRICE${LadderLevel}`
  | `ASKPRICE${LadderLevel}`
  | `BIDSIZE${LadderLevel}`
  | `ASKSIZE${LadderLevel}`
  | `CURRENCY${(typeof CURRENCY_INDEXES)[number]}`
  | `C${CurrencySlot}BIDSIZE${LadderLevel}`
  | `C${CurrencySlot}ASKSIZE${LadderLevel}`
  | 'TIMESTAMP'
  | 'DLG_FLAG';

export const PRICE_FIELDS: readonly PriceField[] = [
  'MID_OPEN',
  'HIGH',
  'LOW',
  'BIDQUOTEID',
  'ASKQUOTEID',
  ...LADDER_LEVELS.map((level) => `BIDPRICE${level}` as const),
  ...LADDER_LEVELS.map((level) => `ASKPRICE${level}` as const),
  ...LADDER_LEVELS.map((level) => `BIDSIZE${level}` as const),
  ...LADDER_LEVELS.map((level) => `ASKSIZE${level}` as const),
  ...CURRENCY_INDEXES.map((index) => `CURRENCY${index}` as const),
  ...CURRENCY_SLOTS.flatMap((slot) => LADDER_LEVELS.map((level) => `C${slot}BIDSIZE${level}` as const)),
  ...CURRENCY_SLOTS.flatMap((slot) => LADDER_LEVELS.map((level) => `C${slot}ASKSIZE${level}` as const)),
  'TIMESTAMP',
  'DLG_FLAG',
];

/** 価格ラダーの取引可否フラグ */
export const DEALING_FLAGS = [
  'CLOSED',
  'CALL',
  'DEAL',
  'EDIT',
  'CLOSINGONLY',
  'DEALNOEDIT',
  'AUCTION',
  'AUCTIONNOEDIT',
  'SUSPEND',
] as const;
export type DealingFlag = (typeof DEALING_FLAGS)[number];

// ---- trade ----

/** 取引イベントは固定フィールド（確認・ポジション更新・注文更新） */
export const TRADE_FIELDS = ['CONFIRMS', 'OPU', 'WOU'] as const;
export type TradeField = (typeof TRADE_FIELDS)[number];

// ---- account ----

export const ACCOUNT_FIELDS = [
  'PNL',
  'DEPOSIT',
  'AVAILABLE_CASH',
  'PNL_LR',
  'PNL_NLR',
  'FUNDS',
  'MARGIN',
  'MARGIN_LR',
  'MARGIN_NLR',
  'AVAILABLE_TO_DEAL',
  'EQUITY',
  'EQUITY_USED',
] as const;
export type AccountField = (typeof ACCOUNT_FIELDS)[number];

// ---- chart ----

export const CHART_SCALES = ['TICK', 'SECOND', '1MINUTE', '5MINUTE', 'HOUR'] as const;
export type ChartScale = (typeof CHART_SCALES)[number];

export const CHART_FIELDS = [
  'LTV',
  'TTV',
  'UTM',
  'DAY_OPEN_MID',
  'DAY_NET_CHG_MID',
  'DAY_PERC_CHG_MID',
  'DAY_HIGH',
  'DAY_LOW',
  'OFR_OPEN',
  'OFR_HIGH',
  'OFR_LOW',
  'OFR_CLOSE',
  'BID_OPEN',
  'BID_HIGH',
  'BID_LOW',
  'BID_CLOSE',
  'LTP_OPEN',
  'LTP_HIGH',
  'LTP_LOW',
  'LTP_CLOSE',
  'CONS_END',
  'CONS_TICK_COUNT',
  'BID',
  'OFR',
  'LTP',
] as const;
export type ChartField = (typeof CHART_FIELDS)[number];
