import type { UpdateDecoder } from '@/application/interfaces/UpdateDecoder';
import {
  CURRENCY_INDEXES,
  CURRENCY_SLOTS,
  DEALING_FLAGS,
  LADDER_LEVELS,
  MARKET_STATES,
} from '@/domain/fields';
import type {
  AccountFields,
  Candle,
  ChartFields,
  FieldsByDomain,
  Ladder,
  MarketFields,
  PriceFields,
  TradeFields,
} from '@/domain/records';
import type { RawUpdate, StreamDomain, StreamUpdate } from '@/domain/types';
import { FieldReader } from './FieldReader';

function decodeMarketFields(reader: FieldReader): MarketFields {
  return {
    midOpen: reader.number('MID_OPEN'),
    high: reader.number('HIGH'),
    low: reader.number('LOW'),
    change: reader.number('CHANGE'),
    changePct: reader.number('CHANGE_PCT'),
    updateTime: reader.string('UPDATE_TIME'),
    marketDelay: reader.number('MARKET_DELAY'),
    marketState: reader.oneOf('MARKET_STATE', MARKET_STATES),
    bid: reader.number('BID'),
    offer: reader.number('OFFER'),
  };
}

/**
 * BIDPRICE1..5 のようなレベル付きフィールドをまとめて読む
 */
function readLadder(reader: FieldReader, prefix: string): Ladder {
  return LADDER_LEVELS.map((level) => reader.number(`${prefix}${level}`));
}

function decodePriceFields(reader: FieldReader): PriceFields {
  return {
    midOpen: reader.number('MID_OPEN'),
    high: reader.number('HIGH'),
    low: reader.number('LOW'),
    bidQuoteId: reader.string('BIDQUOTEID'),
    askQuoteId: reader.string('ASKQUOTEID'),
    bidPrices: readLadder(reader, 'BIDPRICE'),
    askPrices: readLadder(reader, 'ASKPRICE'),
    bidSizes: readLadder(reader, 'BIDSIZE'),
    askSizes: readLadder(reader, 'ASKSIZE'),
    currencies: CURRENCY_INDEXES.map((index) => reader.string(`CURRENCY${index}`)),
    currencyBidSizes: CURRENCY_SLOTS.map((slot) => readLadder(reader, `C${slot}BIDSIZE`)),
    currencyAskSizes: CURRENCY_SLOTS.map((slot) => readLadder(reader, `C${slot}ASKSIZE`)),
    timestamp: reader.timestamp('TIMESTAMP'),
    dealingFlag: reader.oneOf('DLG_FLAG', DEALING_FLAGS),
  };
}

function decodeTradeFields(reader: FieldReader): TradeFields {
  return {
    confirms: reader.string('CONFIRMS'),
    openPositionUpdate: reader.string('OPU'),
    workingOrderUpdate: reader.string('WOU'),
  };
}

function decodeAccountFields(reader: FieldReader): AccountFields {
  return {
    pnl: reader.number('PNL'),
    deposit: reader.number('DEPOSIT'),
    availableCash: reader.number('AVAILABLE_CASH'),
    pnlLr: reader.number('PNL_LR'),
    pnlNlr: reader.number('PNL_NLR'),
    funds: reader.number('FUNDS'),
    margin: reader.number('MARGIN'),
    marginLr: reader.number('MARGIN_LR'),
    marginNlr: reader.number('MARGIN_NLR'),
    availableToDeal: reader.number('AVAILABLE_TO_DEAL'),
    equity: reader.number('EQUITY'),
    equityUsed: reader.number('EQUITY_USED'),
  };
}

function readCandle(reader: FieldReader, prefix: 'OFR' | 'BID' | 'LTP'): Candle {
  return {
    open: reader.number(`${prefix}_OPEN`),
    high: reader.number(`${prefix}_HIGH`),
    low: reader.number(`${prefix}_LOW`),
    close: reader.number(`${prefix}_CLOSE`),
  };
}

function decodeChartFields(reader: FieldReader): ChartFields {
  return {
    lastTradedVolume: reader.number('LTV'),
    incrementalTradingVolume: reader.number('TTV'),
    updateTime: reader.timestamp('UTM'),
    dayOpenMid: reader.number('DAY_OPEN_MID'),
    dayNetChangeMid: reader.number('DAY_NET_CHG_MID'),
    dayPercentChangeMid: reader.number('DAY_PERC_CHG_MID'),
    dayHigh: reader.number('DAY_HIGH'),
    dayLow: reader.number('DAY_LOW'),
    offerCandle: readCandle(reader, 'OFR'),
    bidCandle: readCandle(reader, 'BID'),
    lastTradedCandle: readCandle(reader, 'LTP'),
    candleEnd: reader.number('CONS_END'),
    candleTickCount: reader.number('CONS_TICK_COUNT'),
    bid: reader.number('BID'),
    offer: reader.number('OFR'),
    lastTraded: reader.number('LTP'),
  };
}

const FIELD_DECODERS: { [D in StreamDomain]: (reader: FieldReader) => FieldsByDomain[D] } = {
  market: decodeMarketFields,
  price: decodePriceFields,
  trade: decodeTradeFields,
  account: decodeAccountFields,
  chart: decodeChartFields,
};

/**
 * インフラ層: 未デコード更新 → 型付きレコードへの変換（純粋関数のみ、I/O なし）
 *
 * 責務: 全フィールドと変化フィールドの両方を同じデコーダーで変換する。
 * 変化していないフィールドは changedFields 側で null になる。
 */
export class StreamingUpdateDecoder implements UpdateDecoder {
  decode<D extends StreamDomain>(domain: D, raw: RawUpdate): StreamUpdate<FieldsByDomain[D]> {
    const decodeFields = FIELD_DECODERS[domain];
    return {
      itemName: raw.itemName,
      itemPos: raw.itemPos,
      fields: decodeFields(new FieldReader(raw.fields)),
      changedFields: decodeFields(new FieldReader(raw.changedFields)),
      isSnapshot: raw.isSnapshot,
    };
  }
}
