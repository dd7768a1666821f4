import { ConfigurationError } from '@/domain/errors';
import {
  type AccountField,
  type ChartField,
  type ChartScale,
  type MarketField,
  type PriceField,
  TRADE_FIELDS,
} from '@/domain/fields';
import type { DeliveryMode, StreamDomain, SubscriptionDescriptor } from '@/domain/types';

/** 価格ラダーのデフォルトデータアダプター */
export const DEFAULT_PRICE_DATA_ADAPTER = 'Pricing';

/**
 * ドメインごとのアイテムキー名前空間
 */
export const ITEM_NAMESPACES = {
  market: 'MARKET',
  price: 'PRICE',
  trade: 'TRADE',
  account: 'ACCOUNT',
  chart: 'CHART',
} as const satisfies Record<StreamDomain, string>;

export type SubscriptionRequest =
  | { domain: 'market'; epics: Iterable<string>; fields: Iterable<MarketField> }
  | { domain: 'price'; epics: Iterable<string>; fields: Iterable<PriceField>; dataAdapter?: string }
  | { domain: 'trade' }
  | { domain: 'account'; fields: Iterable<AccountField> }
  | { domain: 'chart'; epics: Iterable<string>; scale: ChartScale; fields: Iterable<ChartField> };

/**
 * 重複を除き、挿入順を保ったまま配列にする。
 */
function uniqueOrdered(values: Iterable<string>, label: string): string[] {
  const unique = [...new Set(values)];
  if (unique.length === 0) {
    throw new ConfigurationError(`At least one ${label} is required`);
  }
  for (const value of unique) {
    if (value === '' || /\s/.test(value)) {
      throw new ConfigurationError(`Invalid ${label}: "${value}"`);
    }
  }
  return unique;
}

function freeze(descriptor: SubscriptionDescriptor): SubscriptionDescriptor {
  return Object.freeze({
    ...descriptor,
    items: Object.freeze([...descriptor.items]),
    fields: Object.freeze([...descriptor.fields]),
  });
}

/**
 * アプリケーション層: 購読記述子の組み立て（ネットワークなしの純粋な変換）
 *
 * 責務:
 * - アイテムキーへの名前空間付与（口座スコープを含む）
 * - ドメインごとの配信モード・スナップショット・データアダプターの決定
 * - 不正な入力の同期的な拒否（ConfigurationError）
 */
export class SubscriptionBuilder {
  /**
   * @param accountId 口座 ID（price/trade/account の購読に必要）
   */
  constructor(private readonly accountId: string | null = null) {}

  build(request: SubscriptionRequest): SubscriptionDescriptor {
    switch (request.domain) {
      case 'market':
        return this.market(request.epics, request.fields);
      case 'price':
        return this.price(request.epics, request.fields, request.dataAdapter);
      case 'trade':
        return this.trade();
      case 'account':
        return this.account(request.fields);
      case 'chart':
        return this.chart(request.epics, request.scale, request.fields);
    }
  }

  market(epics: Iterable<string>, fields: Iterable<MarketField>): SubscriptionDescriptor {
    return freeze({
      domain: 'market',
      items: uniqueOrdered(epics, 'epic').map((epic) => `${ITEM_NAMESPACES.market}:${epic}`),
      fields: uniqueOrdered(fields, 'field'),
      mode: 'MERGE',
      snapshot: true,
      dataAdapter: null,
    });
  }

  price(
    epics: Iterable<string>,
    fields: Iterable<PriceField>,
    dataAdapter: string = DEFAULT_PRICE_DATA_ADAPTER
  ): SubscriptionDescriptor {
    const accountId = this.requireAccount('price');
    if (dataAdapter.trim() === '') {
      throw new ConfigurationError('Price data adapter name must not be empty');
    }
    return freeze({
      domain: 'price',
      items: uniqueOrdered(epics, 'epic').map(
        (epic) => `${ITEM_NAMESPACES.price}:${accountId}:${epic}`
      ),
      fields: uniqueOrdered(fields, 'field'),
      mode: 'MERGE',
      snapshot: true,
      dataAdapter,
    });
  }

  /**
   * 取引イベントは合体させず全件配信する（DISTINCT）。
   */
  trade(): SubscriptionDescriptor {
    const accountId = this.requireAccount('trade');
    return freeze({
      domain: 'trade',
      items: [`${ITEM_NAMESPACES.trade}:${accountId}`],
      fields: TRADE_FIELDS,
      mode: 'DISTINCT',
      snapshot: true,
      dataAdapter: null,
    });
  }

  account(fields: Iterable<AccountField>): SubscriptionDescriptor {
    const accountId = this.requireAccount('account');
    return freeze({
      domain: 'account',
      items: [`${ITEM_NAMESPACES.account}:${accountId}`],
      fields: uniqueOrdered(fields, 'field'),
      mode: 'MERGE',
      snapshot: true,
      dataAdapter: null,
    });
  }

  /**
   * TICK は全件配信、それ以外の足は最新値で合体させる。
   */
  chart(
    epics: Iterable<string>,
    scale: ChartScale,
    fields: Iterable<ChartField>
  ): SubscriptionDescriptor {
    const mode: DeliveryMode = scale === 'TICK' ? 'DISTINCT' : 'MERGE';
    return freeze({
      domain: 'chart',
      items: uniqueOrdered(epics, 'epic').map(
        (epic) => `${ITEM_NAMESPACES.chart}:${epic}:${scale}`
      ),
      fields: uniqueOrdered(fields, 'field'),
      mode,
      snapshot: true,
      dataAdapter: null,
    });
  }

  private requireAccount(domain: StreamDomain): string {
    if (this.accountId === null || this.accountId === '') {
      throw new ConfigurationError(`An account id is required for ${domain} subscriptions`);
    }
    return this.accountId;
  }
}
