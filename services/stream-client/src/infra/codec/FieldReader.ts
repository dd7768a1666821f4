import { DecodeError } from '@/domain/errors';

/** 10進表記のみ許可（前後空白・16進・Infinity・NaN は不可） */
const NUMBER_PATTERN = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

export type FieldValues = Readonly<Record<string, string | null | undefined>>;

/**
 * インフラ層: 文字列キーのフィールドマップから意味型ごとに値を読み出す
 *
 * 責務: 数値・文字列・タイムスタンプ・列挙の 4 種の変換規則を一箇所に集める。
 * - 数値 / タイムスタンプ / 列挙: 欠損・空文字は null
 * - 文字列: 欠損のみ null（空文字はそのまま返す）
 */
export class FieldReader {
  constructor(private readonly values: FieldValues) {}

  number(field: string): number | null {
    const value = this.values[field];
    if (value === undefined || value === null || value === '') {
      return null;
    }
    const parsed = NUMBER_PATTERN.test(value) ? Number(value) : Number.NaN;
    if (!Number.isFinite(parsed)) {
      throw new DecodeError('InvalidNumber', field, value);
    }
    return parsed;
  }

  string(field: string): string | null {
    return this.values[field] ?? null;
  }

  /**
   * エポックミリ秒の文字列を Date に変換する。
   */
  timestamp(field: string): Date | null {
    const millis = this.number(field);
    return millis === null ? null : new Date(millis);
  }

  /**
   * 既知トークンとの完全一致（大文字小文字を区別）。
   * 未知のトークンは既定値に落とさずエラーにする。
   */
  oneOf<T extends string>(field: string, tokens: readonly T[]): T | null {
    const value = this.values[field];
    if (value === undefined || value === null || value === '') {
      return null;
    }
    const token = tokens.find((candidate) => candidate === value);
    if (token === undefined) {
      throw new DecodeError('UnknownEnumValue', field, value);
    }
    return token;
  }
}
