import { describe, expect, it } from 'vitest';
import { DecodeError } from '@/domain/errors';
import { DEALING_FLAGS } from '@/domain/fields';
import { FieldReader } from '@/infra/codec/FieldReader';

/**
 * 単体テスト: FieldReader
 *
 * 優先度1: 純粋関数
 * - 数値: 欠損・空文字は null、数値でなければ InvalidNumber
 * - 文字列: 空文字はそのまま
 * - 列挙: 既知トークンのみ、未知は UnknownEnumValue
 */
describe('FieldReader', () => {
  describe('number()', () => {
    it('数値文字列をそのままの値に変換する', () => {
      const reader = new FieldReader({ BID: '100.5', OFFER: '-0.25', HIGH: '1e3', LOW: '.5' });

      expect(reader.number('BID')).toBe(100.5);
      expect(reader.number('OFFER')).toBe(-0.25);
      expect(reader.number('HIGH')).toBe(1000);
      expect(reader.number('LOW')).toBe(0.5);
    });

    it('空文字・null・欠損は 0 ではなく null になる', () => {
      const reader = new FieldReader({ BID: '', OFFER: null });

      expect(reader.number('BID')).toBeNull();
      expect(reader.number('OFFER')).toBeNull();
      expect(reader.number('HIGH')).toBeNull();
    });

    it.each(['abc', '1,5', ' 1.5', '0x10', 'NaN', 'Infinity', '1e400'])(
      '"%s" は InvalidNumber になる',
      (value) => {
        const reader = new FieldReader({ BID: value });

        expect(() => reader.number('BID')).toThrow(DecodeError);
        try {
          reader.number('BID');
        } catch (error) {
          expect(error).toMatchObject({ kind: 'InvalidNumber', field: 'BID', value });
        }
      }
    );
  });

  describe('string()', () => {
    it('空文字は null にせずそのまま返す', () => {
      const reader = new FieldReader({ BIDQUOTEID: '' });

      expect(reader.string('BIDQUOTEID')).toBe('');
    });

    it('欠損は null', () => {
      expect(new FieldReader({}).string('BIDQUOTEID')).toBeNull();
    });
  });

  describe('timestamp()', () => {
    it('エポックミリ秒を Date に変換する', () => {
      const reader = new FieldReader({ TIMESTAMP: '1700000000000' });

      expect(reader.timestamp('TIMESTAMP')).toEqual(new Date(1700000000000));
    });

    it('空文字は null、数値でなければ InvalidNumber', () => {
      expect(new FieldReader({ TIMESTAMP: '' }).timestamp('TIMESTAMP')).toBeNull();
      expect(() => new FieldReader({ TIMESTAMP: '12:00:00' }).timestamp('TIMESTAMP')).toThrow(
        'Failed to parse TIMESTAMP as number: 12:00:00'
      );
    });
  });

  describe('oneOf()', () => {
    it.each(DEALING_FLAGS)('既知トークン %s はそのまま返す', (flag) => {
      const reader = new FieldReader({ DLG_FLAG: flag });

      expect(reader.oneOf('DLG_FLAG', DEALING_FLAGS)).toBe(flag);
    });

    it('大文字小文字が違うだけでも未知トークン扱いになる', () => {
      const reader = new FieldReader({ DLG_FLAG: 'deal' });

      expect(() => reader.oneOf('DLG_FLAG', DEALING_FLAGS)).toThrow(
        new DecodeError('UnknownEnumValue', 'DLG_FLAG', 'deal')
      );
    });

    it('未知トークンは既定値に落とさずエラーになる', () => {
      const reader = new FieldReader({ DLG_FLAG: 'HALTED' });

      expect(() => reader.oneOf('DLG_FLAG', DEALING_FLAGS)).toThrow('Unknown value for DLG_FLAG: HALTED');
    });

    it('空文字・欠損は null', () => {
      expect(new FieldReader({ DLG_FLAG: '' }).oneOf('DLG_FLAG', DEALING_FLAGS)).toBeNull();
      expect(new FieldReader({}).oneOf('DLG_FLAG', DEALING_FLAGS)).toBeNull();
    });
  });
});
