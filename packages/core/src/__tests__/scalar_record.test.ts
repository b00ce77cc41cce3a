import { describe, expect, it } from 'vitest';
import {
  DuplicateKeyError,
  KeyFormatError,
  NotFoundError,
  ReadOnlyRecordError,
  ValueFormatError,
} from '../errors.js';
import { ScalarRecord, toScalarText } from '../record/scalar_record.js';

describe('ScalarRecord — Typed Key/Value Map', () => {
  describe('missing keys', () => {
    it('raises NotFoundError without a default and returns the default with one', () => {
      const rec = new ScalarRecord({ a: '1' });
      expect(() => rec.getString('missing')).toThrow(NotFoundError);
      expect(rec.getStringOrDefault('missing', 'fallback')).toBe('fallback');
      expect(() => rec.getInt('missing')).toThrow(NotFoundError);
      expect(rec.getIntOrDefault('missing', 7)).toBe(7);
    });

    it('returns the stored value, not the default, when the key exists', () => {
      const rec = new ScalarRecord({ a: '', n: null });
      expect(rec.getStringOrDefault('a', 'fallback')).toBe('');
      expect(rec.getDecimalOrNullDefault('n', 5)).toBeNull();
      expect(rec.getBooleanOrDefault('a', true)).toBe(false);
    });
  });

  describe('writes', () => {
    it('refuses to overwrite with put', () => {
      const rec = new ScalarRecord();
      rec.put('a', '1');
      expect(() => rec.put('a', '2')).toThrow(DuplicateKeyError);
      expect(rec.getString('a')).toBe('1');
    });

    it('replaces in place with putForce and returns the prior value', () => {
      const rec = new ScalarRecord({ a: '1', b: '2' });
      expect(rec.putForce('a', '9')).toBe('1');
      expect(rec.putForce('c', '3')).toBeUndefined();
      expect(rec.keys()).toEqual(['a', 'b', 'c']);
      expect(rec.toString()).toBe('{a=9,b=2,c=3}');
    });

    it('rejects invalid keys', () => {
      const rec = new ScalarRecord();
      expect(() => rec.put('Name', 'x')).toThrow(KeyFormatError);
      expect(() => rec.put('', 'x')).toThrow(KeyFormatError);
    });

    it('stores typed inputs as canonical text', () => {
      const rec = new ScalarRecord();
      rec.put('n', 1.5);
      rec.put('big', 9007199254740993n);
      rec.put('flag', false);
      rec.put('d', { year: 2024, month: 1, day: 5 });
      const time = { hour: 13, minute: 0, second: 9, microsecond: 1 };
      rec.put('t', { year: 2024, month: 1, day: 5, ...time });
      rec.putNull('z');
      expect(rec.toObject()).toEqual({
        n: '1.5',
        big: '9007199254740993',
        flag: 'false',
        d: '20240105',
        t: '20240105T130009000001',
        z: null,
      });
    });

    it('removes scalars', () => {
      const rec = new ScalarRecord({ a: '1' });
      expect(rec.remove('a')).toBe('1');
      expect(rec.remove('a')).toBeUndefined();
      expect(rec.size).toBe(0);
    });

    it('merges with putAll and putAllForce', () => {
      const rec = new ScalarRecord({ a: '1' });
      expect(() => rec.putAll({ a: '2' })).toThrow(DuplicateKeyError);
      rec.putAllForce([
        ['a', '2'],
        ['b', null],
      ]);
      expect(rec.toObject()).toEqual({ a: '2', b: null });
    });
  });

  describe('typed reads', () => {
    const rec = new ScalarRecord({
      qty: '12',
      price: '3.25',
      frac: '1.5',
      blank: ' ',
      nil: null,
      yes: 'YES',
      day: '20240105',
      bad: 'abc',
      huge: '1e400',
    });

    it('reads numbers', () => {
      expect(rec.getInt('qty')).toBe(12);
      expect(rec.getLong('qty')).toBe(12n);
      expect(rec.getDecimal('price')).toBe(3.25);
    });

    it('reads blank and null as zero or null', () => {
      expect(rec.getInt('blank')).toBe(0);
      expect(rec.getLong('nil')).toBe(0n);
      expect(rec.getDecimal('nil')).toBe(0);
      expect(rec.getDecimalOrNull('blank')).toBeNull();
      expect(rec.getDateOrNull('nil')).toBeNull();
      expect(rec.getString('nil')).toBe('');
      expect(rec.getStringOrNull('nil')).toBeNull();
    });

    it('rejects fractions and non-numeric text', () => {
      expect(() => rec.getInt('frac')).toThrow(ValueFormatError);
      expect(() => rec.getDecimal('bad')).toThrow(ValueFormatError);
      expect(() => rec.getDecimal('huge')).toThrow(ValueFormatError);
      expect(() => rec.getDateOrNull('bad')).toThrow(ValueFormatError);
    });

    it('reads booleans and dates', () => {
      expect(rec.getBoolean('yes')).toBe(true);
      expect(rec.getBoolean('qty')).toBe(false);
      expect(rec.getDateOrNull('day')).toEqual({ year: 2024, month: 1, day: 5 });
    });
  });

  describe('copies and freeze', () => {
    it('copies another record independently', () => {
      const source = new ScalarRecord({ a: '1' });
      const copy = new ScalarRecord(source);
      copy.putForce('a', '2');
      expect(source.getString('a')).toBe('1');
    });

    it('freezes into a read-only copy', () => {
      const rec = new ScalarRecord({ a: '1' });
      const frozen = rec.freeze();
      expect(frozen.isReadOnly).toBe(true);
      expect(frozen.getString('a')).toBe('1');
      expect(() => frozen.put('b', '2')).toThrow(ReadOnlyRecordError);
      expect(() => frozen.remove('a')).toThrow(ReadOnlyRecordError);
      rec.put('b', '2');
      expect(rec.isReadOnly).toBe(false);
      expect(frozen.has('b')).toBe(false);
    });
  });

  describe('toScalarText', () => {
    it('keeps strings and null unchanged', () => {
      expect(toScalarText('k', ' x ')).toBe(' x ');
      expect(toScalarText('k', null)).toBeNull();
    });

    it('rejects non-finite numbers', () => {
      expect(() => toScalarText('k', Number.NaN)).toThrow(ValueFormatError);
    });
  });
});
