import { afterEach, describe, expect, it } from 'vitest';
import { decodeJson, decodeJsonFlat, encodeJson } from '../codec/json.js';
import { configure, resetConfig } from '../config.js';
import { DuplicateKeyError, StructuralFormatError } from '../errors.js';
import { type LogEntry, onLog, setLogLevel } from '../logger.js';
import { CompositeRecord } from '../record/composite_record.js';
import { Grid } from '../record/grid.js';
import { RowList } from '../record/row_list.js';
import { ScalarRecord } from '../record/scalar_record.js';

describe('JSON Codec — Decode', () => {
  it('reads literals as text and arrays of scalars as lists', () => {
    const rec = decodeJson('{"x":1,"y":[1,2]}');
    expect(rec.getString('x')).toBe('1');
    expect(rec.getList('y')).toEqual(['1', '2']);
    expect(encodeJson(rec)).toBe('{"x":"1","y":["1","2"]}');
  });

  it('tolerates blanks around members and elements', () => {
    const rec = decodeJson('{ "x" : 1 ,\n  "y" : [ 1 , 2 ] }');
    expect(rec.toObject()).toEqual({ x: '1' });
    expect(rec.getList('y')).toEqual(['1', '2']);
  });

  it('keeps the literal null apart from the string "null"', () => {
    const rec = decodeJson('{"a":null,"b":"null","c":true}');
    expect(rec.toObject()).toEqual({ a: null, b: 'null', c: 'true' });
  });

  it('unescapes string contents', () => {
    const rec = decodeJson('{"s":"a\\/b\\n\\"c\\""}');
    expect(rec.getString('s')).toBe('a/b\n"c"');
    expect(encodeJson(rec)).toBe('{"s":"a\\/b\\n\\"c\\""}');
  });

  it('reads arrays of objects as row lists and arrays of arrays as grids', () => {
    const text = '{"r":[{"a":"1","b":null},{"a":"2"}],"g":[["x",null],["y"]]}';
    const rec = decodeJson(text);

    const rows = rec.getRows('r');
    expect(rows.size).toBe(2);
    expect(rows.get(0).toObject()).toEqual({ a: '1', b: null });
    expect(rows.get(1).toObject()).toEqual({ a: '2' });
    expect(rec.getGrid('g').toArray()).toEqual([['x', null], ['y']]);
    expect(encodeJson(rec)).toBe(text);
  });

  it('reads nested objects as nested records', () => {
    const rec = decodeJson('{"a":{"b":{"c":"1"}},"d":{"e":[1]}}');
    expect(rec.getRecord('a').getRecord('b').getString('c')).toBe('1');
    expect(rec.getRecord('d').getList('e')).toEqual(['1']);
  });

  it('reads an empty array as an empty list', () => {
    const rec = decodeJson('{"e":[]}');
    expect(rec.kindOf('e')).toBe('list');
    expect(rec.getList('e')).toEqual([]);
  });

  it('skips blank array elements', () => {
    expect(decodeJson('{"l":["a",,"b"]}').getList('l')).toEqual(['a', 'b']);
  });

  it('drops null elements from row lists and grids', () => {
    expect(decodeJson('{"r":[{"a":"1"},null]}').getRows('r').size).toBe(1);
    expect(decodeJson('{"r":[null,{"a":"1"}]}').getRows('r').get(0).toObject()).toEqual({
      a: '1',
    });
    expect(decodeJson('{"g":[["a"],null]}').getGrid('g').toArray()).toEqual([['a']]);
    expect(decodeJson('{"l":[null,"a"]}').getList('l')).toEqual([null, 'a']);
  });

  it('rejects arrays that mix element kinds', () => {
    expect(() => decodeJson('{"m":[1,{"a":"1"}]}')).toThrow(StructuralFormatError);
    expect(() => decodeJson('{"m":[[1],{"a":"1"}]}')).toThrow(StructuralFormatError);
  });

  it('rejects nesting deeper than three levels', () => {
    expect(() => decodeJson('{"a":{"b":{"c":{"d":"1"}}}}')).toThrow(StructuralFormatError);
    expect(() => decodeJson('{"r":[{"a":[1]}]}')).toThrow(StructuralFormatError);
    expect(() => decodeJson('{"g":[[[1]]]}')).toThrow(StructuralFormatError);
  });

  it('skips the reserved message keys', () => {
    const rec = decodeJson('{"a":"1","_msg":[{"type":"ERROR","id":"e"}],"_has_err":true}');
    expect(rec.allKeys()).toEqual(['a']);
    expect(rec.hasMessages()).toBe(false);
  });

  it('skips members without a key', () => {
    expect(decodeJson('{"a":"1","orphan"}').allKeys()).toEqual(['a']);
  });

  it('reads blank input as an empty record', () => {
    expect(decodeJson('  ').allKeys()).toEqual([]);
  });

  it('rejects input that is not an object', () => {
    expect(() => decodeJson('[1]')).toThrow(StructuralFormatError);
  });

  it('rejects repeated keys and keys already in the target', () => {
    expect(() => decodeJson('{"a":"1","a":"2"}')).toThrow(DuplicateKeyError);
    const target = new CompositeRecord({ a: '0' });
    expect(() => decodeJson('{"a":"1"}', target)).toThrow(DuplicateKeyError);
  });

  it('fills a supplied target', () => {
    const target = new CompositeRecord({ z: '0' });
    expect(decodeJson('{"a":"1"}', target)).toBe(target);
    expect(target.keys()).toEqual(['z', 'a']);
  });
});

describe('JSON Codec — Flat Decode', () => {
  it('reads scalar members', () => {
    expect(decodeJsonFlat('{"a":"1","b":null}').toObject()).toEqual({ a: '1', b: null });
  });

  it('rejects nested values', () => {
    expect(() => decodeJsonFlat('{"a":[1]}')).toThrow(StructuralFormatError);
    expect(() => decodeJsonFlat('{"a":{"b":"1"}}')).toThrow(StructuralFormatError);
  });
});

describe('JSON Codec — Encode', () => {
  it('writes scalars and lists in insertion order', () => {
    const rec = new CompositeRecord({ name: 'a/b', note: null });
    rec.putList('ids', ['1', '2']);
    expect(encodeJson(rec)).toBe('{"name":"a\\/b","note":null,"ids":["1","2"]}');
  });

  it('writes a flat record', () => {
    expect(encodeJson(new ScalarRecord({ a: 'x"y', b: null }))).toBe('{"a":"x\\"y","b":null}');
  });

  it('writes empty collections', () => {
    const rec = new CompositeRecord();
    rec.putList('l', []);
    rec.putRows('r', new RowList());
    rec.putGrid('g', new Grid());
    rec.putRecord('n', new CompositeRecord());
    expect(encodeJson(rec)).toBe('{"l":[],"r":[],"g":[],"n":{}}');
  });

  it('writes messages with resolved text', () => {
    const rec = new CompositeRecord({ id: '7' });
    rec.putMessage('ERROR', 'qty.range', {
      args: ['qty', '10'],
      rowList: 'lines',
      row: 2,
      item: 'qty',
    });
    rec.putMessage('INFO', 'saved');
    const catalog = { 'qty.range': '{0} must be at most {1}{2}' };

    expect(encodeJson(rec, { catalog })).toBe(
      '{"id":"7","_msg":[' +
        '{"type":"ERROR","id":"qty.range","text":"qty must be at most 10","item":"lines.qty","row":2},' +
        '{"type":"INFO","id":"saved","text":""}' +
        '],"_has_err":true}',
    );
  });

  it('writes a top-level item reference without a row', () => {
    const rec = new CompositeRecord();
    rec.putMessage('WARN', 'check', { item: 'name', args: ['a', 'b'] });
    expect(encodeJson(rec)).toBe(
      '{"_msg":[{"type":"WARN","id":"check","text":"a,b","item":"name"}],"_has_err":false}',
    );
  });

  it('writes messages of nested records inside them', () => {
    const child = new CompositeRecord({ k: 'v' });
    child.putMessage('WARN', 'w');
    const rec = new CompositeRecord();
    rec.putRecord('child', child);
    expect(encodeJson(rec)).toBe(
      '{"child":{"k":"v","_msg":[{"type":"WARN","id":"w","text":""}],"_has_err":false}}',
    );
  });

  it('drops messages on the way back in', () => {
    const rec = new CompositeRecord({ id: '7' });
    rec.putMessage('ERROR', 'e');
    const decoded = decodeJson(encodeJson(rec));
    expect(decoded.allKeys()).toEqual(['id']);
    expect(decoded.hasMessages()).toBe(false);
  });

  it('rejects records nested deeper than three levels', () => {
    const b = new CompositeRecord();
    b.putList('c', ['1']);
    const a = new CompositeRecord();
    a.putRecord('b', b);
    const top = new CompositeRecord();
    top.putRecord('a', a);
    expect(() => encodeJson(top)).toThrow(StructuralFormatError);

    const child = new CompositeRecord();
    child.putRows('r', new RowList([{ a: '1' }]));
    const parent = new CompositeRecord();
    parent.putRecord('c', child);
    expect(() => encodeJson(parent)).toThrow(StructuralFormatError);
  });
});

describe('JSON Codec — Diagnostics', () => {
  afterEach(() => {
    setLogLevel('info');
    resetConfig();
  });

  it('logs skipped members at debug level', () => {
    setLogLevel('debug');
    const entries: LogEntry[] = [];
    const off = onLog((entry) => entries.push(entry));
    decodeJson('{"a":"1","orphan"}');
    off();

    const skipped = entries.find((e) => e.message === 'json: skipped member without key');
    expect(skipped?.level).toBe('debug');
    expect(skipped?.data).toEqual({
      codec: 'json',
      reason: 'member without key',
      member: '"orphan"',
    });
  });

  it('logs dropped null rows', () => {
    setLogLevel('debug');
    const entries: LogEntry[] = [];
    const off = onLog((entry) => entries.push(entry));
    decodeJson('{"r":[{"a":"1"},null]}');
    off();

    const skipped = entries.filter((e) => e.message === 'json: skipped null row');
    expect(skipped.map((e) => e.data)).toEqual([{ codec: 'json', reason: 'null row', key: 'r' }]);
  });

  it('times decodes of long sources', () => {
    setLogLevel('debug');
    configure({ scanBufferThreshold: 1 });
    const entries: LogEntry[] = [];
    const off = onLog((entry) => entries.push(entry));
    decodeJson('{"a":"1"}');
    off();

    const timing = entries.find((e) => e.message.startsWith('json: decode: '));
    expect(timing?.data).toMatchObject({ chars: 9, keys: 1 });
  });

  it('stays quiet above debug level', () => {
    setLogLevel('info');
    const entries: LogEntry[] = [];
    const off = onLog((entry) => entries.push(entry));
    decodeJson('{"a":"1","orphan"}');
    off();
    expect(entries).toEqual([]);
  });
});
