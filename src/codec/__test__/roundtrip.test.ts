/**
 * 编解码整体性质：往返一致、默认值归一、repeated 顺序、示例输出
 */
import { describe, it, expect } from 'vitest';

import { decode_message } from '../decode';
import { encode_message } from '../encode';
import { node_type, repeated_type, sample_type } from './fixtures';

describe('decode(encode(m))', () => {
  it('should reproduce a message with every convertible type set', () => {
    const Sample = sample_type();
    const m = Sample.create({
      flag: true,
      ratio: 0.5,
      small: -7,
      big: 9007199254740991,
      count: 4294967295,
      total: 42,
      label: 'héllo "quoted" \\ text',
      level: 0,
      tags: ['a', 'b'],
      scores: [3, 1, 2],
      levels: [1, 0, 1],
    });

    const text = encode_message(m);
    const back = decode_message(text, Sample);
    expect(back.equals(m)).toBe(true);
    expect(encode_message(back)).toBe(text);
  });

  it('should reproduce 64-bit integers at their bounds', () => {
    const Sample = sample_type();
    const text = '{"flag": true, "label": "x", "big": -9223372036854775808, "total": 18446744073709551615}';
    const m = decode_message(text, Sample);

    expect(m.get('big')).toBe(-(2n ** 63n));
    expect(m.get('total')).toBe(2n ** 64n - 1n);
    const out = encode_message(m);
    expect(out).toBe(
      '{"flag":true,"ratio":0,"small":0,"big":-9223372036854775808,"count":0,"total":18446744073709551615,' +
        '"label":"x","level":"HIGH","tags":[],"scores":[],"levels":[]}'
    );
    expect(decode_message(out, Sample).equals(m)).toBe(true);

    const max = Sample.create({ flag: true, label: 'x', big: 2n ** 63n - 1n, total: 0n });
    expect(decode_message(encode_message(max), Sample).equals(max)).toBe(true);
  });

  it('should reproduce non-finite floats', () => {
    const Sample = sample_type();
    for (const ratio of [Number.NaN, Infinity, -Infinity]) {
      const m = Sample.create({ flag: true, label: 'x', ratio });
      expect(decode_message(encode_message(m), Sample).equals(m)).toBe(true);
    }
  });

  it('should reproduce a message that only has its required fields set', () => {
    const Sample = sample_type();
    const m = Sample.create({ flag: false, label: '' });
    expect(decode_message(encode_message(m), Sample).equals(m)).toBe(true);
  });
});

describe('default normalisation', () => {
  it('should decode an omitted defaulted field exactly like an explicit one', () => {
    const Node = node_type();
    const implicit = decode_message('{"nodeid": "n"}', Node);
    const explicit = decode_message('{"nodeid": "n", "state": "PLANNED"}', Node);

    expect(implicit.equals(explicit)).toBe(true);
    expect(implicit.has('state')).toBe(explicit.has('state'));
    expect(encode_message(implicit)).toBe(encode_message(explicit));
  });
});

describe('repeated fields', () => {
  it('should preserve element order in both directions', () => {
    const msg = decode_message('{"notes": ["a", "b"]}', repeated_type());
    expect(encode_message(msg)).toBe('{"notes":["a","b"]}');
  });
});

describe('node example', () => {
  it('should decode and re-encode in schema key order', () => {
    const Node = node_type();
    const node = decode_message('{"nodeid":"host1","state":"AVAILABLE"}', Node);
    expect(node.get('nodeid')).toBe('host1');
    expect(node.get('state')).toBe(Node.symbols.get('AVAILABLE'));
    expect(encode_message(node)).toBe('{"state":"AVAILABLE","nodeid":"host1"}');
  });
});
