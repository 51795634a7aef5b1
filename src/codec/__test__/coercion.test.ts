import { describe, it, expect } from 'vitest';

import { TYPE_MAP, is_coercible } from '../coercion';
import { from_plain } from '../../json/json_codec';
import { ProcessingError } from '../../errors';

const coerce = (type: keyof typeof TYPE_MAP, value: unknown) => TYPE_MAP[type](from_plain(value), '/x');

describe('TYPE_MAP', () => {
  it('is frozen and covers exactly the convertible scalar types', () => {
    expect(Object.isFrozen(TYPE_MAP)).toBe(true);
    expect(Object.keys(TYPE_MAP).sort()).toEqual(
      ['bool', 'enum', 'float', 'int32', 'int64', 'string', 'uint32', 'uint64']
    );
    expect(is_coercible('int32')).toBe(true);
    expect(is_coercible('double')).toBe(false);
    expect(is_coercible('bytes')).toBe(false);
    expect(is_coercible('message')).toBe(false);
  });

  it('bool', () => {
    expect(coerce('bool', true)).toBe(true);
    expect(coerce('bool', 0)).toBe(false);
    expect(coerce('bool', 2)).toBe(true);
    expect(coerce('bool', 'false')).toBe(false);
    expect(coerce('bool', 0n)).toBe(false);
    expect(() => coerce('bool', 'yes')).toThrow(ProcessingError);
    expect(() => coerce('bool', null)).toThrow(`cannot convert null at '/x' to bool`);
  });

  it('float', () => {
    expect(coerce('float', 1.5)).toBe(1.5);
    expect(coerce('float', ' 2.25 ')).toBe(2.25);
    expect(coerce('float', true)).toBe(1);
    expect(coerce('float', 'NaN')).toBeNaN();
    expect(coerce('float', '-inf')).toBe(-Infinity);
    expect(coerce('float', 'Infinity')).toBe(Infinity);
    expect(coerce('float', '1e3')).toBe(1000);
    expect(coerce('float', '-.5')).toBe(-0.5);
    expect(coerce('float', 2n ** 60n)).toBe(1152921504606846976);
    expect(() => coerce('float', '')).toThrow(ProcessingError);
    expect(() => coerce('float', 'abc')).toThrow(`cannot convert "abc" at '/x' to float`);
    expect(() => coerce('float', [1])).toThrow(`cannot convert array at '/x' to float`);
  });

  it('float strings must be decimal', () => {
    expect(() => coerce('float', '0x10')).toThrow(`cannot convert "0x10" at '/x' to float`);
    expect(() => coerce('float', '0b101')).toThrow(`cannot convert "0b101" at '/x' to float`);
    expect(() => coerce('float', '1_000')).toThrow(`cannot convert "1_000" at '/x' to float`);
    expect(() => coerce('float', 'constructor')).toThrow(`cannot convert "constructor" at '/x' to float`);
  });

  it('integers truncate toward zero and parse decimal strings', () => {
    expect(coerce('int32', 3.9)).toBe(3);
    expect(coerce('int32', -3.9)).toBe(-3);
    expect(coerce('int32', -0.5)).toBe(0);
    expect(coerce('int32', '42')).toBe(42);
    expect(coerce('int32', ' -7 ')).toBe(-7);
    expect(coerce('int32', false)).toBe(0);
    expect(() => coerce('int32', '1.5')).toThrow(`cannot convert "1.5" at '/x' to int32`);
    expect(() => coerce('int32', {})).toThrow(`cannot convert object at '/x' to int32`);
  });

  it('integers are range checked per target type', () => {
    expect(coerce('int32', -2147483648)).toBe(-2147483648);
    expect(() => coerce('int32', 2147483648)).toThrow(`value 2147483648 at '/x' is out of range for int32`);
    expect(coerce('uint32', 4294967295)).toBe(4294967295);
    expect(() => coerce('uint32', -1)).toThrow(`value -1 at '/x' is out of range for uint32`);
    expect(() => coerce('int32', 2n ** 40n)).toThrow(`value 1099511627776 at '/x' is out of range for int32`);
    expect(coerce('enum', '3')).toBe(3);
  });

  it('64-bit integers become bigint over the full range', () => {
    expect(coerce('int64', 3.9)).toBe(3n);
    expect(coerce('int64', true)).toBe(1n);
    expect(coerce('int64', '+12')).toBe(12n);
    expect(coerce('int64', '9223372036854775807')).toBe(9223372036854775807n);
    expect(coerce('int64', '-9223372036854775808')).toBe(-9223372036854775808n);
    expect(coerce('int64', -(2n ** 63n))).toBe(-9223372036854775808n);
    expect(() => coerce('int64', '9223372036854775808')).toThrow(
      `value "9223372036854775808" at '/x' is out of range for int64`
    );
    expect(coerce('uint64', '18446744073709551615')).toBe(18446744073709551615n);
    expect(coerce('uint64', 9007199254740992)).toBe(9007199254740992n);
    expect(() => coerce('uint64', -1)).toThrow(`value -1 at '/x' is out of range for uint64`);
    expect(() => coerce('uint64', 2n ** 64n)).toThrow(
      `value 18446744073709551616 at '/x' is out of range for uint64`
    );
  });

  it('string', () => {
    expect(coerce('string', 'héllo')).toBe('héllo');
    expect(coerce('string', 5)).toBe('5');
    expect(coerce('string', true)).toBe('true');
    expect(coerce('string', 12345678901234567890n)).toBe('12345678901234567890');
    expect(() => coerce('string', ['a'])).toThrow(`cannot convert array at '/x' to string`);
  });
});
