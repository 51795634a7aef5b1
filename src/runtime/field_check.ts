import type { FieldDescriptor, FieldType, SingleValue } from '../types';
import { MessageInstance } from './message';

export type Int32FieldType = 'int32' | 'uint32' | 'sint32' | 'fixed32' | 'sfixed32';

/** 64 位整数类型：运行期以 bigint 存放 */
export type Int64FieldType = 'int64' | 'uint64' | 'sint64' | 'fixed64' | 'sfixed64';

export type IntegerFieldType = Int32FieldType | Int64FieldType;

const INT32: readonly [number, number] = [-2147483648, 2147483647];
const UINT32: readonly [number, number] = [0, 4294967295];
const INT64: readonly [bigint, bigint] = [-(2n ** 63n), 2n ** 63n - 1n];
const UINT64: readonly [bigint, bigint] = [0n, 2n ** 64n - 1n];

/** 32 位整数类型的闭区间取值范围 */
export const INT32_RANGES: Readonly<Record<Int32FieldType, readonly [number, number]>> = Object.freeze({
  int32: INT32,
  sint32: INT32,
  sfixed32: INT32,
  uint32: UINT32,
  fixed32: UINT32,
});

/** 64 位整数类型的闭区间取值范围 */
export const INT64_RANGES: Readonly<Record<Int64FieldType, readonly [bigint, bigint]>> = Object.freeze({
  int64: INT64,
  sint64: INT64,
  sfixed64: INT64,
  uint64: UINT64,
  fixed64: UINT64,
});

export function is_int64_type(type: FieldType): type is Int64FieldType {
  return Object.prototype.hasOwnProperty.call(INT64_RANGES, type);
}

export function is_integer_type(type: FieldType): type is IntegerFieldType {
  return is_int64_type(type) || Object.prototype.hasOwnProperty.call(INT32_RANGES, type);
}

/** 32 位类型只接受整数 number，64 位类型只接受 bigint */
export function in_integer_range(type: IntegerFieldType, n: number | bigint): boolean {
  if (is_int64_type(type)) {
    const [min, max] = INT64_RANGES[type];
    return typeof n === 'bigint' && n >= min && n <= max;
  }
  const [min, max] = INT32_RANGES[type];
  return typeof n === 'number' && Number.isInteger(n) && n >= min && n <= max;
}

/**
 * 写入字段前的类型检查（与 message 运行时对 setter 的约束一致）。
 * enum 字段只要求 int32：未定义的编号允许写入，由编码时的 enum 校验兜底。
 */
export function check_single_value(field: FieldDescriptor, value: unknown, owner: string): SingleValue {
  const where = `${owner}.${field.name}`;
  switch (field.type) {
    case 'bool':
      if (typeof value === 'boolean') return value;
      break;
    case 'float':
    case 'double':
      if (typeof value === 'number') return value;
      break;
    case 'string':
      if (typeof value === 'string') return value;
      break;
    case 'bytes':
      if (value instanceof Uint8Array) return value;
      break;
    case 'enum':
      if (typeof value === 'number' && in_integer_range('int32', value)) return value;
      break;
    case 'message':
      if (value instanceof MessageInstance) {
        if (value.type !== field.message_type) {
          throw new TypeError(
            `${where} expects ${field.message_type.full_name}, got ${value.type.full_name}`
          );
        }
        return value;
      }
      break;
    default:
      if (is_int64_type(field.type)) {
        // 安全整数范围内的 number 转为 bigint 存放
        const n = typeof value === 'number' && Number.isSafeInteger(value) ? BigInt(value) : value;
        if (typeof n === 'bigint' && in_integer_range(field.type, n)) return n;
        if (typeof value === 'number' || typeof value === 'bigint') {
          throw new TypeError(`value ${value} out of range for ${field.type} field ${where}`);
        }
      } else if (typeof value === 'number') {
        if (in_integer_range(field.type, value)) return value;
        throw new TypeError(`value ${value} out of range for ${field.type} field ${where}`);
      }
  }
  throw new TypeError(`${describe_value(value)} has type not allowed for ${field.type} field ${where}`);
}

function describe_value(value: unknown): string {
  if (value instanceof MessageInstance) return `message ${value.type.full_name}`;
  if (typeof value === 'string') return JSON.stringify(value);
  return String(value);
}
