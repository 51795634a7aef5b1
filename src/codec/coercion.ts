import type { FieldType, JsonNode } from '../types';
import { ProcessingError } from '../errors';
import { describe_node } from '../json/json_codec';
import { in_integer_range, is_int64_type, type IntegerFieldType } from '../runtime';

/** 可参与 JSON 转换的标量类型 */
export type CoercibleFieldType = 'bool' | 'float' | 'int32' | 'int64' | 'uint32' | 'uint64' | 'string' | 'enum';

/** 单个类型的转换函数：JSON 标量 -> 目标表示；失败抛 ProcessingError */
export type Coercer = (node: JsonNode, path: string) => boolean | number | bigint | string;

const fail = (node: JsonNode, path: string, target: string): never => {
  throw new ProcessingError(path, `cannot convert ${describe_node(node)} at '${path}' to ${target}`);
};

const to_boolean: Coercer = (node, path) => {
  switch (node.kind) {
    case 'bool':
      return node.value;
    case 'number':
      return node.value !== 0;
    case 'bigint':
      return node.value !== 0n;
    case 'string':
      if (node.value === 'true') return true;
      if (node.value === 'false') return false;
      break;
  }
  return fail(node, path, 'bool');
};

const SPECIAL_FLOATS: ReadonlyMap<string, number> = new Map([
  ['nan', NaN],
  ['inf', Infinity],
  ['+inf', Infinity],
  ['-inf', -Infinity],
  ['infinity', Infinity],
  ['+infinity', Infinity],
  ['-infinity', -Infinity],
]);

/** 十进制小数 / 指数形式；不接受 0x、0b 等前缀 */
const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

const to_float: Coercer = (node, path) => {
  switch (node.kind) {
    case 'number':
      return node.value;
    case 'bigint':
      return Number(node.value);
    case 'bool':
      return node.value ? 1 : 0;
    case 'string': {
      const text = node.value.trim();
      const special = SPECIAL_FLOATS.get(text.toLowerCase());
      if (special !== undefined) return special;
      if (DECIMAL.test(text)) return Number(text);
      break;
    }
  }
  return fail(node, path, 'float');
};

/** JSON 标量 -> 整数：小数向零截断，字符串只接受十进制整数；wide 时得到 bigint */
function integer_of(node: JsonNode, wide: boolean): number | bigint | undefined {
  switch (node.kind) {
    case 'number': {
      if (!Number.isFinite(node.value)) return undefined;
      // -0 归一为 0
      const n = Math.trunc(node.value) || 0;
      return wide ? BigInt(n) : n;
    }
    case 'bigint':
      return wide ? node.value : Number(node.value);
    case 'bool':
      if (wide) return node.value ? 1n : 0n;
      return node.value ? 1 : 0;
    case 'string': {
      const text = node.value.trim();
      if (!/^[+-]?\d+$/.test(text)) return undefined;
      return wide ? BigInt(text.replace(/^\+/, '')) : Number(text) || 0;
    }
  }
  return undefined;
}

/** 整数转换：64 位类型得到 bigint，其余得到 number */
const to_integer =
  (type: IntegerFieldType): Coercer =>
  (node, path) => {
    const n = integer_of(node, is_int64_type(type));
    if (n === undefined) return fail(node, path, type);
    if (!in_integer_range(type, n)) {
      throw new ProcessingError(path, `value ${describe_node(node)} at '${path}' is out of range for ${type}`);
    }
    return n;
  };

const to_text: Coercer = (node, path) => {
  switch (node.kind) {
    case 'string':
      return node.value;
    case 'number':
    case 'bigint':
    case 'bool':
      return String(node.value);
  }
  return fail(node, path, 'string');
};

/**
 * 类型转换表（模块加载时冻结，之后不再修改）：
 *   bool -> boolean, float -> number, int32/uint32 -> number, int64/uint64 -> bigint,
 *   string -> string, enum -> integer（符号解析之前的数值形式）
 */
export const TYPE_MAP: Readonly<Record<CoercibleFieldType, Coercer>> = Object.freeze({
  bool: to_boolean,
  float: to_float,
  int32: to_integer('int32'),
  int64: to_integer('int64'),
  uint32: to_integer('uint32'),
  uint64: to_integer('uint64'),
  string: to_text,
  enum: to_integer('int32'),
});

export function is_coercible(type: FieldType): type is CoercibleFieldType {
  return Object.prototype.hasOwnProperty.call(TYPE_MAP, type);
}
