import { parse } from 'lossless-json';
import type { JsonCodec, JsonNode, JsonValue } from '../types';
import { JsonParseError, JsonSerializeError, join_path } from '../errors';

/**
 * 把普通 JS 值转换成 JSON 树。
 * 只接受 JSON 可表达的值（null / boolean / number / bigint / string / 数组 / 普通对象），其余抛 TypeError。
 */
export function from_plain(value: unknown, path = ''): JsonNode {
  if (value === null) return { kind: 'null' };
  switch (typeof value) {
    case 'boolean':
      return { kind: 'bool', value };
    case 'number':
      return { kind: 'number', value };
    case 'bigint':
      return { kind: 'bigint', value };
    case 'string':
      return { kind: 'string', value };
    case 'object': {
      if (Array.isArray(value)) {
        return { kind: 'array', items: value.map((v, i) => from_plain(v, join_path(path, i))) };
      }
      const entries = new Map<string, JsonNode>();
      for (const [k, v] of Object.entries(value)) {
        entries.set(k, from_plain(v, join_path(path, k)));
      }
      return { kind: 'object', entries };
    }
    default:
      throw new TypeError(`value at '${path || '/'}' is not representable as JSON (${typeof value})`);
  }
}

/** 把 JSON 树还原成普通 JS 值 */
export function to_plain(node: JsonNode): JsonValue {
  switch (node.kind) {
    case 'null':
      return null;
    case 'bool':
    case 'number':
    case 'bigint':
    case 'string':
      return node.value;
    case 'array':
      return node.items.map(to_plain);
    case 'object': {
      const out: { [key: string]: JsonValue } = {};
      // 赋值会把 "__proto__" 当作原型设置，这里定义为自有属性
      for (const [k, v] of node.entries) {
        Object.defineProperty(out, k, { value: to_plain(v), enumerable: true, writable: true, configurable: true });
      }
      return out;
    }
  }
}

/** 整数字面量超出安全整数范围时解析为 bigint，其余解析为 number */
function parse_number(token: string): number | bigint {
  const n = Number(token);
  return /^-?\d+$/.test(token) && !Number.isSafeInteger(n) ? BigInt(token) : n;
}

/**
 * 解析 JSON 文本；语法错误包装为 JsonParseError（cause 保留原始异常）。
 * 大整数以 bigint 节点保留全部位数。
 */
export function parse_json(text: string): JsonNode {
  let raw: unknown;
  try {
    raw = parse(text, null, parse_number);
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new JsonParseError(`invalid JSON: ${reason}`, e);
  }
  return from_plain(raw);
}

/**
 * 序列化 JSON 树。
 * - object key 按插入顺序输出
 * - spaces > 0 时按 JSON.stringify 的缩进格式输出
 * - NaN / Infinity 无法表示，抛 JsonSerializeError
 */
export function serialize_json(node: JsonNode, spaces = 0): string {
  const unit = ' '.repeat(Math.max(0, Math.floor(spaces)));
  return write(node, '', unit, '');
}

function write(node: JsonNode, indent: string, unit: string, path: string): string {
  switch (node.kind) {
    case 'null':
      return 'null';
    case 'bool':
      return node.value ? 'true' : 'false';
    case 'number':
      if (!Number.isFinite(node.value)) {
        throw new JsonSerializeError(path || '/', `number ${node.value} at '${path || '/'}' cannot be written as JSON`);
      }
      return JSON.stringify(node.value);
    case 'bigint':
      return node.value.toString();
    case 'string':
      return JSON.stringify(node.value);
    case 'array': {
      if (node.items.length === 0) return '[]';
      const inner = indent + unit;
      const parts = node.items.map((item, i) => write(item, inner, unit, join_path(path, i)));
      return unit ? `[\n${inner}${parts.join(`,\n${inner}`)}\n${indent}]` : `[${parts.join(',')}]`;
    }
    case 'object': {
      if (node.entries.size === 0) return '{}';
      const inner = indent + unit;
      const sep = unit ? ': ' : ':';
      const parts: string[] = [];
      for (const [k, v] of node.entries) {
        parts.push(`${JSON.stringify(k)}${sep}${write(v, inner, unit, join_path(path, k))}`);
      }
      return unit ? `{\n${inner}${parts.join(`,\n${inner}`)}\n${indent}}` : `{${parts.join(',')}}`;
    }
  }
}

/** 默认 JSON 协作者 */
export const default_json_codec: JsonCodec = {
  parse: parse_json,
  serialize: serialize_json,
};

/** 人类可读的节点类型名（用于错误消息） */
export function describe_node(node: JsonNode): string {
  switch (node.kind) {
    case 'null':
      return 'null';
    case 'bool':
    case 'number':
    case 'bigint':
      return String(node.value);
    case 'string':
      return JSON.stringify(node.value);
    case 'array':
      return 'array';
    case 'object':
      return 'object';
  }
}
