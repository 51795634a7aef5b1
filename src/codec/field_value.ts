import type { FieldDescriptor, JsonNode, SingleValue } from '../types';
import { MessageInstance, type MessageType } from '../runtime';
import { ProcessingError, UnsupportedFieldTypeError } from '../errors';
import { TYPE_MAP, is_coercible } from './coercion';
import { resolve_enum_name, resolve_enum_number } from './enum_resolver';
import { encode_to_tree } from './encode';

/**
 * JSON -> message：转换单个 JSON 值（repeated 字段逐元素调用）。
 * enum 走符号解析；其余可转换标量查 TYPE_MAP；嵌套 message 不支持解码。
 */
export function convert_json_value(
  field: FieldDescriptor,
  node: JsonNode,
  message_type: MessageType,
  path: string
): boolean | number | bigint | string {
  if (field.type === 'enum') {
    return resolve_enum_name(field, node, message_type, path);
  }
  if (is_coercible(field.type)) {
    return TYPE_MAP[field.type](node, path);
  }
  throw new UnsupportedFieldTypeError(
    path,
    `field type '${field.type}' of ${message_type.full_name}.${field.name} is not supported when decoding`
  );
}

/** JSON 无法表示的浮点数按字符串输出，解码时 float 转换可以读回 */
function float_node(value: number): JsonNode {
  if (Number.isNaN(value)) return { kind: 'string', value: 'NaN' };
  if (value === Infinity) return { kind: 'string', value: 'Infinity' };
  if (value === -Infinity) return { kind: 'string', value: '-Infinity' };
  return { kind: 'number', value };
}

/**
 * message -> JSON：转换单个字段值。
 * enum 输出符号名；可转换标量原样透传（64 位整数为 bigint 节点，非有限浮点数为字符串）；
 * 嵌套 message 递归编码。
 */
export function convert_message_value(field: FieldDescriptor, value: SingleValue, path: string): JsonNode {
  if (field.type === 'enum') {
    if (typeof value !== 'number') {
      throw new ProcessingError(path, `enum field '${field.name}' holds a non-numeric value`);
    }
    return { kind: 'string', value: resolve_enum_number(field, value, path) };
  }
  if (is_coercible(field.type)) {
    switch (typeof value) {
      case 'boolean':
        return { kind: 'bool', value };
      case 'number':
        return float_node(value);
      case 'bigint':
        return { kind: 'bigint', value };
      case 'string':
        return { kind: 'string', value };
    }
    throw new ProcessingError(path, `field '${field.name}' holds a value that is not a ${field.type}`);
  }
  if (field.type === 'message') {
    if (!(value instanceof MessageInstance)) {
      throw new ProcessingError(path, `field '${field.name}' holds a value that is not a message`);
    }
    return encode_to_tree(value, path);
  }
  throw new UnsupportedFieldTypeError(path, `field type '${field.type}' of field '${field.name}' is not supported when encoding`);
}
