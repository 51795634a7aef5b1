import type { EnumFieldDescriptor, JsonNode } from '../types';
import type { MessageType } from '../runtime';
import { ProtoEnumValueNotFoundError } from '../errors';
import { describe_node } from '../json/json_codec';

/**
 * 解码方向：符号名 -> 数值。
 * 注意查找范围是 message type 上挂载的 enum 常量（message_type.symbols），而不是字段自身的 enum：
 *  - 定义在 message 之外的 enum 无法按名称解码；
 *  - 同一 message 内其他嵌套 enum 的符号也会被接受，得到那个 enum 的数值。
 * 已有数据可能依赖这一行为，修改前需与 schema 维护者确认。
 */
export function resolve_enum_name(
  field: EnumFieldDescriptor,
  node: JsonNode,
  message_type: MessageType,
  path: string
): number {
  if (node.kind === 'string') {
    const n = message_type.symbols.get(node.value);
    if (n !== undefined) return n;
  }
  throw new ProtoEnumValueNotFoundError(
    path,
    `${message_type.full_name} does not have an enum value ${describe_node(node)} (field '${field.name}')`
  );
}

/** 编码方向：数值 -> 符号名；数值不在字段 enum 的编号表中时报错 */
export function resolve_enum_number(field: EnumFieldDescriptor, value: number, path: string): string {
  const hit = field.enum_type.values_by_number.get(value);
  if (!hit) {
    throw new ProtoEnumValueNotFoundError(
      path,
      `enum ${field.enum_type.full_name} does not have a value ${value} (field '${field.name}')`
    );
  }
  return hit.name;
}
