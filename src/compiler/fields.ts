import type { FieldDefType } from '../schema';
import type { ScalarValue } from '../types';
import { in_integer_range, is_int64_type, is_integer_type, type EnumDescriptor, type FieldSpec, type MessageType } from '../runtime';
import type { AddIssue } from './enums';

/** 字段引用解析所需的作用域 */
export interface FieldScope {
  /** 当前 message 的嵌套 enum（按短名） */
  local_enums: Map<string, EnumDescriptor>;
  /** 顶层 enum（按短名与全名） */
  global_enums: Map<string, EnumDescriptor>;
  /** 所有 message（按短名与全名） */
  messages: Map<string, MessageType>;
}

/**
 * 把字段定义编译为 FieldSpec：
 * - 解析 enum/message 引用（先查当前 message 的嵌套 enum，再查顶层）
 * - 校验并规范化默认值（enum 默认值从符号名转为数值；bytes 默认值按 UTF-8 编码）
 * 有问题时记录 issue 并返回 null。
 */
export function build_field_spec(
  def: FieldDefType,
  scope: FieldScope,
  path: string,
  add_issue: AddIssue
): FieldSpec | null {
  const spec: FieldSpec = { name: def.name, number: def.number, type: def.type, label: def.label };

  if (def.type === 'enum' && def.enum !== undefined) {
    const enum_type = scope.local_enums.get(def.enum) ?? scope.global_enums.get(def.enum);
    if (!enum_type) {
      add_issue('TYPE_REF_NOT_FOUND', `${path}/enum`, `enum '${def.enum}' not found`);
      return null;
    }
    spec.enum_type = enum_type;
  }

  if (def.type === 'message' && def.message !== undefined) {
    const message_type = scope.messages.get(def.message);
    if (!message_type) {
      add_issue('TYPE_REF_NOT_FOUND', `${path}/message`, `message '${def.message}' not found`);
      return null;
    }
    spec.message_type = message_type;
  }

  if (def.default === undefined) return spec;

  const default_path = `${path}/default`;
  if (def.label === 'repeated') {
    add_issue('INVALID_DEFAULT', default_path, `repeated field '${def.name}' cannot have a default`);
    return null;
  }
  const value = normalize_default(spec, def.default);
  if (value === undefined) {
    add_issue(
      'INVALID_DEFAULT',
      default_path,
      `default ${JSON.stringify(def.default)} is not valid for ${def.type} field '${def.name}'`
    );
    return null;
  }
  spec.default_value = value;
  return spec;
}

function normalize_default(spec: FieldSpec, raw: boolean | number | string): ScalarValue | undefined {
  const type = spec.type;
  switch (type) {
    case 'bool':
      return typeof raw === 'boolean' ? raw : undefined;
    case 'float':
    case 'double':
      return typeof raw === 'number' ? raw : undefined;
    case 'string':
      return typeof raw === 'string' ? raw : undefined;
    case 'bytes':
      return typeof raw === 'string' ? new TextEncoder().encode(raw) : undefined;
    case 'enum':
      return typeof raw === 'string' ? spec.enum_type?.values_by_name.get(raw)?.number : undefined;
    case 'message':
      return undefined;
    default: {
      if (!is_integer_type(type)) return undefined;
      const n = is_int64_type(type) ? wide_integer(raw) : typeof raw === 'number' ? raw : undefined;
      return n !== undefined && in_integer_range(type, n) ? n : undefined;
    }
  }
}

/** 64 位默认值：安全整数或十进制整数字符串（超出安全整数范围时需写成字符串） */
function wide_integer(raw: boolean | number | string): bigint | undefined {
  if (typeof raw === 'number') return Number.isSafeInteger(raw) ? BigInt(raw) : undefined;
  if (typeof raw === 'string' && /^[+-]?\d+$/.test(raw)) return BigInt(raw.replace(/^\+/, ''));
  return undefined;
}
