import type { MessageInstance } from '../runtime/message';
import type { MessageType } from '../runtime/message_type';
import type { EnumDescriptor } from '../runtime/enum_descriptor';

/**
 * 字段的 schema 类型（闭集）。
 * 只有 bool / float / int32 / int64 / uint32 / uint64 / string / enum 可以做 JSON 转换；
 * message 仅支持编码方向；其余类型在 schema 中合法，但转换时报 UNSUPPORTED_FIELD_TYPE。
 */
export const FIELD_TYPES = [
  'bool',
  'float',
  'double',
  'int32',
  'int64',
  'uint32',
  'uint64',
  'sint32',
  'sint64',
  'fixed32',
  'fixed64',
  'sfixed32',
  'sfixed64',
  'string',
  'bytes',
  'enum',
  'message',
] as const;

export type FieldType = (typeof FIELD_TYPES)[number];

/** 基础标量类型（既非 enum 也非 message） */
export type ScalarFieldType = Exclude<FieldType, 'enum' | 'message'>;

/** 字段标签：出现次数/必填约定 */
export const FIELD_LABELS = ['required', 'optional', 'repeated'] as const;

export type FieldLabel = (typeof FIELD_LABELS)[number];

/** 运行期的标量值（64 位整数以 bigint、bytes 以 Uint8Array 表示） */
export type ScalarValue = boolean | number | bigint | string | Uint8Array;

/** 单个字段槽位中可存放的值 */
export type SingleValue = ScalarValue | MessageInstance;

/** 字段读取结果：单值字段为 SingleValue，repeated 字段为只读数组 */
export type FieldValue = SingleValue | ReadonlyArray<SingleValue>;

interface FieldDescriptorBase {
  /** 字段名（同一 message type 内唯一，同时也是 JSON key） */
  readonly name: string;
  /** 字段编号（正整数，同一 message type 内唯一） */
  readonly number: number;
  readonly label: FieldLabel;
  /** 在所属 message type 中的位置（决定编码输出的 key 顺序） */
  readonly index: number;
  /** 是否声明了默认值 */
  readonly has_default: boolean;
}

export interface ScalarFieldDescriptor extends FieldDescriptorBase {
  readonly type: ScalarFieldType;
  readonly default_value?: ScalarValue;
}

export interface EnumFieldDescriptor extends FieldDescriptorBase {
  readonly type: 'enum';
  /** enum 默认值以数值形式保存 */
  readonly default_value?: number;
  readonly enum_type: EnumDescriptor;
}

export interface MessageFieldDescriptor extends FieldDescriptorBase {
  readonly type: 'message';
  readonly default_value?: undefined;
  readonly message_type: MessageType;
}

/** 字段描述符：按 type 判别的联合 */
export type FieldDescriptor = ScalarFieldDescriptor | EnumFieldDescriptor | MessageFieldDescriptor;
