import { z } from 'zod';
import { FIELD_LABELS, FIELD_TYPES } from '../types/field.type';

/**
 * schema 文档 v1 的结构校验（不做引用解析/重复检查，这些在 compiler 里完成）。
 */

const IDENT = /^[A-Za-z_][A-Za-z0-9_]*$/;

const Ident = z.string().regex(IDENT, 'must be an identifier ([A-Za-z_][A-Za-z0-9_]*)');

/** 类型引用：短名或带 package 的全名（如 "State" / "testdata.Node.State"） */
const TypeRef = z
  .string()
  .regex(/^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)*$/, 'must be a (dotted) type name');

/** 字段编号上限（2^29 - 1） */
const MAX_FIELD_NUMBER = 536870911;

/**
 * enum 取值：符号名 + int32 数值
 */
const Schema_EnumValue = z
  .object({
    name: Ident,
    number: z.number().int().min(-2147483648).max(2147483647),
  })
  .strict();

/**
 * enum 定义（顶层或嵌套在 message 中）
 */
const Schema_Enum = z
  .object({
    name: Ident,
    /** 至少一个取值；第一个取值同时是零值 */
    values: z.array(Schema_EnumValue).min(1, 'enum must declare at least one value'),
  })
  .strict();

/**
 * 字段定义：
 * - type：字段类型（闭集，见 FIELD_TYPES）
 * - label：required / optional / repeated（省略时为 optional）
 * - enum：type=enum 时引用的 enum 名
 * - message：type=message 时引用的 message 名
 * - default：默认值（enum 字段写符号名；类型匹配在 compiler 中校验）
 */
const Schema_Field = z
  .object({
    name: Ident,
    number: z.number().int().min(1, 'field number must be positive').max(MAX_FIELD_NUMBER),
    type: z.enum(FIELD_TYPES),
    label: z.enum(FIELD_LABELS).default('optional'),
    enum: TypeRef.optional(),
    message: TypeRef.optional(),
    default: z.union([z.boolean(), z.number(), z.string()]).optional(),
  })
  .strict()
  .superRefine((field, ctx) => {
    if (field.type === 'enum' && field.enum === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "type=enum requires 'enum'",
        path: ['enum'],
      });
    }
    if (field.type === 'message' && field.message === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "type=message requires 'message'",
        path: ['message'],
      });
    }
    if (field.enum !== undefined && field.type !== 'enum') {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "'enum' is only allowed with type=enum",
        path: ['enum'],
      });
    }
    if (field.message !== undefined && field.type !== 'message') {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "'message' is only allowed with type=message",
        path: ['message'],
      });
    }
  });

/**
 * message 定义：有序字段 + 嵌套 enum（嵌套 enum 的取值会挂在 message type 上）
 */
const Schema_Message = z
  .object({
    name: Ident,
    enums: z.array(Schema_Enum).optional(),
    fields: z.array(Schema_Field),
  })
  .strict();

/**
 * schema 文档根
 */
export const MessageSchemaDoc = z
  .object({
    /** package 名（可选；参与 full_name 的拼接） */
    package: z.union([z.literal(''), TypeRef]).optional(),
    /** 顶层 enum 定义 */
    enums: z.array(Schema_Enum).optional(),
    /** message 定义 */
    messages: z.array(Schema_Message),
  })
  .strict();

export type MessageSchemaDocType = z.infer<typeof MessageSchemaDoc>;
export type EnumDefType = z.infer<typeof Schema_Enum>;
export type MessageDefType = z.infer<typeof Schema_Message>;
export type FieldDefType = z.infer<typeof Schema_Field>;

/** 安全解析 schema 文档：成功返回 { success:true, data }；失败返回 { success:false, error } */
export function parse_schema_doc(input: unknown) {
  return MessageSchemaDoc.safeParse(input);
}
