import type { MessageType } from '../runtime/message_type';
import type { EnumDescriptor } from '../runtime/enum_descriptor';
import type { ValidationIssue } from './issue.type';

/** ---------------------------
 *  schema 编译（输入 / 诊断 / 输出）
 * ---------------------------*/

/** 编译入口参数 */
export interface CompileSchemaInput {
  /** schema 文档（已解析为 JS 对象；通常来自 *.schema.json）。 */
  schema: unknown;
  /** 编译选项（可选）。 */
  options?: {
    /** 严格模式：若为 true，warnings 升级为 errors。 */
    strict?: boolean;
  };
}

/** 编译产物：按名称索引的类型表 */
export interface CompiledTypes {
  /** schema 的 package 名（可为空串） */
  package: string;
  /** message type，按 full_name 做键（插入顺序 = 文档声明顺序） */
  messages: Map<string, MessageType>;
  /** 顶层 enum，按 full_name 做键 */
  enums: Map<string, EnumDescriptor>;
}

/** 编译输出（含成功/失败两种分支） */
export interface CompileSchemaOutput {
  /** 是否编译成功（成功时 errors 为空；warnings 可能非空）。 */
  ok: boolean;
  /** 成功时给出类型表；失败为 null。 */
  types: CompiledTypes | null;
  /** 致命错误列表（失败原因）。 */
  errors: ValidationIssue[];
  /** 非致命告警列表。 */
  warnings: ValidationIssue[];
  /** 编译耗时（毫秒）。 */
  time_ms: number;
}
