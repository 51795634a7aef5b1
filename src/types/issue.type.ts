/** 结构/领域问题统一表示（schema 编译期与 CLI 输出使用） */
export interface ValidationIssue {
  /** 机器可读错误码（如 SCHEMA_ERROR / TYPE_REF_NOT_FOUND / JSON_DATA_MISSING）。 */
  code: string;
  /** JSON Pointer 风格路径（如 "/messages/0/fields/1"）。 */
  path: string;
  /** 人类可读消息（面向 schema 作者/日志）。 */
  message: string;
  /** 可选：修复建议或文档提示。 */
  hint?: string;
}
