import type { ValidationIssue } from '../types';

/**
 * 所有转换错误的基类。
 * - code：机器可读错误码（与 ValidationIssue.code 同一命名空间）
 * - path：出错值的 JSON Pointer（如 "/notes/1"）；与具体值无关时为 ""
 */
export class DescjsonError extends Error {
  readonly code: string;
  readonly path: string;

  constructor(code: string, path: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.path = path;
  }
}

/** 必填字段在 JSON 中缺失，且没有默认值 */
export class JsonDataMissingError extends DescjsonError {
  constructor(path: string, message: string) {
    super('JSON_DATA_MISSING', path, message);
  }
}

/** 字段类型在当前方向上不支持转换 */
export class UnsupportedFieldTypeError extends DescjsonError {
  constructor(path: string, message: string) {
    super('UNSUPPORTED_FIELD_TYPE', path, message);
  }
}

/** 解码：符号名未被 message type 识别；编码：数值不在 enum 的编号表中 */
export class ProtoEnumValueNotFoundError extends DescjsonError {
  constructor(path: string, message: string) {
    super('PROTO_ENUM_VALUE_NOT_FOUND', path, message);
  }
}

/** 值的形状或范围不符合字段类型 */
export class ProcessingError extends DescjsonError {
  constructor(path: string, message: string) {
    super('PROCESSING_ERROR', path, message);
  }
}

/** JSON 文本语法错误 */
export class JsonParseError extends DescjsonError {
  constructor(message: string, cause: unknown) {
    super('JSON_PARSE_ERROR', '', message, { cause });
  }
}

/** JSON 树无法序列化（如 NaN / Infinity） */
export class JsonSerializeError extends DescjsonError {
  constructor(path: string, message: string) {
    super('JSON_SERIALIZE_ERROR', path, message);
  }
}

/** 把任意异常转换成 ValidationIssue，供 CLI 统一输出 */
export function to_issue(err: unknown): ValidationIssue {
  if (err instanceof DescjsonError) {
    return { code: err.code, path: err.path || '/', message: err.message };
  }
  if (err instanceof Error) {
    return { code: 'UNEXPECTED_ERROR', path: '/', message: err.message };
  }
  return { code: 'UNEXPECTED_ERROR', path: '/', message: String(err) };
}

/** 拼接 JSON Pointer 片段（按 RFC 6901 转义 "~" 与 "/"） */
export function join_path(base: string, segment: string | number): string {
  const escaped = String(segment).replace(/~/g, '~0').replace(/\//g, '~1');
  return `${base}/${escaped}`;
}
