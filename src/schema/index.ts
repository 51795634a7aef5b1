import type { ValidationIssue } from '../types';

export * from './message-schema.schema';

/** 构造统一的校验问题对象（schema 编译器与 CLI 复用） */
export function issue(
  code: string,
  path: string,
  message: string,
  hint?: string
): ValidationIssue {
  return hint === undefined ? { code, path, message } : { code, path, message, hint };
}
