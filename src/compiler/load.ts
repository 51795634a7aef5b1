import { readFile } from 'node:fs/promises';
import type { CompileSchemaInput, CompileSchemaOutput, CompiledTypes } from '../types';
import type { MessageType } from '../runtime';
import { issue } from '../schema';
import { compile_schema } from './index';

/** 读取 UTF-8 schema 文件并编译；文件内容不是合法 JSON 时返回 SCHEMA_ERROR */
export async function load_schema_file(
  path: string,
  options?: CompileSchemaInput['options']
): Promise<CompileSchemaOutput> {
  const t0 = Date.now();
  const text = await readFile(path, 'utf8');
  let schema: unknown;
  try {
    schema = JSON.parse(text);
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    return {
      ok: false,
      types: null,
      errors: [issue('SCHEMA_ERROR', '/', `invalid JSON in ${path}: ${reason}`)],
      warnings: [],
      time_ms: Date.now() - t0,
    };
  }
  return compile_schema({ schema, options });
}

/** 按全名或短名查找 message type（短名有歧义时返回 undefined） */
export function get_message_type(types: CompiledTypes, name: string): MessageType | undefined {
  const exact = types.messages.get(name);
  if (exact) return exact;
  const hits = [...types.messages.values()].filter((t) => t.name === name);
  return hits.length === 1 ? hits[0] : undefined;
}
