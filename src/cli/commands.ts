import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { load_schema_file, get_message_type } from '../compiler/load';
import { decode_message, encode_message } from '../codec';
import { to_issue } from '../errors';
import type { ValidationIssue } from '../types';
import type { Logger } from '../utils/logger.util';

/** 命令执行所需的 IO（测试时可替换） */
export interface CliIo {
  logger: Logger;
  /** 写标准输出 */
  write(text: string): void;
  /** 读标准输入（normalize 未给 input 时使用） */
  read_stdin(): Promise<string>;
}

export type CliOptions = {
  pretty?: string | boolean;
  minify?: boolean;
  out?: string;
};

/** --pretty / --minify -> 缩进空格数 */
export function to_pretty_spaces(opt: CliOptions): number {
  if (opt.minify) return 0;
  if (opt.pretty === false || opt.pretty === undefined) return 0;
  if (opt.pretty === true) return 2;
  const n = Number(opt.pretty);
  return Number.isFinite(n) && n >= 0 ? Math.floor(n) : 2;
}

/** 生成一个"写入器"：把文本写到 target（自动建目录），保证末尾换行 */
export function create_file_writer() {
  return async (content: string, target: string): Promise<string> => {
    const abs = resolve(target);
    await mkdir(dirname(abs), { recursive: true });
    const text = content.endsWith('\n') ? content : content + '\n';
    await writeFile(abs, text, 'utf8');
    return abs;
  };
}

export function format_issue(e: ValidationIssue): string {
  return `[${e.code}] ${e.path} : ${e.message}`;
}

/** descjson check <schema> */
export async function run_check(schema_path: string, io: CliIo): Promise<number> {
  io.logger.debug(`Reading schema: ${schema_path}`);
  const compiled = await load_schema_file(schema_path);

  for (const w of compiled.warnings) io.logger.warn(`  ! ${format_issue(w)}`);
  if (!compiled.ok || !compiled.types) {
    io.logger.error(`Schema check failed with ${compiled.errors.length} error(s):`);
    for (const e of compiled.errors) io.logger.error(`  - ${format_issue(e)}`);
    return 1;
  }

  const names = [...compiled.types.messages.keys()];
  io.write(`ok: ${names.length} message type(s): ${names.join(', ')}\n`);
  return 0;
}

/** descjson normalize <schema> <type> [input] */
export async function run_normalize(
  schema_path: string,
  type_name: string,
  input_path: string | undefined,
  opts: CliOptions,
  io: CliIo
): Promise<number> {
  io.logger.debug(`Reading schema: ${schema_path}`);
  const compiled = await load_schema_file(schema_path);
  if (!compiled.ok || !compiled.types) {
    io.logger.error(`Schema check failed with ${compiled.errors.length} error(s):`);
    for (const e of compiled.errors) io.logger.error(`  - ${format_issue(e)}`);
    return 1;
  }

  const type = get_message_type(compiled.types, type_name);
  if (!type) {
    io.logger.error(`Message type '${type_name}' not found in ${schema_path}`);
    return 1;
  }

  const text = input_path === undefined ? await io.read_stdin() : await readFile(input_path, 'utf8');
  io.logger.debug(`Decoding ${input_path ?? '<stdin>'} as ${type.full_name}`);

  let output: string;
  try {
    const msg = decode_message(text, type);
    output = encode_message(msg, { spaces: to_pretty_spaces(opts) });
  } catch (err) {
    io.logger.error(format_issue(to_issue(err)));
    return 1;
  }

  if (opts.out) {
    const target = await create_file_writer()(output, opts.out);
    io.logger.info(`Output written to: ${target}`);
  } else {
    io.write(output + '\n');
  }
  return 0;
}
