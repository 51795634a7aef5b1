import { issue, parse_schema_doc, type MessageDefType } from '../schema';
import type { CompileSchemaInput, CompileSchemaOutput, CompiledTypes, ValidationIssue } from '../types';
import { MessageType, type EnumDescriptor, type FieldSpec } from '../runtime';
import { build_enum } from './enums';
import { build_field_spec } from './fields';
import { check_recursive_messages } from './cycles';

interface MessageShell {
  def: MessageDefType;
  path: string;
  type: MessageType;
  local_enums: Map<string, EnumDescriptor>;
}

/**
 * compile_schema()
 * ----------------
 * schema 文档 -> message type 表。
 *  1. zod 结构校验（失败时所有问题记为 SCHEMA_ERROR）
 *  2. 构建 enum 与 message 外壳（先建全部类型，再定义字段，以支持前向引用与自引用）
 *  3. 字段：重复检查、引用解析、默认值规范化
 *  4. 单值 message 字段成环检查
 */
export function compile_schema(input: CompileSchemaInput): CompileSchemaOutput {
  const t0 = Date.now();
  const result = parse_schema_doc(input.schema);
  const errors: ValidationIssue[] = [];
  const warnings: ValidationIssue[] = [];

  const fail = (): CompileSchemaOutput => ({
    ok: false,
    types: null,
    errors,
    warnings,
    time_ms: Date.now() - t0,
  });

  if (!result.success) {
    // 把 Zod 的 issues 转成 ValidationIssue[]
    for (const e of result.error.issues) {
      errors.push(issue('SCHEMA_ERROR', '/' + e.path.join('/'), e.message));
    }
    return fail();
  }

  const doc = result.data;
  const pkg = doc.package ?? '';
  const qualify = (name: string) => (pkg ? `${pkg}.${name}` : name);
  const add_issue = (code: string, path: string, msg: string) => {
    errors.push(issue(code, path, msg));
  };

  // 顶层 enum 与 message 共享同一命名空间
  const top_names = new Map<string, string>();
  const claim = (name: string, path: string): boolean => {
    const prev = top_names.get(name);
    if (prev !== undefined) {
      add_issue('DUPLICATE_TYPE', `${path}/name`, `type '${name}' is already declared at ${prev}`);
      return false;
    }
    top_names.set(name, path);
    return true;
  };

  // 顶层 enum：按短名与全名都可引用
  const enums: CompiledTypes['enums'] = new Map();
  const global_enums = new Map<string, EnumDescriptor>();
  (doc.enums ?? []).forEach((def, i) => {
    const path = `/enums/${i}`;
    if (!claim(def.name, path)) return;
    const e = build_enum(def, qualify(def.name), path, add_issue);
    if (!e) return;
    enums.set(e.full_name, e);
    global_enums.set(def.name, e);
    global_enums.set(e.full_name, e);
  });

  // message 外壳 + 嵌套 enum
  const shells: MessageShell[] = [];
  const message_scope = new Map<string, MessageType>();
  doc.messages.forEach((def, i) => {
    const path = `/messages/${i}`;
    if (!claim(def.name, path)) return;
    const full_name = qualify(def.name);

    const local_enums = new Map<string, EnumDescriptor>();
    const nested: EnumDescriptor[] = [];
    const symbol_owner = new Map<string, string>();
    (def.enums ?? []).forEach((enum_def, j) => {
      const enum_path = `${path}/enums/${j}`;
      if (local_enums.has(enum_def.name)) {
        add_issue('DUPLICATE_TYPE', `${enum_path}/name`, `enum '${enum_def.name}' is already declared in ${full_name}`);
        return;
      }
      const e = build_enum(enum_def, `${full_name}.${enum_def.name}`, enum_path, add_issue);
      if (!e) return;
      local_enums.set(enum_def.name, e);
      nested.push(e);
      // 其他 message 可用 "Message.Enum" 或全名引用嵌套 enum
      global_enums.set(`${def.name}.${enum_def.name}`, e);
      global_enums.set(e.full_name, e);

      e.values.forEach((v, k) => {
        const owner = symbol_owner.get(v.name);
        if (owner === undefined) {
          symbol_owner.set(v.name, e.name);
          return;
        }
        if (owner === e.name) return;
        warnings.push(
          issue(
            'SYMBOL_SHADOWED',
            `${enum_path}/values/${k}/name`,
            `symbol '${v.name}' of ${e.full_name} is shadowed by enum '${owner}' on ${full_name}`,
            'symbols resolve against the message type, so the first declaring enum wins'
          )
        );
      });
    });

    const type = new MessageType(def.name, { full_name, enums: nested });
    message_scope.set(def.name, type);
    message_scope.set(full_name, type);
    shells.push({ def, path, type, local_enums });
  });

  // 字段
  const pending: Array<{ type: MessageType; specs: FieldSpec[] }> = [];
  for (const shell of shells) {
    const names = new Set<string>();
    const numbers = new Set<number>();
    const specs: FieldSpec[] = [];
    let ok = true;

    shell.def.fields.forEach((field_def, j) => {
      const field_path = `${shell.path}/fields/${j}`;
      if (names.has(field_def.name)) {
        add_issue('DUPLICATE_FIELD_NAME', `${field_path}/name`, `field '${field_def.name}' is declared twice`);
        ok = false;
        return;
      }
      names.add(field_def.name);
      if (numbers.has(field_def.number)) {
        add_issue('DUPLICATE_FIELD_NUMBER', `${field_path}/number`, `field number ${field_def.number} is used twice`);
        ok = false;
        return;
      }
      numbers.add(field_def.number);

      const spec = build_field_spec(
        field_def,
        { local_enums: shell.local_enums, global_enums, messages: message_scope },
        field_path,
        add_issue
      );
      if (!spec) {
        ok = false;
        return;
      }
      specs.push(spec);
    });

    if (ok) pending.push({ type: shell.type, specs });
  }

  if (errors.length) return fail();

  for (const p of pending) p.type.define_fields(p.specs);

  check_recursive_messages(new Map(shells.map((s) => [s.type, s.path])), add_issue);

  if (input.options?.strict) {
    errors.push(...warnings.splice(0));
  }
  if (errors.length) return fail();

  const messages: CompiledTypes['messages'] = new Map(shells.map((s) => [s.type.full_name, s.type]));

  return {
    ok: true,
    types: { package: pkg, messages, enums },
    errors,
    warnings,
    time_ms: Date.now() - t0,
  };
}
