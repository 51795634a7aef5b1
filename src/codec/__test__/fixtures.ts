/**
 * 测试共用的 schema 与类型构造工具
 */
import { compile_schema } from '../../compiler';
import { get_message_type } from '../../compiler/load';
import type { MessageType } from '../../runtime';
import node_schema from '../../cli/sample/node';
import repeated_schema from '../../cli/sample/repeated-field';
import embedded_schema from '../../cli/sample/embedded-msg';

/** 编译 schema 文档并取出指定 message type；编译失败直接抛错 */
export function load_type(schema: unknown, name: string): MessageType {
  const out = compile_schema({ schema });
  if (!out.ok || !out.types) {
    throw new Error(`fixture schema failed: ${out.errors.map((e) => `${e.code} ${e.path}`).join(', ')}`);
  }
  const type = get_message_type(out.types, name);
  if (!type) throw new Error(`fixture type '${name}' not found`);
  return type;
}

export const node_type = () => load_type(node_schema, 'Node');
export const repeated_type = () => load_type(repeated_schema, 'TestMessage');
export const embedded_type = () => load_type(embedded_schema, 'TestMessage');

/** 覆盖全部可转换标量类型的 message */
export const sample_schema = {
  package: 'demo',
  messages: [
    {
      name: 'Sample',
      enums: [
        {
          name: 'Level',
          values: [
            { name: 'LOW', number: 0 },
            { name: 'HIGH', number: 1 },
          ],
        },
      ],
      fields: [
        { name: 'flag', number: 1, type: 'bool', label: 'required' },
        { name: 'ratio', number: 2, type: 'float', label: 'optional' },
        { name: 'small', number: 3, type: 'int32', label: 'optional' },
        { name: 'big', number: 4, type: 'int64', label: 'optional' },
        { name: 'count', number: 5, type: 'uint32', label: 'optional' },
        { name: 'total', number: 6, type: 'uint64', label: 'optional', default: 10 },
        { name: 'label', number: 7, type: 'string', label: 'required' },
        { name: 'level', number: 8, type: 'enum', enum: 'Level', label: 'optional', default: 'HIGH' },
        { name: 'tags', number: 9, type: 'string', label: 'repeated' },
        { name: 'scores', number: 10, type: 'int32', label: 'repeated' },
        { name: 'levels', number: 11, type: 'enum', enum: 'Level', label: 'repeated' },
      ],
    },
  ],
};

export const sample_type = () => load_type(sample_schema, 'Sample');

/**
 * enum 查找范围相关的 schema：
 * - Job 有两个嵌套 enum（Status / Priority），status 字段只引用 Status
 * - Paint 引用顶层 enum Colour（Paint 自身没有嵌套 enum）
 */
export const enum_scope_schema = {
  enums: [
    {
      name: 'Colour',
      values: [
        { name: 'RED', number: 0 },
        { name: 'GREEN', number: 1 },
      ],
    },
  ],
  messages: [
    {
      name: 'Job',
      enums: [
        {
          name: 'Status',
          values: [
            { name: 'QUEUED', number: 0 },
            { name: 'DONE', number: 1 },
          ],
        },
        {
          name: 'Priority',
          values: [
            { name: 'LOW', number: 5 },
            { name: 'HIGH', number: 6 },
          ],
        },
      ],
      fields: [{ name: 'status', number: 1, type: 'enum', enum: 'Status', label: 'optional' }],
    },
    {
      name: 'Paint',
      fields: [{ name: 'colour', number: 1, type: 'enum', enum: 'Colour', label: 'optional' }],
    },
  ],
};
