import type { EncodeOptions, JsonNode } from '../types';
import type { MessageInstance } from '../runtime';
import { join_path } from '../errors';
import { default_json_codec } from '../json/json_codec';
import { convert_message_value } from './field_value';

/**
 * encode_message()
 * ----------------
 * message 实例 -> JSON 文本。
 * 所有字段都会输出（包括处于默认值的字段），key 顺序 = 字段声明顺序，
 * 这样消费方无论生产方 schema 版本如何都能拿到完整的字段集合。
 */
export function encode_message(message: MessageInstance, options: EncodeOptions = {}): string {
  const json = options.json ?? default_json_codec;
  return json.serialize(encode_to_tree(message), options.spaces ?? 0);
}

/**
 * message 实例 -> JSON 树（不做序列化）。嵌套 message 字段也经由这里递归。
 * base 为错误路径前缀（JSON Pointer）。
 */
export function encode_to_tree(message: MessageInstance, base = ''): JsonNode {
  const entries = new Map<string, JsonNode>();

  for (const field of message.type.fields) {
    const path = join_path(base, field.name);
    if (field.label === 'repeated') {
      const items = message
        .get_repeated(field.name)
        .map((v, i) => convert_message_value(field, v, join_path(path, i)));
      entries.set(field.name, { kind: 'array', items });
    } else {
      entries.set(field.name, convert_message_value(field, message.get_single(field.name), path));
    }
  }

  return { kind: 'object', entries };
}
