import type { DecodeOptions, JsonNode } from '../types';
import type { MessageInstance, MessageType } from '../runtime';
import { JsonDataMissingError, ProcessingError, join_path } from '../errors';
import { default_json_codec, describe_node } from '../json/json_codec';
import { convert_json_value } from './field_value';

/**
 * decode_message()
 * ----------------
 * JSON 文本 -> message 实例。
 *  - 按字段声明顺序处理；JSON 中多出的 key 直接忽略（兼容更新版本的生产者）。
 *  - 有默认值的字段即使缺席也显式写入默认值，保证语义相同的 JSON 得到逐字段相同的实例。
 *  - required 字段缺失且无默认值时抛 JsonDataMissingError。
 *  - 任一错误立即中止，不返回部分结果。
 */
export function decode_message(
  json_text: string,
  message_type: MessageType,
  options: DecodeOptions = {}
): MessageInstance {
  const json = options.json ?? default_json_codec;
  return decode_tree(json.parse(json_text), message_type);
}

/** 已解析的 JSON 树 -> message 实例 */
export function decode_tree(tree: JsonNode, message_type: MessageType): MessageInstance {
  if (tree.kind !== 'object') {
    throw new ProcessingError(
      '/',
      `${message_type.full_name} must be decoded from a JSON object, got ${describe_node(tree)}`
    );
  }

  const msg = message_type.create();

  for (const field of message_type.fields) {
    const path = join_path('', field.name);
    const node = tree.entries.get(field.name);

    if (node !== undefined) {
      if (field.label === 'repeated') {
        if (node.kind !== 'array') {
          throw new ProcessingError(
            path,
            `repeated field '${field.name}' expects a JSON array, got ${describe_node(node)}`
          );
        }
        node.items.forEach((item, i) => {
          msg.append(field.name, convert_json_value(field, item, message_type, join_path(path, i)));
        });
      } else {
        msg.set(field.name, convert_json_value(field, node, message_type, path));
      }
    } else if (field.has_default && field.default_value !== undefined) {
      // 显式写入默认值：required + default 的字段否则处于"未赋值但可读"的含糊状态
      msg.set(field.name, field.default_value);
    } else if (field.label === 'required') {
      throw new JsonDataMissingError(
        path,
        `field '${field.name}' of ${message_type.full_name} is not set in json data`
      );
    }
  }

  return msg;
}
