/**
 * JSON 树：带标签的联合类型。
 * object 的 entries 使用 Map 以保留插入顺序（编码输出的 key 顺序即字段声明顺序）。
 */
export type JsonNode =
  | { kind: 'null' }
  | { kind: 'bool'; value: boolean }
  | { kind: 'number'; value: number }
  /** 超出安全整数范围的整数字面量，或 64 位整数字段的值 */
  | { kind: 'bigint'; value: bigint }
  | { kind: 'string'; value: string }
  | { kind: 'array'; items: JsonNode[] }
  | { kind: 'object'; entries: Map<string, JsonNode> };

export type JsonKind = JsonNode['kind'];

/** 普通 JS 形式的 JSON 值（大整数为 bigint） */
export type JsonValue =
  | null
  | boolean
  | number
  | bigint
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };

/** JSON 编解码协作者：文本 <-> JSON 树 */
export interface JsonCodec {
  parse(text: string): JsonNode;
  serialize(node: JsonNode, spaces?: number): string;
}
