import type { JsonCodec } from './json.type';

/** decode_message() 的选项 */
export interface DecodeOptions {
  /** 替换默认的 JSON 解析实现 */
  json?: JsonCodec;
}

/** encode_message() 的选项 */
export interface EncodeOptions {
  /** 替换默认的 JSON 序列化实现 */
  json?: JsonCodec;
  /** 缩进空格数；0 或省略表示紧凑输出 */
  spaces?: number;
}
