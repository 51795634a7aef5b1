export { decode_message, decode_tree, encode_message, encode_to_tree } from './codec';
export { parse_json, serialize_json, from_plain, to_plain, default_json_codec } from './json/json_codec';
export { compile_schema } from './compiler';
export { load_schema_file, get_message_type } from './compiler/load';
export { EnumDescriptor, MessageType, MessageInstance } from './runtime';
export type { EnumValue, FieldSpec } from './runtime';
export {
  DescjsonError,
  JsonDataMissingError,
  UnsupportedFieldTypeError,
  ProtoEnumValueNotFoundError,
  ProcessingError,
  JsonParseError,
  JsonSerializeError,
  to_issue,
} from './errors';
export type * from './types';
export type { MessageSchemaDocType as MessageSchemaDoc } from './schema';
