export { decode_message, decode_tree } from './decode';
export { encode_message, encode_to_tree } from './encode';
export { convert_json_value, convert_message_value } from './field_value';
export { resolve_enum_name, resolve_enum_number } from './enum_resolver';
export { TYPE_MAP, is_coercible, type CoercibleFieldType, type Coercer } from './coercion';
