export { EnumDescriptor, type EnumValue } from './enum_descriptor';
export {
  MessageType,
  default_of,
  type FieldSpec,
  type FieldAccessor,
  type SingularAccessor,
  type RepeatedAccessor,
} from './message_type';
export { MessageInstance } from './message';
export {
  INT32_RANGES,
  INT64_RANGES,
  is_int64_type,
  is_integer_type,
  in_integer_range,
  type Int32FieldType,
  type Int64FieldType,
  type IntegerFieldType,
} from './field_check';
