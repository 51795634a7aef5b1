export type * from './field.type';
export type * from './json.type';
export type * from './codec.type';
export type * from './compile.type';
export type * from './issue.type';
export { FIELD_TYPES, FIELD_LABELS } from './field.type';
