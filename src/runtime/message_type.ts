import type {
  EnumFieldDescriptor,
  FieldDescriptor,
  FieldLabel,
  FieldType,
  FieldValue,
  MessageFieldDescriptor,
  ScalarFieldDescriptor,
  ScalarValue,
  SingleValue,
} from '../types';
import type { EnumDescriptor } from './enum_descriptor';
import { MessageInstance } from './message';
import { check_single_value, is_int64_type } from './field_check';

/** 定义字段时的输入（define_fields 会把它规范化为 FieldDescriptor） */
export interface FieldSpec {
  name: string;
  number: number;
  type: FieldType;
  label: FieldLabel;
  /** enum 字段的默认值使用数值 */
  default_value?: ScalarValue;
  enum_type?: EnumDescriptor;
  message_type?: MessageType;
}

/** 实例的槽位存储：下标 = FieldDescriptor.index */
export type Slots = Array<SingleValue | SingleValue[] | undefined>;

export interface SingularAccessor {
  readonly kind: 'singular';
  readonly field: FieldDescriptor;
  get(slots: Slots): SingleValue;
  set(slots: Slots, value: unknown): void;
  has(slots: Slots): boolean;
  clear(slots: Slots): void;
}

export interface RepeatedAccessor {
  readonly kind: 'repeated';
  readonly field: FieldDescriptor;
  get(slots: Slots): ReadonlyArray<SingleValue>;
  append(slots: Slots, value: unknown): void;
  has(slots: Slots): boolean;
  clear(slots: Slots): void;
}

export type FieldAccessor = SingularAccessor | RepeatedAccessor;

/**
 * message type：有序字段描述符 + 嵌套 enum + 访问器表。
 *
 * - symbols 汇总了所有嵌套 enum 的取值（即"挂在 message type 上"的 enum 常量），
 *   解码时 enum 符号名在这里查找，而不是在字段自己的 enum 上查找。
 * - 字段可以延后定义（define_fields），以支持互相引用 / 自引用的 message。
 */
export class MessageType {
  readonly name: string;
  readonly full_name: string;
  readonly enums: ReadonlyArray<EnumDescriptor>;
  readonly symbols: ReadonlyMap<string, number>;

  private _fields: ReadonlyArray<FieldDescriptor> | null = null;
  private readonly by_name = new Map<string, FieldDescriptor>();
  private readonly accessors = new Map<string, FieldAccessor>();

  constructor(
    name: string,
    options: { full_name?: string; enums?: ReadonlyArray<EnumDescriptor>; fields?: ReadonlyArray<FieldSpec> } = {}
  ) {
    this.name = name;
    this.full_name = options.full_name ?? name;
    this.enums = Object.freeze([...(options.enums ?? [])]);

    // 多个嵌套 enum 声明同名符号时，先声明者生效
    const symbols = new Map<string, number>();
    for (const e of this.enums) {
      for (const v of e.values) {
        if (!symbols.has(v.name)) symbols.set(v.name, v.number);
      }
    }
    this.symbols = symbols;

    if (options.fields) this.define_fields(options.fields);
  }

  /** 定义字段并构建访问器表；每个 type 只能调用一次 */
  define_fields(specs: ReadonlyArray<FieldSpec>): this {
    if (this._fields) {
      throw new TypeError(`fields of ${this.full_name} are already defined`);
    }
    const fields = specs.map((spec, index) => this.build_field(spec, index));
    for (const f of fields) {
      if (this.by_name.has(f.name)) {
        throw new TypeError(`${this.full_name} declares field '${f.name}' twice`);
      }
      this.by_name.set(f.name, f);
      this.accessors.set(f.name, this.build_accessor(f));
    }
    this._fields = Object.freeze(fields);
    return this;
  }

  get fields(): ReadonlyArray<FieldDescriptor> {
    if (!this._fields) {
      throw new TypeError(`fields of ${this.full_name} are not defined yet`);
    }
    return this._fields;
  }

  field(name: string): FieldDescriptor | undefined {
    return this.by_name.get(name);
  }

  accessor(name: string): FieldAccessor {
    const a = this.accessors.get(name);
    if (!a) {
      throw new TypeError(`${this.full_name} has no field named '${name}'`);
    }
    return a;
  }

  /** 构造实例；init 中 repeated 字段需传数组 */
  create(init: Record<string, FieldValue> = {}): MessageInstance {
    const msg = new MessageInstance(this);
    for (const [name, value] of Object.entries(init)) {
      const a = this.accessor(name);
      if (a.kind === 'repeated') {
        if (!Array.isArray(value)) {
          throw new TypeError(`repeated field ${this.full_name}.${name} expects an array`);
        }
        msg.extend(name, value);
      } else {
        msg.set(name, value);
      }
    }
    return msg;
  }

  private build_field(spec: FieldSpec, index: number): FieldDescriptor {
    const base = { name: spec.name, number: spec.number, label: spec.label, index };
    const where = `${this.full_name}.${spec.name}`;
    if (spec.default_value !== undefined && spec.label === 'repeated') {
      throw new TypeError(`repeated field ${where} cannot have a default value`);
    }

    if (spec.type === 'enum') {
      const enum_type = spec.enum_type;
      if (!enum_type) throw new TypeError(`enum field ${where} needs an enum_type`);
      const plain: EnumFieldDescriptor = { ...base, type: 'enum', enum_type, has_default: false };
      const n = spec.default_value;
      if (n === undefined) return Object.freeze(plain);
      if (typeof n !== 'number' || !enum_type.values_by_number.has(n)) {
        throw new TypeError(`default of ${where} is not a value of ${enum_type.full_name}`);
      }
      return Object.freeze({ ...plain, has_default: true, default_value: n });
    }

    if (spec.type === 'message') {
      const message_type = spec.message_type;
      if (!message_type) throw new TypeError(`message field ${where} needs a message_type`);
      if (spec.default_value !== undefined) {
        throw new TypeError(`message field ${where} cannot have a default value`);
      }
      const field: MessageFieldDescriptor = { ...base, type: 'message', message_type, has_default: false };
      return Object.freeze(field);
    }

    const plain: ScalarFieldDescriptor = { ...base, type: spec.type, has_default: false };
    if (spec.default_value === undefined) return Object.freeze(plain);
    const v = check_single_value(plain, spec.default_value, this.full_name);
    if (v instanceof MessageInstance) {
      throw new TypeError(`default of ${where} must be a scalar`);
    }
    return Object.freeze({ ...plain, has_default: true, default_value: v });
  }

  private build_accessor(field: FieldDescriptor): FieldAccessor {
    const i = field.index;
    const owner = this.full_name;

    if (field.label === 'repeated') {
      return {
        kind: 'repeated',
        field,
        get: (slots) => {
          const v = slots[i];
          return Array.isArray(v) ? v : [];
        },
        append: (slots, value) => {
          const checked = check_single_value(field, value, owner);
          const v = slots[i];
          if (Array.isArray(v)) v.push(checked);
          else slots[i] = [checked];
        },
        has: (slots) => {
          const v = slots[i];
          return Array.isArray(v) && v.length > 0;
        },
        clear: (slots) => {
          slots[i] = undefined;
        },
      };
    }

    return {
      kind: 'singular',
      field,
      get: (slots) => {
        const v = slots[i];
        return v === undefined || Array.isArray(v) ? default_of(field) : v;
      },
      set: (slots, value) => {
        slots[i] = check_single_value(field, value, owner);
      },
      has: (slots) => slots[i] !== undefined,
      clear: (slots) => {
        slots[i] = undefined;
      },
    };
  }
}

/** 未赋值单值字段的读取结果：声明的默认值，否则为类型零值 */
export function default_of(field: FieldDescriptor): SingleValue {
  switch (field.type) {
    case 'enum':
      return field.default_value ?? field.enum_type.zero;
    case 'message':
      return field.message_type.create();
    default:
      // bytes 默认值存放在冻结的描述符上，读取时返回副本
      if (field.default_value instanceof Uint8Array) return field.default_value.slice();
      if (field.default_value !== undefined) return field.default_value;
      return zero_of(field.type);
  }
}

function zero_of(type: Exclude<FieldType, 'enum' | 'message'>): ScalarValue {
  switch (type) {
    case 'bool':
      return false;
    case 'string':
      return '';
    case 'bytes':
      return new Uint8Array(0);
    default:
      return is_int64_type(type) ? 0n : 0;
  }
}
