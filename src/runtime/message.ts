import type { FieldValue, SingleValue } from '../types';
import type { MessageType, Slots } from './message_type';

/**
 * message 实例：按字段下标存放值的可变记录。
 * 所有读写都经由所属 MessageType 的访问器表完成。
 */
export class MessageInstance {
  readonly type: MessageType;
  private readonly slots: Slots;

  constructor(type: MessageType) {
    this.type = type;
    this.slots = new Array<SingleValue | SingleValue[] | undefined>(type.fields.length).fill(undefined);
  }

  /** 读取字段；单值字段未赋值时返回默认值/零值，repeated 字段返回数组 */
  get(name: string): FieldValue {
    return this.type.accessor(name).get(this.slots);
  }

  /** 读取单值字段（repeated 字段抛 TypeError） */
  get_single(name: string): SingleValue {
    const a = this.type.accessor(name);
    if (a.kind === 'repeated') {
      throw new TypeError(`${this.type.full_name}.${name} is repeated; use get_repeated()`);
    }
    return a.get(this.slots);
  }

  /** 写入单值字段 */
  set(name: string, value: unknown): this {
    const a = this.type.accessor(name);
    if (a.kind === 'repeated') {
      throw new TypeError(`${this.type.full_name}.${name} is repeated; use append()`);
    }
    a.set(this.slots, value);
    return this;
  }

  has(name: string): boolean {
    return this.type.accessor(name).has(this.slots);
  }

  clear(name: string): this {
    this.type.accessor(name).clear(this.slots);
    return this;
  }

  get_repeated(name: string): ReadonlyArray<SingleValue> {
    const a = this.type.accessor(name);
    if (a.kind !== 'repeated') {
      throw new TypeError(`${this.type.full_name}.${name} is not repeated`);
    }
    return a.get(this.slots);
  }

  append(name: string, value: unknown): this {
    const a = this.type.accessor(name);
    if (a.kind !== 'repeated') {
      throw new TypeError(`${this.type.full_name}.${name} is not repeated; use set()`);
    }
    a.append(this.slots, value);
    return this;
  }

  extend(name: string, values: Iterable<unknown>): this {
    for (const v of values) this.append(name, v);
    return this;
  }

  /**
   * 逐字段比较可读取的值（递归比较嵌套 message）。
   * 未赋值字段按其默认值参与比较，因此"显式写入默认值"与"未赋值"视为相等。
   */
  equals(other: MessageInstance): boolean {
    if (other.type !== this.type) return false;
    return this.type.fields.every((f) => {
      const a = this.get(f.name);
      const b = other.get(f.name);
      if (Array.isArray(a) && Array.isArray(b)) {
        return a.length === b.length && a.every((v, i) => same_value(v, b[i]));
      }
      return same_value(a, b);
    });
  }
}

function same_value(a: unknown, b: unknown): boolean {
  if (a instanceof MessageInstance && b instanceof MessageInstance) return a.equals(b);
  if (a instanceof Uint8Array && b instanceof Uint8Array) {
    return a.length === b.length && a.every((v, i) => v === b[i]);
  }
  if (typeof a === 'number' && typeof b === 'number' && Number.isNaN(a) && Number.isNaN(b)) return true;
  return a === b;
}
