/** enum 的单个取值 */
export interface EnumValue {
  readonly name: string;
  readonly number: number;
}

/**
 * enum 描述符：符号名 <-> 数值 的双向表。
 * 同一数值出现多次（别名）时，values_by_number 保留第一个声明的符号。
 */
export class EnumDescriptor {
  readonly name: string;
  readonly full_name: string;
  readonly values: ReadonlyArray<EnumValue>;
  readonly values_by_name: ReadonlyMap<string, EnumValue>;
  readonly values_by_number: ReadonlyMap<number, EnumValue>;

  constructor(name: string, values: ReadonlyArray<EnumValue>, full_name = name) {
    if (values.length === 0) {
      throw new TypeError(`enum '${full_name}' must declare at least one value`);
    }
    const by_name = new Map<string, EnumValue>();
    const by_number = new Map<number, EnumValue>();
    for (const v of values) {
      if (by_name.has(v.name)) {
        throw new TypeError(`enum '${full_name}' declares '${v.name}' twice`);
      }
      by_name.set(v.name, v);
      if (!by_number.has(v.number)) by_number.set(v.number, v);
    }
    this.name = name;
    this.full_name = full_name;
    this.values = Object.freeze([...values]);
    this.values_by_name = by_name;
    this.values_by_number = by_number;
  }

  /** 零值：第一个声明的取值 */
  get zero(): number {
    return this.values[0].number;
  }
}
