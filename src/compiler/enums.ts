import type { EnumDefType } from '../schema';
import { EnumDescriptor } from '../runtime';

export type AddIssue = (code: string, path: string, msg: string) => void;

/**
 * 构建 enum 描述符。
 * 同一 enum 内符号名重复 -> DUPLICATE_ENUM_VALUE（返回 null，该 enum 不进入类型表）；
 * 数值重复视为别名，允许。
 */
export function build_enum(
  def: EnumDefType,
  full_name: string,
  path: string,
  add_issue: AddIssue
): EnumDescriptor | null {
  const seen = new Set<string>();
  let ok = true;
  def.values.forEach((v, i) => {
    if (seen.has(v.name)) {
      add_issue('DUPLICATE_ENUM_VALUE', `${path}/values/${i}/name`, `enum '${full_name}' declares '${v.name}' twice`);
      ok = false;
    }
    seen.add(v.name);
  });
  if (!ok) return null;
  return new EnumDescriptor(def.name, def.values, full_name);
}
