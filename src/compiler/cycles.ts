import type { MessageType } from '../runtime';
import type { AddIssue } from './enums';

/**
 * 检查经由单值 message 字段形成的环（含自引用）。
 * 未赋值的 message 字段编码时会输出其默认实例，这样的环会无限递归；
 * repeated message 字段默认为空数组，不构成问题。
 *
 * message_paths：message type -> 其在文档中的路径（如 "/messages/2"）
 */
export function check_recursive_messages(
  message_paths: Map<MessageType, string>,
  add_issue: AddIssue
): void {
  const state = new Map<MessageType, 'visiting' | 'done'>();

  const visit = (type: MessageType) => {
    state.set(type, 'visiting');
    for (const f of type.fields) {
      if (f.type !== 'message' || f.label === 'repeated') continue;
      const target = f.message_type;
      const s = state.get(target);
      if (s === 'visiting') {
        add_issue(
          'RECURSIVE_MESSAGE',
          `${message_paths.get(type) ?? ''}/fields/${f.index}`,
          `field '${type.full_name}.${f.name}' closes a cycle of singular message fields through '${target.full_name}'`
        );
      } else if (s === undefined) {
        visit(target);
      }
    }
    state.set(type, 'done');
  };

  for (const type of message_paths.keys()) {
    if (!state.has(type)) visit(type);
  }
}
