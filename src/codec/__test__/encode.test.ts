/**
 * encode_message() / encode_to_tree() 的单元测试
 */
import { describe, it, expect } from 'vitest';

import { decode_message } from '../decode';
import { encode_message, encode_to_tree } from '../encode';
import { to_plain } from '../../json/json_codec';
import { EnumDescriptor, MessageType } from '../../runtime';
import { ProtoEnumValueNotFoundError, UnsupportedFieldTypeError } from '../../errors';
import { embedded_type, enum_scope_schema, load_type, node_type, repeated_type } from './fixtures';

/** 直接用运行时 API 构造：Wrapper.nodes 为 repeated Node */
function build_wrapper() {
  const State = new EnumDescriptor('State', [
    { name: 'PLANNED', number: 0 },
    { name: 'AVAILABLE', number: 1 },
  ]);
  const Node = new MessageType('Node', {
    enums: [State],
    fields: [
      { name: 'state', number: 1, type: 'enum', label: 'optional', enum_type: State, default_value: 0 },
      { name: 'nodeid', number: 2, type: 'string', label: 'required' },
    ],
  });
  const Wrapper = new MessageType('Wrapper', {
    fields: [{ name: 'nodes', number: 1, type: 'message', label: 'repeated', message_type: Node }],
  });
  return { Node, Wrapper };
}

describe('encode_message', () => {
  it('should write every field in schema order', () => {
    const node = node_type().create({ nodeid: 'testnode', state: 1 });
    expect(encode_message(node)).toBe('{"state":"AVAILABLE","nodeid":"testnode"}');
  });

  it('should write fields at their default value', () => {
    const node = node_type().create({ nodeid: 'testnode' });
    expect(encode_message(node)).toBe('{"state":"PLANNED","nodeid":"testnode"}');
  });

  it('should keep the order of repeated values', () => {
    const msg = repeated_type().create();
    msg.extend('notes', ['testnote', 'testnote2']);
    expect(encode_message(msg)).toBe('{"notes":["testnote","testnote2"]}');
  });

  it('should raise ProtoEnumValueNotFoundError for a number outside the enum', () => {
    const node = node_type().create({ nodeid: 'testnode', state: 1 });
    node.set('state', 20);
    expect(() => encode_message(node)).toThrow(ProtoEnumValueNotFoundError);
    expect(() => encode_message(node)).toThrow(
      "enum testdata.Node.State does not have a value 20 (field 'state')"
    );
  });

  it('should encode an unset embedded message with its defaults', () => {
    const msg = embedded_type().create();
    expect(encode_message(msg)).toBe('{"testmessage":{"test":"test"}}');
  });

  it('should encode an enum declared outside the message type by its number', () => {
    const paint = load_type(enum_scope_schema, 'Paint').create({ colour: 1 });
    expect(encode_message(paint)).toBe('{"colour":"GREEN"}');
  });

  it('should point errors inside embedded messages at their full path', () => {
    const { Node, Wrapper } = build_wrapper();
    const wrapper = Wrapper.create({
      nodes: [Node.create({ nodeid: 'a' }), Node.create({ nodeid: 'b', state: 7 })],
    });

    try {
      encode_message(wrapper);
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(ProtoEnumValueNotFoundError);
      if (!(e instanceof ProtoEnumValueNotFoundError)) return;
      expect(e.path).toBe('/nodes/1/state');
    }
  });

  it('should encode repeated embedded messages', () => {
    const { Node, Wrapper } = build_wrapper();
    const wrapper = Wrapper.create({ nodes: [Node.create({ nodeid: 'a' }), Node.create({ nodeid: 'b', state: 1 })] });
    expect(encode_message(wrapper)).toBe(
      '{"nodes":[{"state":"PLANNED","nodeid":"a"},{"state":"AVAILABLE","nodeid":"b"}]}'
    );
  });

  it('should raise UnsupportedFieldTypeError for types outside the conversion table', () => {
    const Blob = new MessageType('Blob', {
      fields: [
        { name: 'id', number: 1, type: 'string', label: 'optional' },
        { name: 'payload', number: 2, type: 'bytes', label: 'optional' },
      ],
    });
    expect(() => encode_message(Blob.create({ id: 'x' }))).toThrow(UnsupportedFieldTypeError);
    expect(() => encode_message(Blob.create({ id: 'x' }))).toThrow(
      "field type 'bytes' of field 'payload' is not supported when encoding"
    );
  });

  it('should write non-finite floats as strings that decode back', () => {
    const Reading = new MessageType('Reading', {
      fields: [{ name: 'values', number: 1, type: 'float', label: 'repeated' }],
    });
    const reading = Reading.create({ values: [Number.NaN, Infinity, -Infinity, 1.5] });

    const text = encode_message(reading);
    expect(text).toBe('{"values":["NaN","Infinity","-Infinity",1.5]}');
    expect(decode_message(text, Reading).equals(reading)).toBe(true);
  });

  it('should write 64-bit integers with every digit', () => {
    const Counter = new MessageType('Counter', {
      fields: [
        { name: 'low', number: 1, type: 'int64', label: 'optional' },
        { name: 'high', number: 2, type: 'uint64', label: 'optional' },
      ],
    });
    const counter = Counter.create({ low: -(2n ** 63n), high: 2n ** 64n - 1n });
    expect(encode_message(counter)).toBe('{"low":-9223372036854775808,"high":18446744073709551615}');
  });

  it('should pretty-print with the given indentation', () => {
    const node = node_type().create({ nodeid: 'testnode', state: 1 });
    expect(encode_message(node, { spaces: 2 })).toBe('{\n  "state": "AVAILABLE",\n  "nodeid": "testnode"\n}');
  });
});

describe('encode_to_tree', () => {
  it('should return the tree without serializing it', () => {
    const node = node_type().create({ nodeid: 'testnode' });
    const tree = encode_to_tree(node);

    expect(tree.kind).toBe('object');
    if (tree.kind !== 'object') return;
    expect([...tree.entries.keys()]).toEqual(['state', 'nodeid']);
    expect(to_plain(tree)).toEqual({ state: 'PLANNED', nodeid: 'testnode' });
  });
});
