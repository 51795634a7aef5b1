// sample/embedded-msg.ts
export default {
  package: 'testdata',
  messages: [
    {
      name: 'TestMessage',
      fields: [{ name: 'testmessage', number: 1, type: 'message', message: 'EmbeddedMessage', label: 'optional' }],
    },
    {
      name: 'EmbeddedMessage',
      fields: [{ name: 'test', number: 1, type: 'string', label: 'optional', default: 'test' }],
    },
  ],
};
