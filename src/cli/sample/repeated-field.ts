// sample/repeated-field.ts
export default {
  package: 'testdata',
  messages: [
    {
      name: 'TestMessage',
      fields: [{ name: 'notes', number: 1, type: 'string', label: 'repeated' }],
    },
  ],
};
