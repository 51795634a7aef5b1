// sample/node.ts
export default {
  package: 'testdata',
  messages: [
    {
      name: 'Node',
      enums: [
        {
          name: 'State',
          values: [
            { name: 'PLANNED', number: 0 },
            { name: 'AVAILABLE', number: 1 },
            { name: 'RETIRED', number: 2 },
          ],
        },
      ],
      fields: [
        { name: 'state', number: 1, type: 'enum', enum: 'State', label: 'optional', default: 'PLANNED' },
        { name: 'nodeid', number: 2, type: 'string', label: 'required' },
      ],
    },
  ],
};
