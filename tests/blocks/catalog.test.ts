import { BlockType, createBlockCatalog, defaultBlockCatalog, DEFAULT_BLOCK_DEFINITIONS } from '../../src/blocks/catalog';

describe('Block catalog', () => {
  test('the default catalog covers every builder block type', () => {
    for (const type of Object.values(BlockType)) {
      expect(defaultBlockCatalog.has(type)).toBe(true);
    }
    expect(DEFAULT_BLOCK_DEFINITIONS).toHaveLength(Object.values(BlockType).length);
    expect(defaultBlockCatalog.has('Unknown')).toBe(false);
  });

  test('accepts valid parameters', () => {
    expect(defaultBlockCatalog.validate(BlockType.MessageParticipant, { Text: 'Hello' })).toEqual([]);
    expect(defaultBlockCatalog.validate(BlockType.DisconnectParticipant, {})).toEqual([]);
    expect(
      defaultBlockCatalog.validate(BlockType.InvokeLambdaFunction, {
        LambdaFunctionARN: '{{ARN}}',
        InvocationTimeLimitSeconds: '8',
      }),
    ).toEqual([]);
  });

  test('reports missing required parameters, treating null as missing', () => {
    expect(defaultBlockCatalog.validate(BlockType.TransferToFlow, { ContactFlowId: null })).toEqual([
      { message: 'missing required parameter "ContactFlowId"', field: 'ContactFlowId' },
    ]);
  });

  test('requires exactly one key of an exclusive group', () => {
    expect(defaultBlockCatalog.validate(BlockType.ConnectParticipantWithLexBot, {})).toEqual([
      { message: 'one of LexV2Bot, LexBot is required', field: 'LexV2Bot' },
    ]);
    expect(
      defaultBlockCatalog.validate(BlockType.ConnectParticipantWithLexBot, { LexV2Bot: {}, LexBot: {} }),
    ).toEqual([{ message: 'only one of LexV2Bot, LexBot may be set' }]);
  });

  test('custom catalogs validate only their own types', () => {
    const catalog = createBlockCatalog([{ type: 'Wait', description: 'Hold', required: ['Seconds'] }]);
    expect(catalog.has('Wait')).toBe(true);
    expect(catalog.has(BlockType.MessageParticipant)).toBe(false);
    expect(catalog.validate('Wait', {})).toEqual([{ message: 'missing required parameter "Seconds"', field: 'Seconds' }]);
    expect(catalog.validate('Other', {})).toEqual([]);
  });
});
