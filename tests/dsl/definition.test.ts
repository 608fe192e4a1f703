import { parseFlowDefinition } from '../../src/dsl/definition';
import { EdgeKind } from '../../src/domain/flow';

describe('parseFlowDefinition', () => {
  test('parses a complete definition', () => {
    const result = parseFlowDefinition({
      name: 'Parsed',
      description: 'From JSON',
      version: '2019-10-30',
      entryId: 'b',
      nodes: [
        { id: 'a', type: 'MessageParticipant', parameters: { Text: 'Hi' } },
        { id: 'b', type: 'GetParticipantInput', extensions: { Tags: ['x'] } },
      ],
      edges: [
        { kind: 'sequential', from: 'a', to: 'b' },
        { kind: 'condition', from: 'b', to: 'a', matchValue: '1' },
        { kind: 'default', from: 'b', to: 'a' },
        { kind: 'error', from: 'b', to: 'a', errorCode: 'NoMatchingError' },
      ],
      extensions: { Settings: {} },
    });

    expect(result.valid).toBe(true);
    expect(result.errors).toEqual([]);
    expect(result.definition).toEqual({
      name: 'Parsed',
      description: 'From JSON',
      version: '2019-10-30',
      entryId: 'b',
      nodes: [
        { id: 'a', type: 'MessageParticipant', parameters: { Text: 'Hi' } },
        { id: 'b', type: 'GetParticipantInput', parameters: {}, extensions: { Tags: ['x'] } },
      ],
      edges: [
        { kind: EdgeKind.Sequential, from: 'a', to: 'b' },
        { kind: EdgeKind.Condition, from: 'b', to: 'a', matchValue: '1' },
        { kind: EdgeKind.Default, from: 'b', to: 'a' },
        { kind: EdgeKind.Error, from: 'b', to: 'a', errorCode: 'NoMatchingError' },
      ],
      extensions: { Settings: {} },
    });
  });

  test('fills in the default version and empty edges', () => {
    const result = parseFlowDefinition({ name: 'Minimal', nodes: [] });
    expect(result.definition).toEqual({ name: 'Minimal', version: '2019-10-30', nodes: [], edges: [] });
  });

  test('accepts an empty node id', () => {
    const result = parseFlowDefinition({ name: 'Empty', nodes: [{ id: '', type: 'DisconnectParticipant' }] });
    expect(result.valid).toBe(true);
    expect(result.definition?.nodes).toEqual([{ id: '', type: 'DisconnectParticipant', parameters: {} }]);
  });

  test('rejects non-objects', () => {
    const result = parseFlowDefinition('flow');
    expect(result.valid).toBe(false);
    expect(result.errors[0].message).toBe('Flow definition must be an object');
    expect(result.errors[0].details).toEqual({ path: '$' });
  });

  test('collects every shape error with its path', () => {
    const result = parseFlowDefinition({
      name: '',
      version: 3,
      nodes: [{ id: 'a' }, 'b'],
      edges: [
        { kind: 'loop', from: 'a', to: 'a' },
        { kind: 'condition', from: 'a', to: 'a' },
        { kind: 'error', from: 'a', to: 'a' },
        { kind: 'sequential', from: 'a' },
      ],
    });

    expect(result.valid).toBe(false);
    expect(result.definition).toBeUndefined();
    expect(result.errors.every((e) => e.code === 'VALIDATION.SCHEMA')).toBe(true);
    expect(result.errors.map((e) => e.message)).toEqual([
      '"name" must be a non-empty string',
      '"version" must be a string',
      'nodes[0].type must be a non-empty string',
      'nodes[1] must be an object',
      'edges[0].kind must be one of sequential, condition, default, error',
      'edges[1].matchValue must be a string',
      'edges[2].errorCode must be a string',
      'edges[3].from and edges[3].to must be strings',
    ]);
    expect(result.errors[2].details).toEqual({ path: 'nodes[0].type' });
  });

  test('rejects non-array nodes and edges', () => {
    const result = parseFlowDefinition({ name: 'x', nodes: {}, edges: 'none', extensions: [] });
    expect(result.errors.map((e) => e.details)).toEqual([
      { path: 'extensions' },
      { path: 'nodes' },
      { path: 'edges' },
    ]);
  });
});
