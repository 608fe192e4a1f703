import { compileFlow, serializeDocument } from '../../src/dsl/compiler';
import { FlowBuilder } from '../../src/graph/builder';
import { EdgeKind, FlowDefinition } from '../../src/domain/flow';
import { FlowError } from '../../src/domain/errors';
import { defaultBlockCatalog } from '../../src/blocks/catalog';
import { LogCapture, LogLevel, captureLogs } from '../../src/logger';

function namedIds(names: string[]): () => string {
  let index = 0;
  return () => names[index++] ?? `extra_${index}`;
}

/** welcome -> menu -> {sales, support, error_msg} -> disconnect */
function buildMenuFlow(): FlowBuilder {
  const flow = new FlowBuilder('Main menu', {
    idGenerator: namedIds(['welcome', 'menu', 'sales', 'support', 'error_msg', 'disconnect']),
  });
  const welcome = flow.playPrompt('Welcome');
  const menu = flow.getInput('Press 1 for sales or 2 for support');
  const sales = flow.playPrompt('Connecting you to sales');
  const support = flow.playPrompt('Connecting you to support');
  const errorMsg = flow.playPrompt('Sorry, that is not an option');
  const disconnect = flow.disconnect();

  welcome.then(menu);
  menu.when('1', sales).when('2', support).otherwise(errorMsg);
  sales.then(disconnect);
  support.then(disconnect);
  errorMsg.then(disconnect);
  return flow;
}

function catchFlowError(fn: () => unknown): FlowError {
  try {
    fn();
  } catch (err) {
    if (err instanceof FlowError) return err;
    throw err;
  }
  throw new Error('expected a FlowError');
}

describe('Flow Compiler', () => {
  let logs: LogCapture;

  beforeEach(() => {
    logs = captureLogs();
  });

  afterEach(() => {
    logs.restore();
  });

  test('compiles the menu scenario', () => {
    const { document, warnings } = buildMenuFlow().compile();

    expect(document.Actions).toHaveLength(6);
    expect(document.StartAction).toBe('welcome');

    const menu = document.Actions.find((a) => a.Identifier === 'menu');
    expect(Object.keys(menu?.Transitions ?? {})).toEqual(['1', '2', 'Default']);
    expect(menu?.Transitions).toEqual({ '1': 'sales', '2': 'support', Default: 'error_msg' });

    for (const id of ['sales', 'support', 'error_msg']) {
      const action = document.Actions.find((a) => a.Identifier === id);
      expect(action?.Transitions).toEqual({ Success: 'disconnect' });
    }
    expect(warnings).toEqual([]);
  });

  test('produces the exact wire document', () => {
    const { document } = buildMenuFlow().compile();

    expect(document).toEqual({
      Version: '2019-10-30',
      Name: 'Main menu',
      StartAction: 'welcome',
      Metadata: { entryPointPosition: { x: 0, y: 0 }, snapToGrid: false, Annotations: [] },
      Actions: [
        {
          Identifier: 'welcome',
          Type: 'MessageParticipant',
          Parameters: { Text: 'Welcome' },
          Metadata: { position: { x: 150, y: 50 } },
          Transitions: { Success: 'menu' },
        },
        {
          Identifier: 'menu',
          Type: 'GetParticipantInput',
          Parameters: {
            Text: 'Press 1 for sales or 2 for support',
            InputTimeLimitSeconds: '5',
            StoreInput: 'False',
          },
          Metadata: { position: { x: 430, y: 50 } },
          Transitions: { '1': 'sales', '2': 'support', Default: 'error_msg' },
        },
        {
          Identifier: 'sales',
          Type: 'MessageParticipant',
          Parameters: { Text: 'Connecting you to sales' },
          Metadata: { position: { x: 710, y: 50 } },
          Transitions: { Success: 'disconnect' },
        },
        {
          Identifier: 'support',
          Type: 'MessageParticipant',
          Parameters: { Text: 'Connecting you to support' },
          Metadata: { position: { x: 710, y: 230 } },
          Transitions: { Success: 'disconnect' },
        },
        {
          Identifier: 'error_msg',
          Type: 'MessageParticipant',
          Parameters: { Text: 'Sorry, that is not an option' },
          Metadata: { position: { x: 710, y: 410 } },
          Transitions: { Success: 'disconnect' },
        },
        {
          Identifier: 'disconnect',
          Type: 'DisconnectParticipant',
          Parameters: {},
          Metadata: { position: { x: 990, y: 50 } },
          Transitions: {},
        },
      ],
    });
    expect('Description' in document).toBe(false);
  });

  test('is deterministic', () => {
    const first = buildMenuFlow().compile();
    const second = buildMenuFlow().compile();
    expect(serializeDocument(first.document)).toBe(serializeDocument(second.document));
    expect(first.documentHash).toEqual(second.documentHash);
    expect(first.documentHash.algorithm).toBe('sha256');
    expect(first.documentHash.digest).toMatch(/^[0-9a-f]{64}$/);
  });

  test('writes error transitions under Errors after the other keys', () => {
    const flow = new FlowBuilder('Errors', { idGenerator: namedIds(['lambda', 'ok', 'failed', 'timeout']) });
    const lambda = flow.invokeLambda('{{LAMBDA_ARN}}');
    const ok = flow.playPrompt('Done');
    const failed = flow.playPrompt('Failed');
    const timeout = flow.playPrompt('Too slow');
    lambda.onError('NoMatchingError', failed).onError('TimeLimitExceeded', timeout).then(ok);

    const { document } = flow.compile();
    const action = document.Actions[0];
    expect(Object.keys(action.Transitions)).toEqual(['Success', 'Errors']);
    expect(action.Transitions.Errors).toEqual({ NoMatchingError: 'failed', TimeLimitExceeded: 'timeout' });
  });

  test('writes __proto__ condition values and error codes as real keys', () => {
    const flow = new FlowBuilder('Proto', { idGenerator: namedIds(['a', 'b', 'c']) });
    const a = flow.getInput('Choose');
    const b = flow.playPrompt('B');
    const c = flow.playPrompt('C');
    a.when('__proto__', b).onError('__proto__', c);

    const transitions = flow.compile().document.Actions[0].Transitions;
    expect(Object.keys(transitions)).toEqual(['__proto__', 'Errors']);
    expect(JSON.stringify(transitions)).toBe('{"__proto__":"b","Errors":{"__proto__":"c"}}');
  });

  test('passes template placeholders through byte for byte', () => {
    const flow = new FlowBuilder('Templates');
    flow.invokeLambda('{{LAMBDA_ARN}}', { Endpoint: '${env:API_URL}/v1' });
    const text = serializeDocument(flow.compile().document);
    expect(text).toContain('"LambdaFunctionARN": "{{LAMBDA_ARN}}"');
    expect(text).toContain('"Endpoint": "${env:API_URL}/v1"');
  });

  test('fails with UnresolvedReference for an edge to an unknown node', () => {
    const flow = new FlowBuilder('Dangling', { idGenerator: namedIds(['start']) });
    flow.playPrompt('Hi').then('ghost');

    const error = catchFlowError(() => flow.compile());
    expect(error.kind).toBe('UnresolvedReference');
    expect(error.typedError.details).toEqual({ from: 'start', to: 'ghost', edgeKind: 'sequential' });
  });

  test('fails with MissingEntryNode for an empty flow', () => {
    const error = catchFlowError(() => new FlowBuilder('Empty').compile());
    expect(error.kind).toBe('MissingEntryNode');
    expect(error.message).toBe('Flow has no entry node');
  });

  test('reports a missing entry before unresolved references', () => {
    const flow = new FlowBuilder('Both');
    flow.playPrompt('Hi').then('ghost');
    flow.setEntry('nowhere');

    const error = catchFlowError(() => flow.compile());
    expect(error.kind).toBe('MissingEntryNode');
    expect(error.message).toBe('Entry node "nowhere" does not exist');
  });

  test('compiles orphans with a warning instead of failing', () => {
    const flow = new FlowBuilder('Orphans', { idGenerator: namedIds(['start', 'end', 'lonely']) });
    flow.playPrompt('Hi').then(flow.disconnect());
    flow.playPrompt('Nobody calls me');

    const { document, warnings } = flow.compile();
    expect(document.Actions.map((a) => a.Identifier)).toEqual(['start', 'end', 'lonely']);
    expect(document.Actions[2].Metadata.position).toEqual({ x: 710, y: 50 });
    expect(warnings).toEqual([
      { code: 'LAYOUT.ORPHAN_NODE', message: 'Node "lonely" is not reachable from the entry node', nodeId: 'lonely' },
    ]);

    const warned = logs.entries.filter((e) => e.level === LogLevel.Warn);
    expect(warned).toHaveLength(1);
    expect(warned[0].message).toBe('Node "lonely" is not reachable from the entry node');
    expect(warned[0].context).toMatchObject({ module: 'compiler', flow: 'Orphans', nodeId: 'lonely' });
  });

  test('compiles loops without modification', () => {
    const flow = new FlowBuilder('Loop', { idGenerator: namedIds(['ask', 'retry']) });
    const ask = flow.getInput('Enter your account number');
    const retry = flow.playPrompt('Let us try again');
    ask.onError('InputTimeLimitExceeded', retry);
    retry.then(ask);

    const { document } = flow.compile();
    expect(document.Actions[0].Transitions).toEqual({ Errors: { InputTimeLimitExceeded: 'retry' } });
    expect(document.Actions[1].Transitions).toEqual({ Success: 'ask' });
  });

  test('writes extensions after known fields without overriding them', () => {
    const definition: FlowDefinition = {
      name: 'Extended',
      description: 'Has extras',
      version: '2019-10-30',
      nodes: [
        {
          id: 'a',
          type: 'FutureBlock',
          parameters: { Mode: 'x' },
          extensions: { Tags: ['beta'], Type: 'ShouldNotWin' },
        },
      ],
      edges: [],
      extensions: { Settings: { region: 'eu' }, StartAction: 'ignored' },
    };

    const { document } = compileFlow(definition);
    expect(document.Description).toBe('Has extras');
    expect(document.StartAction).toBe('a');
    expect(document.Settings).toEqual({ region: 'eu' });
    expect(Object.keys(document)).toEqual([
      'Version',
      'Name',
      'Description',
      'StartAction',
      'Metadata',
      'Actions',
      'Settings',
    ]);
    expect(document.Actions[0].Type).toBe('FutureBlock');
    expect(document.Actions[0].Tags).toEqual(['beta']);
    expect(Object.keys(document.Actions[0])).toEqual([
      'Identifier',
      'Type',
      'Parameters',
      'Metadata',
      'Transitions',
      'Tags',
    ]);
  });

  test('compiles plain definitions and applies graph rules to them', () => {
    const definition: FlowDefinition = {
      name: 'Plain',
      version: '2019-10-30',
      nodes: [
        { id: 'a', type: 'MessageParticipant', parameters: { Text: 'A' } },
        { id: 'b', type: 'DisconnectParticipant', parameters: {} },
      ],
      edges: [
        { kind: EdgeKind.Sequential, from: 'a', to: 'b' },
        { kind: EdgeKind.Sequential, from: 'a', to: 'a' },
      ],
    };
    expect(catchFlowError(() => compileFlow(definition)).kind).toBe('DuplicateEdgeKind');

    const { document } = compileFlow({ ...definition, edges: definition.edges.slice(0, 1) });
    expect(document.Actions[0].Transitions).toEqual({ Success: 'b' });
  });

  test('checks block parameters when given a catalog', () => {
    const flow = new FlowBuilder('Catalog', { idGenerator: namedIds(['prompt']) });
    flow.add({ id: 'prompt', type: 'MessageParticipant', parameters: {} });

    expect(() => flow.compile()).not.toThrow();
    const error = catchFlowError(() => flow.compile({ catalog: defaultBlockCatalog }));
    expect(error.kind).toBe('InvalidBlockParameters');
    expect(error.message).toBe('Node "prompt" (MessageParticipant): one of Text, PromptId, SSML, Media is required');
  });

  test('applies layout options', () => {
    const { document } = buildMenuFlow().compile({ layout: { columnSpacing: 100, rowSpacing: 50 } });
    const support = document.Actions.find((a) => a.Identifier === 'support');
    expect(support?.Metadata.position).toEqual({ x: 350, y: 100 });
  });
});
