/**
 * Flow Decompiler.
 *
 * Parses a wire document, whether or not this library produced it, back
 * into a flow graph. Layout metadata is discarded; every other field the
 * parser does not understand is kept on the node or graph so recompiling is
 * lossless.
 */

import {
  EdgeKind,
  FlowEdge,
  FlowNode,
  FlowWarning,
  JsonObject,
  JsonValue,
  cloneJson,
  defineEntry,
  isJsonObject,
} from '../domain/flow';
import {
  FlowError,
  danglingTransitionError,
  malformedDocumentError,
  unknownTransitionKeyError,
} from '../domain/errors';
import { FlowGraph } from '../graph/flow-graph';
import { logger } from '../logger';
import { computeLayout } from './layout';
import { DEFAULT_DOCUMENT_VERSION, KNOWN_ACTION_FIELDS, KNOWN_DOCUMENT_FIELDS, TransitionKey } from './wire';

const log = logger.child({ module: 'decompiler' });

export interface DecompilationResult {
  graph: FlowGraph;
  /** Orphaned actions and similar non-fatal findings. */
  warnings: FlowWarning[];
}

/**
 * Decompile a wire document.
 *
 * @throws FlowError `MalformedDocument`, `UnknownTransitionKey`,
 *   `DanglingTransition`, or `DuplicateNodeId` when two actions share an id.
 */
export function decompileFlow(source: unknown): DecompilationResult {
  if (!isJsonObject(source)) {
    throw malformed('Flow document must be a JSON object');
  }
  // The graph owns its parameter bags; never alias the caller's document.
  const input = cloneJson(source);

  const startAction = input.StartAction;
  if (typeof startAction !== 'string') {
    throw malformed('Flow document is missing "StartAction"', { field: 'StartAction' });
  }
  const actions = input.Actions;
  if (!Array.isArray(actions)) {
    throw malformed('Flow document is missing the "Actions" array', { field: 'Actions' });
  }

  const graph = new FlowGraph(optionalString(input, 'Name') ?? '', {
    description: optionalString(input, 'Description'),
    version: optionalString(input, 'Version') ?? DEFAULT_DOCUMENT_VERSION,
    extensions: pickUnknown(input, KNOWN_DOCUMENT_FIELDS),
  });

  // Pass 1: nodes, so that pass 2 can resolve targets regardless of order.
  const pending: Array<{ id: string; transitions: JsonObject }> = [];
  actions.forEach((record, index) => {
    const { node, transitions } = parseAction(record, index);
    graph.addNode(node);
    pending.push({ id: node.id, transitions });
  });

  if (!graph.hasNode(startAction)) {
    throw malformed(`StartAction "${startAction}" does not match any action`, { field: 'StartAction', startAction });
  }
  graph.setEntry(startAction);

  // Pass 2: transitions
  for (const { id, transitions } of pending) {
    for (const edge of parseTransitions(id, transitions)) {
      if (!graph.hasNode(edge.to)) {
        throw new FlowError('DanglingTransition', danglingTransitionError(id, transitionLabel(edge), edge.to));
      }
      graph.addEdge(edge);
    }
  }

  const { warnings } = computeLayout(graph.toDefinition());

  log.debug('Flow decompiled', {
    flow: graph.name,
    actions: graph.size,
    transitions: graph.edges.length,
    orphans: warnings.length,
  });

  return { graph, warnings };
}

function parseAction(record: JsonValue, index: number): { node: FlowNode; transitions: JsonObject } {
  if (!isJsonObject(record)) {
    throw malformed(`Action at index ${index} is not an object`, { index });
  }
  const id = record.Identifier;
  if (typeof id !== 'string') {
    throw malformed(`Action at index ${index} has no "Identifier"`, { index, field: 'Identifier' });
  }
  const type = record.Type;
  if (typeof type !== 'string') {
    throw malformed(`Action "${id}" has no "Type"`, { index, field: 'Type' });
  }

  const parameters = optionalObject(record, 'Parameters', id) ?? {};
  const transitions = optionalObject(record, 'Transitions', id) ?? {};
  // Layout metadata is validated for shape and then dropped.
  optionalObject(record, 'Metadata', id);

  const extensions = pickUnknown(record, KNOWN_ACTION_FIELDS);
  const node: FlowNode = {
    id,
    type,
    parameters,
    ...(Object.keys(extensions).length > 0 ? { extensions } : {}),
  };
  return { node, transitions };
}

/**
 * Map transition keys to edges: Success, condition values, Default, then the
 * Errors mapping. Keys whose value is not a target id cannot be mapped.
 */
function parseTransitions(nodeId: string, transitions: JsonObject): FlowEdge[] {
  const sequential: FlowEdge[] = [];
  const conditions: FlowEdge[] = [];
  const defaults: FlowEdge[] = [];
  const errors: FlowEdge[] = [];

  for (const [key, value] of Object.entries(transitions)) {
    if (key === TransitionKey.Errors) {
      if (!isJsonObject(value)) {
        throw new FlowError('UnknownTransitionKey', unknownTransitionKeyError(nodeId, key));
      }
      for (const [errorCode, target] of Object.entries(value)) {
        if (typeof target !== 'string') {
          throw new FlowError('UnknownTransitionKey', unknownTransitionKeyError(nodeId, `${key}.${errorCode}`));
        }
        errors.push({ kind: EdgeKind.Error, from: nodeId, to: target, errorCode });
      }
      continue;
    }

    if (typeof value !== 'string') {
      throw new FlowError('UnknownTransitionKey', unknownTransitionKeyError(nodeId, key));
    }

    if (key === TransitionKey.Success) {
      sequential.push({ kind: EdgeKind.Sequential, from: nodeId, to: value });
    } else if (key === TransitionKey.Default) {
      defaults.push({ kind: EdgeKind.Default, from: nodeId, to: value });
    } else {
      conditions.push({ kind: EdgeKind.Condition, from: nodeId, to: value, matchValue: key });
    }
  }

  return [...sequential, ...conditions, ...defaults, ...errors];
}

function transitionLabel(edge: FlowEdge): string {
  switch (edge.kind) {
    case EdgeKind.Sequential:
      return TransitionKey.Success;
    case EdgeKind.Default:
      return TransitionKey.Default;
    case EdgeKind.Condition:
      return edge.matchValue;
    case EdgeKind.Error:
      return `${TransitionKey.Errors}.${edge.errorCode}`;
  }
}

function optionalString(source: JsonObject, field: string): string | undefined {
  const value = source[field];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    throw malformed(`Flow document field "${field}" must be a string`, { field });
  }
  return value;
}

function optionalObject(record: JsonObject, field: string, id: string): JsonObject | undefined {
  const value = record[field];
  if (value === undefined) return undefined;
  if (!isJsonObject(value)) {
    throw malformed(`Action "${id}" field "${field}" must be an object`, { nodeId: id, field });
  }
  return value;
}

function pickUnknown(source: JsonObject, known: ReadonlySet<string>): JsonObject {
  const result: JsonObject = {};
  for (const [key, value] of Object.entries(source)) {
    if (!known.has(key)) defineEntry(result, key, value);
  }
  return result;
}

function malformed(message: string, details?: Record<string, unknown>): FlowError {
  return new FlowError('MalformedDocument', malformedDocumentError(message, details));
}
