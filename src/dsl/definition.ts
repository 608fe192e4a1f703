/**
 * Flow definition parsing.
 *
 * Turns untrusted JSON (an API request body, a file) into a FlowDefinition.
 * Only shape is checked here; graph rules such as unique ids are enforced
 * when the definition is loaded into a FlowGraph.
 */

import { EdgeKind, FlowDefinition, FlowEdge, FlowNode, JsonValue, isJsonObject } from '../domain/flow';
import { TypedError, createTypedError } from '../domain/errors';
import { DEFAULT_DOCUMENT_VERSION } from './wire';

export interface DefinitionParseResult {
  valid: boolean;
  definition?: FlowDefinition;
  errors: TypedError[];
}

const EDGE_KINDS: ReadonlySet<string> = new Set(Object.values(EdgeKind));

function isEdgeKind(value: unknown): value is EdgeKind {
  return typeof value === 'string' && EDGE_KINDS.has(value);
}

function schemaError(message: string, path: string): TypedError {
  return createTypedError({
    code: 'VALIDATION.SCHEMA',
    message,
    details: { path },
    suggestedFixes: [{ type: 'FIX_FIELD', params: { path }, description: `Correct "${path}"` }],
  });
}

export function parseFlowDefinition(input: unknown): DefinitionParseResult {
  const errors: TypedError[] = [];

  if (!isJsonObject(input)) {
    return { valid: false, errors: [schemaError('Flow definition must be an object', '$')] };
  }

  if (typeof input.name !== 'string' || input.name.length === 0) {
    errors.push(schemaError('"name" must be a non-empty string', 'name'));
  }
  for (const field of ['description', 'version', 'entryId']) {
    if (input[field] !== undefined && typeof input[field] !== 'string') {
      errors.push(schemaError(`"${field}" must be a string`, field));
    }
  }
  if (input.extensions !== undefined && !isJsonObject(input.extensions)) {
    errors.push(schemaError('"extensions" must be an object', 'extensions'));
  }

  const nodes: FlowNode[] = [];
  if (!Array.isArray(input.nodes)) {
    errors.push(schemaError('"nodes" must be an array', 'nodes'));
  } else {
    input.nodes.forEach((value, index) => {
      const node = parseNode(value, `nodes[${index}]`, errors);
      if (node) nodes.push(node);
    });
  }

  const edges: FlowEdge[] = [];
  const rawEdges = input.edges ?? [];
  if (!Array.isArray(rawEdges)) {
    errors.push(schemaError('"edges" must be an array', 'edges'));
  } else {
    rawEdges.forEach((value, index) => {
      const edge = parseEdge(value, `edges[${index}]`, errors);
      if (edge) edges.push(edge);
    });
  }

  if (errors.length > 0) {
    return { valid: false, errors };
  }

  const definition: FlowDefinition = {
    name: String(input.name),
    version: typeof input.version === 'string' ? input.version : DEFAULT_DOCUMENT_VERSION,
    nodes,
    edges,
  };
  if (typeof input.description === 'string') definition.description = input.description;
  if (typeof input.entryId === 'string') definition.entryId = input.entryId;
  if (isJsonObject(input.extensions)) definition.extensions = input.extensions;

  return { valid: true, definition, errors: [] };
}

function parseNode(value: JsonValue, path: string, errors: TypedError[]): FlowNode | undefined {
  if (!isJsonObject(value)) {
    errors.push(schemaError(`${path} must be an object`, path));
    return undefined;
  }
  const { id, type, parameters, extensions } = value;
  let ok = true;
  if (typeof id !== 'string') {
    errors.push(schemaError(`${path}.id must be a string`, `${path}.id`));
    ok = false;
  }
  if (typeof type !== 'string' || type.length === 0) {
    errors.push(schemaError(`${path}.type must be a non-empty string`, `${path}.type`));
    ok = false;
  }
  if (parameters !== undefined && !isJsonObject(parameters)) {
    errors.push(schemaError(`${path}.parameters must be an object`, `${path}.parameters`));
    ok = false;
  }
  if (extensions !== undefined && !isJsonObject(extensions)) {
    errors.push(schemaError(`${path}.extensions must be an object`, `${path}.extensions`));
    ok = false;
  }
  if (!ok || typeof id !== 'string' || typeof type !== 'string') return undefined;

  return {
    id,
    type,
    parameters: isJsonObject(parameters) ? parameters : {},
    ...(isJsonObject(extensions) ? { extensions } : {}),
  };
}

function parseEdge(value: JsonValue, path: string, errors: TypedError[]): FlowEdge | undefined {
  if (!isJsonObject(value)) {
    errors.push(schemaError(`${path} must be an object`, path));
    return undefined;
  }
  const { kind, from, to, matchValue, errorCode } = value;
  if (!isEdgeKind(kind)) {
    errors.push(schemaError(`${path}.kind must be one of ${[...EDGE_KINDS].join(', ')}`, `${path}.kind`));
    return undefined;
  }
  if (typeof from !== 'string' || typeof to !== 'string') {
    errors.push(schemaError(`${path}.from and ${path}.to must be strings`, path));
    return undefined;
  }

  switch (kind) {
    case EdgeKind.Condition:
      if (typeof matchValue !== 'string') {
        errors.push(schemaError(`${path}.matchValue must be a string`, `${path}.matchValue`));
        return undefined;
      }
      return { kind, from, to, matchValue };
    case EdgeKind.Error:
      if (typeof errorCode !== 'string') {
        errors.push(schemaError(`${path}.errorCode must be a string`, `${path}.errorCode`));
        return undefined;
      }
      return { kind, from, to, errorCode };
    case EdgeKind.Sequential:
    case EdgeKind.Default:
      return { kind, from, to };
  }
}
