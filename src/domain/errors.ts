/**
 * Typed error model for machine-actionable error handling.
 *
 * Every failure the core can raise is described by a TypedError value with a
 * namespaced code. Graph construction, compilation and decompilation throw a
 * FlowError wrapping that value; the HTTP layer unwraps it into a response.
 */

/** Top-level error domain namespaces. */
export type ErrorDomain =
  | 'GRAPH'
  | 'COMPILE'
  | 'DECOMPILE'
  | 'VALIDATION'
  | 'SYSTEM';

/** Typed suggested fix that callers can apply. */
export interface SuggestedFix {
  type: string;
  params: Record<string, unknown>;
  description?: string;
}

/** The core typed error structure returned in API responses. */
export interface TypedError {
  /** Namespaced error code (e.g., "GRAPH.DUPLICATE_NODE_ID"). */
  code: string;
  /** Human-readable error message. */
  message: string;
  /** Associated node if applicable. */
  nodeId?: string;
  /** Whether the same operation is expected to succeed without changes. */
  retryable: boolean;
  /** Structured detail payload. */
  details?: Record<string, unknown>;
  /** Machine-actionable remediation suggestions. */
  suggestedFixes: SuggestedFix[];
}

/** Create a typed error with defaults. */
export function createTypedError(params: {
  code: string;
  message: string;
  nodeId?: string;
  retryable?: boolean;
  details?: Record<string, unknown>;
  suggestedFixes?: SuggestedFix[];
}): TypedError {
  return {
    code: params.code,
    message: params.message,
    nodeId: params.nodeId,
    retryable: params.retryable ?? false,
    details: params.details,
    suggestedFixes: params.suggestedFixes ?? [],
  };
}

/** Error kinds raised by the core, mapped to their wire codes. */
export const FLOW_ERROR_CODES = {
  DuplicateNodeId: 'GRAPH.DUPLICATE_NODE_ID',
  DuplicateEdgeKind: 'GRAPH.DUPLICATE_EDGE_KIND',
  DuplicateConditionValue: 'GRAPH.DUPLICATE_CONDITION_VALUE',
  DuplicateErrorCode: 'GRAPH.DUPLICATE_ERROR_CODE',
  ReservedConditionValue: 'GRAPH.RESERVED_CONDITION_VALUE',
  InvalidNodeReference: 'GRAPH.INVALID_NODE_REFERENCE',
  UnresolvedReference: 'COMPILE.UNRESOLVED_REFERENCE',
  MissingEntryNode: 'COMPILE.MISSING_ENTRY_NODE',
  MalformedDocument: 'DECOMPILE.MALFORMED_DOCUMENT',
  UnknownTransitionKey: 'DECOMPILE.UNKNOWN_TRANSITION_KEY',
  DanglingTransition: 'DECOMPILE.DANGLING_TRANSITION',
  InvalidBlockParameters: 'VALIDATION.BLOCK_PARAMETERS',
} as const;

export type FlowErrorKind = keyof typeof FLOW_ERROR_CODES;

function isFlowErrorKind(value: string): value is FlowErrorKind {
  return Object.prototype.hasOwnProperty.call(FLOW_ERROR_CODES, value);
}

const KIND_BY_CODE = new Map<string, FlowErrorKind>();
for (const [kind, code] of Object.entries(FLOW_ERROR_CODES)) {
  if (isFlowErrorKind(kind)) KIND_BY_CODE.set(code, kind);
}

/** Resolve the error kind for a typed error code, if it is one of ours. */
export function flowErrorKindOf(code: string): FlowErrorKind | undefined {
  return KIND_BY_CODE.get(code);
}

/**
 * Thrown by graph construction, compilation and decompilation.
 * `kind` names the failure; `typedError` is the payload surfaced to callers.
 */
export class FlowError extends Error {
  public readonly kind: FlowErrorKind;

  constructor(kind: FlowErrorKind, public readonly typedError: TypedError) {
    super(typedError.message);
    this.name = 'FlowError';
    this.kind = kind;
  }

  get code(): string {
    return this.typedError.code;
  }
}

/** Wrap a typed error produced by one of the factories below. */
export function toFlowError(error: TypedError): FlowError {
  const kind = flowErrorKindOf(error.code);
  if (!kind) {
    throw new Error(`Not a flow error code: ${error.code}`);
  }
  return new FlowError(kind, error);
}

// --- Graph construction ---

export function duplicateNodeIdError(nodeId: string): TypedError {
  return createTypedError({
    code: FLOW_ERROR_CODES.DuplicateNodeId,
    message: `A node with id "${nodeId}" already exists`,
    nodeId,
    suggestedFixes: [
      { type: 'USE_UNIQUE_ID', params: { nodeId }, description: 'Give each node its own identifier' },
    ],
  });
}

export function duplicateEdgeKindError(nodeId: string, kind: string, existingTarget: string): TypedError {
  return createTypedError({
    code: FLOW_ERROR_CODES.DuplicateEdgeKind,
    message: `Node "${nodeId}" already has a ${kind} transition (to "${existingTarget}")`,
    nodeId,
    details: { kind, existingTarget },
  });
}

export function duplicateConditionValueError(nodeId: string, matchValue: string): TypedError {
  return createTypedError({
    code: FLOW_ERROR_CODES.DuplicateConditionValue,
    message: `Node "${nodeId}" already has a condition for "${matchValue}"`,
    nodeId,
    details: { matchValue },
  });
}

export function duplicateErrorCodeError(nodeId: string, errorCode: string): TypedError {
  return createTypedError({
    code: FLOW_ERROR_CODES.DuplicateErrorCode,
    message: `Node "${nodeId}" already handles error "${errorCode}"`,
    nodeId,
    details: { errorCode },
  });
}

export function reservedConditionValueError(nodeId: string, matchValue: string): TypedError {
  return createTypedError({
    code: FLOW_ERROR_CODES.ReservedConditionValue,
    message: `"${matchValue}" is a reserved transition key and cannot be used as a condition value`,
    nodeId,
    details: { matchValue },
  });
}

export function invalidNodeReferenceError(received: string): TypedError {
  return createTypedError({
    code: FLOW_ERROR_CODES.InvalidNodeReference,
    message: `Transition target must be a node id or a block handle, got ${received}`,
    details: { received },
  });
}

// --- Compilation ---

export function unresolvedReferenceError(fromId: string, toId: string, edgeKind: string): TypedError {
  return createTypedError({
    code: FLOW_ERROR_CODES.UnresolvedReference,
    message: `Transition from "${fromId}" targets unknown node "${toId}"`,
    nodeId: fromId,
    details: { from: fromId, to: toId, edgeKind },
    suggestedFixes: [
      { type: 'ADD_NODE', params: { nodeId: toId }, description: `Add a node with id "${toId}"` },
    ],
  });
}

export function missingEntryNodeError(entryId: string | undefined): TypedError {
  return createTypedError({
    code: FLOW_ERROR_CODES.MissingEntryNode,
    message: entryId !== undefined
      ? `Entry node "${entryId}" does not exist`
      : 'Flow has no entry node',
    details: { entryId },
    suggestedFixes: [
      { type: 'SET_ENTRY', params: {}, description: 'Add a node or set the entry to an existing node' },
    ],
  });
}

// --- Decompilation ---

export function malformedDocumentError(message: string, details?: Record<string, unknown>): TypedError {
  return createTypedError({
    code: FLOW_ERROR_CODES.MalformedDocument,
    message,
    details,
  });
}

export function unknownTransitionKeyError(nodeId: string, key: string): TypedError {
  return createTypedError({
    code: FLOW_ERROR_CODES.UnknownTransitionKey,
    message: `Action "${nodeId}" has transition key "${key}" that maps to no transition kind`,
    nodeId,
    details: { key },
  });
}

export function danglingTransitionError(nodeId: string, key: string, target: string): TypedError {
  return createTypedError({
    code: FLOW_ERROR_CODES.DanglingTransition,
    message: `Action "${nodeId}" transition "${key}" targets missing action "${target}"`,
    nodeId,
    details: { key, target },
  });
}

// --- Validation ---

export function invalidBlockParametersError(nodeId: string, type: string, message: string, field?: string): TypedError {
  return createTypedError({
    code: FLOW_ERROR_CODES.InvalidBlockParameters,
    message: `Node "${nodeId}" (${type}): ${message}`,
    nodeId,
    details: { type, field },
    suggestedFixes: field
      ? [{ type: 'SET_PARAMETER', params: { nodeId, field }, description: `Provide the "${field}" parameter` }]
      : [],
  });
}

export function validationError(message: string, details?: Record<string, unknown>): TypedError {
  return createTypedError({
    code: 'VALIDATION.SCHEMA',
    message,
    details,
  });
}

export function notFoundError(resourceType: string, resourceId: string): TypedError {
  return createTypedError({
    code: 'VALIDATION.NOT_FOUND',
    message: `${resourceType} not found: ${resourceId}`,
  });
}

/** API error response wrapper. */
export interface ApiErrorResponse {
  error: TypedError;
}

/** Construct an API error response. */
export function apiError(error: TypedError): ApiErrorResponse {
  return { error };
}
