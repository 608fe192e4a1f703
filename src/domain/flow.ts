/**
 * Flow graph domain model.
 *
 * A flow is a set of typed nodes (blocks) connected by labeled edges.
 * Edges reference nodes by id, so a flow may loop back on itself or point
 * at a node that is only added later.
 */

/** Any value that survives a JSON round trip. */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/** One action in a flow. */
export interface FlowNode {
  id: string;
  /** Block kind tag, e.g. "MessageParticipant". */
  type: string;
  /** Ordered, untyped parameter bag. Values pass through compile unchanged. */
  parameters: JsonObject;
  /** Action record fields the decompiler did not recognise. */
  extensions?: JsonObject;
}

/** Transition kinds. */
export enum EdgeKind {
  Sequential = 'sequential',
  Condition = 'condition',
  Default = 'default',
  Error = 'error',
}

export interface SequentialEdge {
  kind: EdgeKind.Sequential;
  from: string;
  to: string;
}

export interface ConditionEdge {
  kind: EdgeKind.Condition;
  from: string;
  to: string;
  matchValue: string;
}

export interface DefaultEdge {
  kind: EdgeKind.Default;
  from: string;
  to: string;
}

export interface ErrorEdge {
  kind: EdgeKind.Error;
  from: string;
  to: string;
  errorCode: string;
}

export type FlowEdge = SequentialEdge | ConditionEdge | DefaultEdge | ErrorEdge;

/** Rank of each kind when walking a node's outgoing transitions. */
export const EDGE_KIND_ORDER: Record<EdgeKind, number> = {
  [EdgeKind.Sequential]: 0,
  [EdgeKind.Condition]: 1,
  [EdgeKind.Default]: 2,
  [EdgeKind.Error]: 3,
};

/** Plain-data snapshot of a flow graph. */
export interface FlowDefinition {
  name: string;
  description?: string;
  /** Wire document version. */
  version: string;
  entryId?: string;
  nodes: FlowNode[];
  edges: FlowEdge[];
  /** Top-level document fields the decompiler did not recognise. */
  extensions?: JsonObject;
}

/** Non-fatal finding reported alongside a successful result. */
export interface FlowWarning {
  code: string;
  message: string;
  nodeId?: string;
}

/** Short label used in messages and generated source. */
export function describeEdge(edge: FlowEdge): string {
  switch (edge.kind) {
    case EdgeKind.Condition:
      return `condition "${edge.matchValue}"`;
    case EdgeKind.Error:
      return `error "${edge.errorCode}"`;
    default:
      return edge.kind;
  }
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Set `key` as an own enumerable property. Plain assignment would hit the
 * `__proto__` accessor and lose the entry.
 */
export function defineEntry(target: object, key: string, value: unknown): void {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}

export function cloneJson<T extends JsonValue>(value: T): T {
  return structuredClone(value);
}
