/**
 * In-memory flow graph.
 *
 * Nodes live in an insertion-ordered table keyed by id; edges are stored by
 * id, never by object reference, so an edge may point at a node that has not
 * been added yet. Structural rules that can be checked at insertion time
 * (unique ids, edge multiplicity) are enforced here. References are checked
 * when the graph is compiled.
 */

import {
  EDGE_KIND_ORDER,
  EdgeKind,
  FlowDefinition,
  FlowEdge,
  FlowNode,
  JsonObject,
  cloneJson,
} from '../domain/flow';
import {
  FlowError,
  duplicateConditionValueError,
  duplicateEdgeKindError,
  duplicateErrorCodeError,
  duplicateNodeIdError,
  reservedConditionValueError,
} from '../domain/errors';
import { RESERVED_TRANSITION_KEYS, DEFAULT_DOCUMENT_VERSION } from '../dsl/wire';

export interface FlowGraphOptions {
  description?: string;
  version?: string;
  extensions?: JsonObject;
}

export class FlowGraph {
  readonly name: string;
  description?: string;
  readonly version: string;
  readonly extensions: JsonObject;

  private readonly nodeTable = new Map<string, FlowNode>();
  private readonly edgeList: FlowEdge[] = [];
  private readonly outgoingByNode = new Map<string, FlowEdge[]>();
  private entry?: string;

  constructor(name: string, options: FlowGraphOptions = {}) {
    this.name = name;
    this.description = options.description;
    this.version = options.version ?? DEFAULT_DOCUMENT_VERSION;
    this.extensions = options.extensions ?? {};
  }

  /** Rebuild a graph from a snapshot, re-checking every insertion rule. */
  static fromDefinition(definition: FlowDefinition): FlowGraph {
    const graph = new FlowGraph(definition.name, {
      description: definition.description,
      version: definition.version,
      extensions: definition.extensions ? cloneJson(definition.extensions) : undefined,
    });
    for (const node of definition.nodes) {
      graph.addNode({
        id: node.id,
        type: node.type,
        parameters: cloneJson(node.parameters),
        ...(node.extensions ? { extensions: cloneJson(node.extensions) } : {}),
      });
    }
    for (const edge of definition.edges) {
      graph.addEdge({ ...edge });
    }
    if (definition.entryId !== undefined) {
      graph.setEntry(definition.entryId);
    }
    return graph;
  }

  get nodes(): readonly FlowNode[] {
    return [...this.nodeTable.values()];
  }

  get edges(): readonly FlowEdge[] {
    return this.edgeList;
  }

  get size(): number {
    return this.nodeTable.size;
  }

  /** The designated entry node id; the first node added unless set explicitly. */
  get entryId(): string | undefined {
    return this.entry;
  }

  /** Point the entry at any id. An unknown id is reported at compile time. */
  setEntry(nodeId: string): void {
    this.entry = nodeId;
  }

  hasNode(nodeId: string): boolean {
    return this.nodeTable.has(nodeId);
  }

  getNode(nodeId: string): FlowNode | undefined {
    return this.nodeTable.get(nodeId);
  }

  addNode<T extends FlowNode>(node: T): T {
    if (this.nodeTable.has(node.id)) {
      throw new FlowError('DuplicateNodeId', duplicateNodeIdError(node.id));
    }
    this.nodeTable.set(node.id, node);
    if (this.entry === undefined) {
      this.entry = node.id;
    }
    return node;
  }

  addEdge<T extends FlowEdge>(edge: T): T {
    const existing = this.outgoingByNode.get(edge.from) ?? [];
    this.assertCanAdd(edge, existing);
    existing.push(edge);
    this.outgoingByNode.set(edge.from, existing);
    this.edgeList.push(edge);
    return edge;
  }

  /**
   * Outgoing edges of a node: sequential, conditions, default, errors.
   * Numeric condition values and error codes sort ascending ahead of the
   * rest, which keep their insertion order.
   */
  outgoing(nodeId: string): FlowEdge[] {
    const edges = this.outgoingByNode.get(nodeId) ?? [];
    return sortOutgoing(edges);
  }

  /** Deep-copied plain-data snapshot. */
  toDefinition(): FlowDefinition {
    const definition: FlowDefinition = {
      name: this.name,
      version: this.version,
      entryId: this.entry,
      nodes: this.nodes.map((node) => ({
        id: node.id,
        type: node.type,
        parameters: cloneJson(node.parameters),
        ...(node.extensions ? { extensions: cloneJson(node.extensions) } : {}),
      })),
      edges: this.edgeList.map((edge) => ({ ...edge })),
    };
    if (this.description !== undefined) definition.description = this.description;
    if (Object.keys(this.extensions).length > 0) definition.extensions = cloneJson(this.extensions);
    return definition;
  }

  private assertCanAdd(edge: FlowEdge, existing: FlowEdge[]): void {
    switch (edge.kind) {
      case EdgeKind.Sequential:
      case EdgeKind.Default: {
        const clash = existing.find((e) => e.kind === edge.kind);
        if (clash) {
          throw new FlowError('DuplicateEdgeKind', duplicateEdgeKindError(edge.from, edge.kind, clash.to));
        }
        return;
      }
      case EdgeKind.Condition: {
        if (RESERVED_TRANSITION_KEYS.has(edge.matchValue)) {
          throw new FlowError('ReservedConditionValue', reservedConditionValueError(edge.from, edge.matchValue));
        }
        if (existing.some((e) => e.kind === EdgeKind.Condition && e.matchValue === edge.matchValue)) {
          throw new FlowError('DuplicateConditionValue', duplicateConditionValueError(edge.from, edge.matchValue));
        }
        return;
      }
      case EdgeKind.Error: {
        if (existing.some((e) => e.kind === EdgeKind.Error && e.errorCode === edge.errorCode)) {
          throw new FlowError('DuplicateErrorCode', duplicateErrorCodeError(edge.from, edge.errorCode));
        }
        return;
      }
    }
  }
}

const MAX_ARRAY_INDEX = 2 ** 32 - 2;

/** Canonical array-index strings ("0", "7", not "07"), which JSON objects enumerate first. */
function arrayIndexOf(key: string): number | undefined {
  if (!/^(0|[1-9][0-9]*)$/.test(key)) return undefined;
  const value = Number(key);
  return value <= MAX_ARRAY_INDEX ? value : undefined;
}

function transitionKey(edge: FlowEdge): string | undefined {
  switch (edge.kind) {
    case EdgeKind.Condition:
      return edge.matchValue;
    case EdgeKind.Error:
      return edge.errorCode;
    default:
      return undefined;
  }
}

/**
 * Order keyed edges the way their keys enumerate once written to a
 * Transitions object: array indices ascending, then insertion order.
 */
function compareKeys(a: string | undefined, b: string | undefined): number {
  const ai = a === undefined ? undefined : arrayIndexOf(a);
  const bi = b === undefined ? undefined : arrayIndexOf(b);
  if (ai !== undefined && bi !== undefined) return ai - bi;
  if (ai !== undefined) return -1;
  if (bi !== undefined) return 1;
  return 0;
}

/**
 * Outgoing order shared by layout, compile and decompile: kind first, then
 * key enumeration order, then insertion order.
 */
export function sortOutgoing(edges: readonly FlowEdge[]): FlowEdge[] {
  return edges
    .map((edge, index) => ({ edge, index }))
    .sort(
      (a, b) =>
        EDGE_KIND_ORDER[a.edge.kind] - EDGE_KIND_ORDER[b.edge.kind] ||
        compareKeys(transitionKey(a.edge), transitionKey(b.edge)) ||
        a.index - b.index,
    )
    .map(({ edge }) => edge);
}

/** Group a definition's edges by source node, in outgoing order. */
export function indexOutgoing(definition: FlowDefinition): Map<string, FlowEdge[]> {
  const grouped = new Map<string, FlowEdge[]>();
  for (const edge of definition.edges) {
    const list = grouped.get(edge.from) ?? [];
    list.push(edge);
    grouped.set(edge.from, list);
  }
  for (const [id, list] of grouped) {
    grouped.set(id, sortOutgoing(list));
  }
  return grouped;
}
