/**
 * Flow Compiler.
 *
 * Compiles a flow graph into the wire document consumed by the call-routing
 * engine. Compilation works from a snapshot of the graph, is pure, and is
 * deterministic: the same graph (built in the same order) always serializes
 * to the same bytes.
 */

import { createHash } from 'crypto';
import { EdgeKind, FlowDefinition, FlowEdge, FlowNode, FlowWarning, JsonObject, defineEntry } from '../domain/flow';
import { toFlowError } from '../domain/errors';
import { BlockCatalog } from '../blocks/catalog';
import { FlowGraph, indexOutgoing } from '../graph/flow-graph';
import { logger } from '../logger';
import { FlowLayout, LayoutOptions, computeLayout } from './layout';
import { validateFlow } from './validator';
import {
  ActionRecord,
  ActionTransitions,
  FlowDocument,
  KNOWN_ACTION_FIELDS,
  KNOWN_DOCUMENT_FIELDS,
  Position,
  TransitionKey,
} from './wire';

const log = logger.child({ module: 'compiler' });

/** Content hash of a compiled document. */
export interface HashRecord {
  algorithm: 'sha256';
  digest: string;
}

export interface CompileOptions {
  layout?: LayoutOptions;
  /** When given, block parameters are checked against it. */
  catalog?: BlockCatalog;
}

/** Compilation result. */
export interface CompilationResult {
  document: FlowDocument;
  layout: FlowLayout;
  /** Non-fatal findings such as orphaned nodes. */
  warnings: FlowWarning[];
  documentHash: HashRecord;
}

/**
 * Compile a flow into a wire document.
 *
 * @throws FlowError `MissingEntryNode` or `UnresolvedReference` for broken
 *   structure, `InvalidBlockParameters` when a catalog rejects a node.
 */
export function compileFlow(flow: FlowGraph | FlowDefinition, options: CompileOptions = {}): CompilationResult {
  // Snapshot; a plain definition is re-checked through the graph rules.
  const definition = flow instanceof FlowGraph ? flow.toDefinition() : FlowGraph.fromDefinition(flow).toDefinition();

  // Phase 1: Validate
  const validation = validateFlow(definition, { catalog: options.catalog });
  if (!validation.valid) {
    throw toFlowError(validation.errors[0]);
  }

  // Phase 2: Layout
  const layout = computeLayout(definition, options.layout);
  for (const warning of layout.warnings) {
    log.warn(warning.message, { flow: definition.name, nodeId: warning.nodeId, code: warning.code });
  }

  // Phase 3: Serialize
  const outgoing = indexOutgoing(definition);
  const actions = definition.nodes.map((node) =>
    compileAction(node, outgoing.get(node.id) ?? [], positionOf(layout, node.id)),
  );

  const document: FlowDocument = {
    Version: definition.version,
    Name: definition.name,
    ...(definition.description !== undefined ? { Description: definition.description } : {}),
    // Validation guarantees the entry exists.
    StartAction: definition.entryId ?? '',
    Metadata: {
      entryPointPosition: { x: 0, y: 0 },
      snapToGrid: false,
      Annotations: [],
    },
    Actions: actions,
    ...unknownFields(definition.extensions, KNOWN_DOCUMENT_FIELDS),
  };

  const documentHash = computeHash(JSON.stringify(document));
  const warnings = [...validation.warnings, ...layout.warnings];

  log.debug('Flow compiled', {
    flow: definition.name,
    actions: actions.length,
    transitions: definition.edges.length,
    orphans: layout.orphans.length,
    digest: documentHash.digest,
  });

  return { document, layout, warnings, documentHash };
}

/** Compile a single node into an action record. */
function compileAction(node: FlowNode, edges: FlowEdge[], position: Position): ActionRecord {
  return {
    Identifier: node.id,
    Type: node.type,
    Parameters: node.parameters,
    Metadata: { position },
    Transitions: compileTransitions(edges),
    ...unknownFields(node.extensions, KNOWN_ACTION_FIELDS),
  };
}

/** Edges arrive in outgoing order: sequential, conditions, default, errors. */
function compileTransitions(edges: FlowEdge[]): ActionTransitions {
  const transitions: ActionTransitions = {};
  const errors: Record<string, string> = {};

  for (const edge of edges) {
    switch (edge.kind) {
      case EdgeKind.Sequential:
        defineEntry(transitions, TransitionKey.Success, edge.to);
        break;
      case EdgeKind.Condition:
        defineEntry(transitions, edge.matchValue, edge.to);
        break;
      case EdgeKind.Default:
        defineEntry(transitions, TransitionKey.Default, edge.to);
        break;
      case EdgeKind.Error:
        defineEntry(errors, edge.errorCode, edge.to);
        break;
    }
  }

  if (Object.keys(errors).length > 0) {
    defineEntry(transitions, TransitionKey.Errors, errors);
  }
  return transitions;
}

function positionOf(layout: FlowLayout, nodeId: string): Position {
  const placement = layout.placements.get(nodeId);
  return placement ? { x: placement.x, y: placement.y } : { x: 0, y: 0 };
}

/** Extension fields minus any that would shadow a known field. */
function unknownFields(extensions: JsonObject | undefined, known: ReadonlySet<string>): JsonObject {
  const result: JsonObject = {};
  for (const [key, value] of Object.entries(extensions ?? {})) {
    if (!known.has(key)) defineEntry(result, key, value);
  }
  return result;
}

/** Render a document as JSON text. */
export function serializeDocument(document: FlowDocument, indent = 2): string {
  return JSON.stringify(document, null, indent);
}

function computeHash(data: string): HashRecord {
  const digest = createHash('sha256').update(data).digest('hex');
  return { algorithm: 'sha256', digest };
}
