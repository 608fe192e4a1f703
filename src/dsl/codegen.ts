/**
 * Builder source renderer.
 *
 * Renders a flow as TypeScript that rebuilds it through FlowBuilder. Every
 * node goes through `add` with its original id, so the rendered program
 * reproduces the decompiled graph exactly, including block types the
 * builder has no convenience method for.
 */

import { EdgeKind, FlowDefinition, FlowEdge } from '../domain/flow';
import { FlowGraph } from '../graph/flow-graph';
import { DEFAULT_DOCUMENT_VERSION } from './wire';

export interface RenderOptions {
  /** Module specifier the generated code imports FlowBuilder from. */
  importPath?: string;
}

export const DEFAULT_IMPORT_PATH = 'callflow-kit';

const literal = (value: unknown): string => JSON.stringify(value);

/** Derive a unique, valid identifier for each node id. */
function assignVariables(ids: string[]): Map<string, string> {
  const used = new Set<string>(['flow']);
  const names = new Map<string, string>();
  for (const id of ids) {
    const base = `node_${id.replace(/[^A-Za-z0-9_$]/g, '_')}`;
    let name = base;
    for (let n = 2; used.has(name); n++) {
      name = `${base}_${n}`;
    }
    used.add(name);
    names.set(id, name);
  }
  return names;
}

function renderEdge(edge: FlowEdge, target: string): string {
  switch (edge.kind) {
    case EdgeKind.Sequential:
      return `then(${target})`;
    case EdgeKind.Condition:
      return `when(${literal(edge.matchValue)}, ${target})`;
    case EdgeKind.Default:
      return `otherwise(${target})`;
    case EdgeKind.Error:
      return `onError(${literal(edge.errorCode)}, ${target})`;
  }
}

export function renderBuilderSource(flow: FlowGraph | FlowDefinition, options: RenderOptions = {}): string {
  const definition = flow instanceof FlowGraph ? flow.toDefinition() : flow;
  const variables = assignVariables(definition.nodes.map((n) => n.id));
  const ref = (id: string): string => variables.get(id) ?? literal(id);

  const builderOptions: string[] = [];
  if (definition.description !== undefined) builderOptions.push(`description: ${literal(definition.description)}`);
  if (definition.version !== DEFAULT_DOCUMENT_VERSION) builderOptions.push(`version: ${literal(definition.version)}`);
  if (definition.extensions && Object.keys(definition.extensions).length > 0) {
    builderOptions.push(`extensions: ${literal(definition.extensions)}`);
  }

  const lines: string[] = [
    `import { FlowBuilder } from ${literal(options.importPath ?? DEFAULT_IMPORT_PATH)};`,
    '',
    builderOptions.length > 0
      ? `const flow = new FlowBuilder(${literal(definition.name)}, { ${builderOptions.join(', ')} });`
      : `const flow = new FlowBuilder(${literal(definition.name)});`,
  ];

  if (definition.nodes.length > 0) lines.push('');
  for (const node of definition.nodes) {
    const fields = [`id: ${literal(node.id)}`, `type: ${literal(node.type)}`];
    if (Object.keys(node.parameters).length > 0) fields.push(`parameters: ${literal(node.parameters)}`);
    if (node.extensions) fields.push(`extensions: ${literal(node.extensions)}`);
    lines.push(`const ${ref(node.id)} = flow.add({ ${fields.join(', ')} });`);
  }

  if (definition.edges.length > 0) lines.push('');
  for (const edge of definition.edges) {
    const source = variables.get(edge.from);
    const call = renderEdge(edge, ref(edge.to));
    lines.push(source ? `${source}.${call};` : `flow.handle(${literal(edge.from)})?.${call};`);
  }

  if (definition.entryId !== undefined) {
    lines.push('', `flow.setEntry(${ref(definition.entryId)});`);
  }

  lines.push('', 'export default flow;', '');
  return lines.join('\n');
}
