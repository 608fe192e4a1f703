/**
 * Flow Validator.
 *
 * Checks a flow graph for the structural problems that make it impossible to
 * compile: a missing entry node and transitions that point nowhere. With a
 * block catalog it also reports parameter problems for known block types.
 * Never throws; the compiler decides what to do with the result.
 */

import { FlowDefinition, FlowWarning, describeEdge } from '../domain/flow';
import {
  TypedError,
  invalidBlockParametersError,
  missingEntryNodeError,
  unresolvedReferenceError,
} from '../domain/errors';
import { BlockCatalog } from '../blocks/catalog';
import { FlowGraph } from '../graph/flow-graph';

export const UNKNOWN_BLOCK_TYPE_WARNING = 'VALIDATION.UNKNOWN_BLOCK_TYPE';

/** Validation result. */
export interface ValidationResult {
  valid: boolean;
  errors: TypedError[];
  warnings: FlowWarning[];
}

export interface ValidateOptions {
  catalog?: BlockCatalog;
}

/** Validate a flow. Errors are ordered: entry first, then edges as added. */
export function validateFlow(
  flow: FlowGraph | FlowDefinition,
  options: ValidateOptions = {},
): ValidationResult {
  const definition = flow instanceof FlowGraph ? flow.toDefinition() : flow;
  const errors: TypedError[] = [];
  const warnings: FlowWarning[] = [];

  const known = new Set(definition.nodes.map((n) => n.id));

  validateEntry(definition, known, errors);
  validateReferences(definition, known, errors);
  if (options.catalog) {
    validateBlocks(definition, options.catalog, errors, warnings);
  }

  return { valid: errors.length === 0, errors, warnings };
}

function validateEntry(definition: FlowDefinition, known: Set<string>, errors: TypedError[]): void {
  if (definition.entryId === undefined || !known.has(definition.entryId)) {
    errors.push(missingEntryNodeError(definition.entryId));
  }
}

function validateReferences(definition: FlowDefinition, known: Set<string>, errors: TypedError[]): void {
  for (const edge of definition.edges) {
    if (!known.has(edge.from)) {
      errors.push(unresolvedReferenceError(edge.from, edge.from, describeEdge(edge)));
      continue;
    }
    if (!known.has(edge.to)) {
      errors.push(unresolvedReferenceError(edge.from, edge.to, describeEdge(edge)));
    }
  }
}

function validateBlocks(
  definition: FlowDefinition,
  catalog: BlockCatalog,
  errors: TypedError[],
  warnings: FlowWarning[],
): void {
  for (const node of definition.nodes) {
    if (!catalog.has(node.type)) {
      warnings.push({
        code: UNKNOWN_BLOCK_TYPE_WARNING,
        message: `Node "${node.id}" has block type "${node.type}" that the catalog does not know`,
        nodeId: node.id,
      });
      continue;
    }
    for (const issue of catalog.validate(node.type, node.parameters)) {
      errors.push(invalidBlockParametersError(node.id, node.type, issue.message, issue.field));
    }
  }
}
