/**
 * Flow Layout Engine
 *
 * Pure function that assigns every node a canvas position for the wire
 * document's metadata:
 *   1. Breadth-first walk from the entry node; a node's column (rank) is
 *      fixed the first time it is discovered, i.e. its shortest distance
 *      from the entry
 *   2. Rows within a column follow discovery order
 *   3. Nodes the walk never reaches go, in insertion order, to one trailing
 *      column and are reported as orphans
 *
 * A visited set bounds the walk, so loops terminate in O(nodes + edges).
 * Positions are cosmetic; they never affect routing.
 */

import { FlowDefinition, FlowWarning } from '../domain/flow';
import { indexOutgoing } from '../graph/flow-graph';
import { Position } from './wire';

/** Layout constants, in canvas pixels. The canvas grows right and down. */
export const ORIGIN_X = 150;
export const ORIGIN_Y = 50;
export const COLUMN_SPACING = 280;
export const ROW_SPACING = 180;

export const ORPHAN_WARNING_CODE = 'LAYOUT.ORPHAN_NODE';

export interface LayoutOptions {
  originX?: number;
  originY?: number;
  columnSpacing?: number;
  rowSpacing?: number;
}

/** Computed position of a single node */
export interface NodePlacement extends Position {
  id: string;
  rank: number;
  row: number;
  orphan: boolean;
}

/** Complete layout result */
export interface FlowLayout {
  /** Placements keyed by node id, in graph insertion order. */
  placements: Map<string, NodePlacement>;
  /** Number of columns used, including the orphan column. */
  columns: number;
  /** Orphan ids in insertion order. */
  orphans: string[];
  warnings: FlowWarning[];
}

export function computeLayout(definition: FlowDefinition, options: LayoutOptions = {}): FlowLayout {
  const originX = options.originX ?? ORIGIN_X;
  const originY = options.originY ?? ORIGIN_Y;
  const columnSpacing = options.columnSpacing ?? COLUMN_SPACING;
  const rowSpacing = options.rowSpacing ?? ROW_SPACING;

  const known = new Set(definition.nodes.map((n) => n.id));
  const outgoing = indexOutgoing(definition);

  // Phase 1: BFS ranks. Rank is set on discovery, so the first path found
  // is also the shortest.
  const rankOf = new Map<string, number>();
  const rowOf = new Map<string, number>();
  const rowsPerRank: number[] = [];

  const discover = (id: string, rank: number): void => {
    rankOf.set(id, rank);
    const row = rowsPerRank[rank] ?? 0;
    rowOf.set(id, row);
    rowsPerRank[rank] = row + 1;
  };

  const queue: string[] = [];
  if (definition.entryId !== undefined && known.has(definition.entryId)) {
    discover(definition.entryId, 0);
    queue.push(definition.entryId);
  }

  for (let head = 0; head < queue.length; head++) {
    const current = queue[head];
    const nextRank = (rankOf.get(current) ?? 0) + 1;
    for (const edge of outgoing.get(current) ?? []) {
      if (!known.has(edge.to) || rankOf.has(edge.to)) continue;
      discover(edge.to, nextRank);
      queue.push(edge.to);
    }
  }

  // Phase 2: orphans share one trailing column.
  const orphanRank = rowsPerRank.length;
  const orphans: string[] = [];
  for (const node of definition.nodes) {
    if (!rankOf.has(node.id)) {
      orphans.push(node.id);
      discover(node.id, orphanRank);
    }
  }

  // Phase 3: coordinates
  const placements = new Map<string, NodePlacement>();
  for (const node of definition.nodes) {
    const rank = rankOf.get(node.id) ?? orphanRank;
    const row = rowOf.get(node.id) ?? 0;
    placements.set(node.id, {
      id: node.id,
      rank,
      row,
      x: originX + rank * columnSpacing,
      y: originY + row * rowSpacing,
      orphan: rank === orphanRank,
    });
  }

  const warnings: FlowWarning[] = orphans.map((id) => ({
    code: ORPHAN_WARNING_CODE,
    message: `Node "${id}" is not reachable from the entry node`,
    nodeId: id,
  }));

  return {
    placements,
    columns: rowsPerRank.length,
    orphans,
    warnings,
  };
}
