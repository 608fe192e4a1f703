/**
 * Wire document schema.
 *
 * The JSON shape consumed by the call-routing engine. Field names here are
 * the compatibility surface: the compiler writes exactly these keys and the
 * decompiler reads them back.
 */

import { JsonObject } from '../domain/flow';

/** Document version written when a graph does not carry one. */
export const DEFAULT_DOCUMENT_VERSION = '2019-10-30';

/** Transition keys with a fixed meaning. */
export const TransitionKey = {
  Success: 'Success',
  Default: 'Default',
  Errors: 'Errors',
} as const;

/** Keys that can never be used as a condition value. */
export const RESERVED_TRANSITION_KEYS: ReadonlySet<string> = new Set(Object.values(TransitionKey));

/** Top-level fields the decompiler understands; anything else is kept opaquely. */
export const KNOWN_DOCUMENT_FIELDS: ReadonlySet<string> = new Set([
  'Version',
  'Name',
  'Description',
  'StartAction',
  'Metadata',
  'Actions',
]);

/** Action record fields the decompiler understands. */
export const KNOWN_ACTION_FIELDS: ReadonlySet<string> = new Set([
  'Identifier',
  'Type',
  'Parameters',
  'Metadata',
  'Transitions',
]);

export interface Position {
  x: number;
  y: number;
}

/**
 * Outgoing transitions of one action. Any key other than the three fixed
 * ones is a condition value mapped to its target id.
 */
export interface ActionTransitions {
  [conditionValue: string]: string | Record<string, string> | undefined;
  Success?: string;
  Default?: string;
  Errors?: Record<string, string>;
}

/** One node record. Unrecognised fields ride along after the known ones. */
export interface ActionRecord {
  [extension: string]: unknown;
  Identifier: string;
  Type: string;
  Parameters: JsonObject;
  Metadata: { position: Position };
  Transitions: ActionTransitions;
}

export interface DocumentMetadata {
  entryPointPosition: Position;
  snapToGrid: boolean;
  Annotations: JsonObject[];
}

export interface FlowDocument {
  [extension: string]: unknown;
  Version: string;
  Name: string;
  Description?: string;
  StartAction: string;
  Metadata: DocumentMetadata;
  Actions: ActionRecord[];
}
