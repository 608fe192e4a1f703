/**
 * Block catalog.
 *
 * The graph core treats parameters as an open bag. Knowledge of which keys a
 * block type needs lives behind the BlockCatalog interface so callers can plug
 * in their own rules; the default catalog only checks presence of the keys
 * the engine refuses to run without.
 */

import { JsonObject } from '../domain/flow';

/** Block type tags with a convenience constructor on the builder. */
export const BlockType = {
  MessageParticipant: 'MessageParticipant',
  GetParticipantInput: 'GetParticipantInput',
  DisconnectParticipant: 'DisconnectParticipant',
  TransferToFlow: 'TransferToFlow',
  InvokeLambdaFunction: 'InvokeLambdaFunction',
  CheckHoursOfOperation: 'CheckHoursOfOperation',
  UpdateContactAttributes: 'UpdateContactAttributes',
  UpdateContactTargetQueue: 'UpdateContactTargetQueue',
  ConnectParticipantWithLexBot: 'ConnectParticipantWithLexBot',
  ShowView: 'ShowView',
  EndFlowExecution: 'EndFlowExecution',
} as const;

export type KnownBlockType = (typeof BlockType)[keyof typeof BlockType];

/** One problem found in a node's parameters. */
export interface BlockIssue {
  message: string;
  field?: string;
}

export interface BlockCatalog {
  has(type: string): boolean;
  validate(type: string, parameters: JsonObject): BlockIssue[];
}

export interface BlockDefinition {
  type: string;
  description: string;
  /** Keys that must be present. */
  required?: string[];
  /** Groups of keys of which exactly one must be present. */
  exclusive?: string[][];
}

const PROMPT_KEYS = ['Text', 'PromptId', 'SSML', 'Media'];

export const DEFAULT_BLOCK_DEFINITIONS: BlockDefinition[] = [
  { type: BlockType.MessageParticipant, description: 'Play a prompt', exclusive: [PROMPT_KEYS] },
  {
    type: BlockType.GetParticipantInput,
    description: 'Gather DTMF or text input',
    required: ['InputTimeLimitSeconds', 'StoreInput'],
    exclusive: [PROMPT_KEYS],
  },
  { type: BlockType.DisconnectParticipant, description: 'Hang up' },
  { type: BlockType.TransferToFlow, description: 'Hand the contact to another flow', required: ['ContactFlowId'] },
  {
    type: BlockType.InvokeLambdaFunction,
    description: 'Call a Lambda function',
    required: ['LambdaFunctionARN', 'InvocationTimeLimitSeconds'],
  },
  { type: BlockType.CheckHoursOfOperation, description: 'Branch on business hours' },
  { type: BlockType.UpdateContactAttributes, description: 'Set contact attributes', required: ['Attributes'] },
  { type: BlockType.UpdateContactTargetQueue, description: 'Set the target queue', required: ['QueueId'] },
  {
    type: BlockType.ConnectParticipantWithLexBot,
    description: 'Hand the participant to a Lex bot',
    exclusive: [['LexV2Bot', 'LexBot']],
  },
  { type: BlockType.ShowView, description: 'Show an agent workspace view', required: ['ViewResource'] },
  { type: BlockType.EndFlowExecution, description: 'End the current flow' },
];

export function createBlockCatalog(definitions: BlockDefinition[]): BlockCatalog {
  const byType = new Map(definitions.map((d) => [d.type, d]));

  return {
    has: (type) => byType.has(type),
    validate: (type, parameters) => {
      const definition = byType.get(type);
      if (!definition) return [];

      const issues: BlockIssue[] = [];
      for (const field of definition.required ?? []) {
        if (parameters[field] === undefined || parameters[field] === null) {
          issues.push({ message: `missing required parameter "${field}"`, field });
        }
      }
      for (const group of definition.exclusive ?? []) {
        const present = group.filter((field) => parameters[field] !== undefined);
        if (present.length === 0) {
          issues.push({ message: `one of ${group.join(', ')} is required`, field: group[0] });
        } else if (present.length > 1) {
          issues.push({ message: `only one of ${present.join(', ')} may be set` });
        }
      }
      return issues;
    },
  };
}

export const defaultBlockCatalog: BlockCatalog = createBlockCatalog(DEFAULT_BLOCK_DEFINITIONS);
