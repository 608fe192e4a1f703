/**
 * Flow builder.
 *
 * Fluent construction API over a FlowGraph. Convenience constructors create
 * the common block kinds and return a BlockHandle; the connection verbs on a
 * handle add edges to the shared graph and return the same handle, so several
 * connections from one node can be chained:
 *
 * ```ts
 * const flow = new FlowBuilder('Main menu');
 * const menu = flow.getInput('Press 1 for sales, 2 for support');
 * const sales = flow.transferToFlow('{{SALES_FLOW_ID}}');
 * const bye = flow.disconnect();
 * menu.when('1', sales).when('2', 'support-flow').otherwise(bye);
 * flow.add({ id: 'support-flow', type: 'TransferToFlow', parameters: { ContactFlowId: '{{SUPPORT_FLOW_ID}}' } });
 * const { document } = flow.compile();
 * ```
 *
 * Targets may be handles or raw ids; an id that does not exist yet is
 * accepted and checked when the flow is compiled.
 */

import { v4 as uuid } from 'uuid';
import { EdgeKind, FlowNode, JsonObject, JsonValue, defineEntry } from '../domain/flow';
import { FlowError, invalidNodeReferenceError } from '../domain/errors';
import { BlockType } from '../blocks/catalog';
import { CompilationResult, CompileOptions, compileFlow } from '../dsl/compiler';
import { FlowGraph } from './flow-graph';

/** A node handle or a raw node id. */
export type NodeRef = BlockHandle | string;

/**
 * Resolve a connection target. Anything else (such as the resolver a Promise
 * passes when a handle is awaited) is rejected before it reaches the graph.
 */
function refId(target: NodeRef): string {
  if (typeof target === 'string') return target;
  if (target instanceof BlockHandle) return target.id;
  throw new FlowError('InvalidNodeReference', invalidNodeReferenceError(typeof target));
}

/** Handle onto a node registered with a builder. */
export class BlockHandle {
  constructor(
    private readonly graph: FlowGraph,
    readonly node: FlowNode,
  ) {}

  get id(): string {
    return this.node.id;
  }

  get type(): string {
    return this.node.type;
  }

  /** Live parameter bag; edits are picked up by the next compile. */
  get parameters(): JsonObject {
    return this.node.parameters;
  }

  set(key: string, value: JsonValue): this {
    defineEntry(this.node.parameters, key, value);
    return this;
  }

  /** Continue to `target` when this block succeeds. */
  then(target: NodeRef): this {
    this.graph.addEdge({ kind: EdgeKind.Sequential, from: this.id, to: refId(target) });
    return this;
  }

  /** Branch to `target` when the block's result equals `matchValue`. */
  when(matchValue: string, target: NodeRef): this {
    this.graph.addEdge({ kind: EdgeKind.Condition, from: this.id, to: refId(target), matchValue });
    return this;
  }

  /** Branch to `target` when no condition matches. */
  otherwise(target: NodeRef): this {
    this.graph.addEdge({ kind: EdgeKind.Default, from: this.id, to: refId(target) });
    return this;
  }

  /** Branch to `target` when the block fails with `errorCode`. */
  onError(errorCode: string, target: NodeRef): this {
    this.graph.addEdge({ kind: EdgeKind.Error, from: this.id, to: refId(target), errorCode });
    return this;
  }
}

/** Node accepted by `FlowBuilder.add`; an id is generated when absent. */
export interface NodeInput {
  id?: string;
  type: string;
  parameters?: JsonObject;
  extensions?: JsonObject;
}

export interface FlowBuilderOptions {
  description?: string;
  version?: string;
  /** Top-level document fields written verbatim by the compiler. */
  extensions?: JsonObject;
  /** Source of ids for convenience constructors. Defaults to random UUIDs. */
  idGenerator?: () => string;
}

export interface GetInputOptions {
  timeoutSeconds?: number;
  storeInput?: boolean;
}

export interface InvokeLambdaOptions {
  timeoutSeconds?: string;
  [parameter: string]: JsonValue | undefined;
}

export interface LexBotOptions {
  text?: string;
  lexV2AliasArn?: string;
  [parameter: string]: JsonValue | undefined;
}

/** Drop undefined entries so optional options never reach the wire. */
function definedEntries(values: Record<string, JsonValue | undefined>): JsonObject {
  const result: JsonObject = {};
  for (const [key, value] of Object.entries(values)) {
    if (value !== undefined) defineEntry(result, key, value);
  }
  return result;
}

export class FlowBuilder {
  readonly graph: FlowGraph;
  private readonly handles = new Map<string, BlockHandle>();
  private readonly nextId: () => string;

  constructor(name: string, options: FlowBuilderOptions = {}) {
    this.graph = new FlowGraph(name, {
      description: options.description,
      version: options.version,
      extensions: options.extensions,
    });
    this.nextId = options.idGenerator ?? (() => uuid());
  }

  /** Register any node; use for block kinds without a convenience method. */
  add(input: NodeInput): BlockHandle {
    const node: FlowNode = {
      id: input.id ?? this.nextId(),
      type: input.type,
      parameters: input.parameters ?? {},
      ...(input.extensions ? { extensions: input.extensions } : {}),
    };
    this.graph.addNode(node);
    const handle = new BlockHandle(this.graph, node);
    this.handles.set(node.id, handle);
    return handle;
  }

  /** Handle for a node registered with this builder. */
  handle(nodeId: string): BlockHandle | undefined {
    return this.handles.get(nodeId);
  }

  /** Override the entry node (the first node added by default). */
  setEntry(target: NodeRef): this {
    this.graph.setEntry(refId(target));
    return this;
  }

  playPrompt(text: string): BlockHandle {
    return this.add({ type: BlockType.MessageParticipant, parameters: { Text: text } });
  }

  getInput(text: string, options: GetInputOptions = {}): BlockHandle {
    return this.add({
      type: BlockType.GetParticipantInput,
      parameters: {
        Text: text,
        InputTimeLimitSeconds: String(options.timeoutSeconds ?? 5),
        StoreInput: options.storeInput ? 'True' : 'False',
      },
    });
  }

  disconnect(): BlockHandle {
    return this.add({ type: BlockType.DisconnectParticipant });
  }

  transferToFlow(contactFlowId: string): BlockHandle {
    return this.add({ type: BlockType.TransferToFlow, parameters: { ContactFlowId: contactFlowId } });
  }

  /** `functionArn` may be a deployment placeholder such as `{{LAMBDA_ARN}}`. */
  invokeLambda(functionArn: string, options: InvokeLambdaOptions = {}): BlockHandle {
    const { timeoutSeconds, ...extra } = options;
    return this.add({
      type: BlockType.InvokeLambdaFunction,
      parameters: {
        LambdaFunctionARN: functionArn,
        InvocationTimeLimitSeconds: timeoutSeconds ?? '8',
        ...definedEntries(extra),
      },
    });
  }

  checkHours(hoursOfOperationId?: string, extra: JsonObject = {}): BlockHandle {
    return this.add({
      type: BlockType.CheckHoursOfOperation,
      parameters: definedEntries({ HoursOfOperationId: hoursOfOperationId, ...extra }),
    });
  }

  updateAttributes(attributes: Record<string, string>): BlockHandle {
    return this.add({
      type: BlockType.UpdateContactAttributes,
      parameters: { Attributes: { ...attributes } },
    });
  }

  updateTargetQueue(queueId: string): BlockHandle {
    return this.add({ type: BlockType.UpdateContactTargetQueue, parameters: { QueueId: queueId } });
  }

  lexBot(options: LexBotOptions): BlockHandle {
    const { text, lexV2AliasArn, ...extra } = options;
    return this.add({
      type: BlockType.ConnectParticipantWithLexBot,
      parameters: definedEntries({
        Text: text,
        LexV2Bot: lexV2AliasArn === undefined ? undefined : { AliasArn: lexV2AliasArn },
        ...extra,
      }),
    });
  }

  showView(viewResource: JsonObject, extra: JsonObject = {}): BlockHandle {
    return this.add({
      type: BlockType.ShowView,
      parameters: { ViewResource: viewResource, ...extra },
    });
  }

  endFlow(): BlockHandle {
    return this.add({ type: BlockType.EndFlowExecution });
  }

  compile(options?: CompileOptions): CompilationResult {
    return compileFlow(this.graph, options);
  }
}
