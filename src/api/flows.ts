/**
 * Flow API routes.
 *
 * POST /flows/compile — Compile a flow definition into a wire document
 * POST /flows/decompile — Decompile a wire document into a flow definition
 * POST /flows/validate — Validate a flow definition
 * POST /flows — Store a wire document
 * GET /flows — List stored flows
 * GET /flows/:flowId — Fetch a stored flow
 * PUT /flows/:flowId — Replace a stored flow (new revision)
 * DELETE /flows/:flowId — Delete a stored flow
 */

import { Router, Response } from 'express';
import { v4 as uuid } from 'uuid';
import { FlowDefinition } from '../domain/flow';
import { notFoundError, validationError } from '../domain/errors';
import { defaultBlockCatalog } from '../blocks/catalog';
import { FlowGraph } from '../graph/flow-graph';
import { compileFlow } from '../dsl/compiler';
import { decompileFlow } from '../dsl/decompiler';
import { parseFlowDefinition } from '../dsl/definition';
import { validateFlow } from '../dsl/validator';
import { renderBuilderSource } from '../dsl/codegen';
import { LayoutOptions } from '../dsl/layout';
import { Store } from '../storage/store';
import { sendError, sendTypedError } from './middleware';

export interface FlowRouteOptions {
  layout?: LayoutOptions;
}

/** Parse a definition body, answering 400 when it does not fit. */
function readDefinition(body: unknown, res: Response): FlowDefinition | undefined {
  const parsed = parseFlowDefinition(body);
  if (!parsed.definition) {
    sendTypedError(res, validationError('Flow definition is invalid'), { errors: parsed.errors });
    return undefined;
  }
  return parsed.definition;
}

export function createFlowRoutes(store: Store, options: FlowRouteOptions = {}): Router {
  const router = Router();

  /**
   * POST /flows/compile
   * Body: FlowDefinition. Responds with the wire document.
   */
  router.post('/compile', (req, res) => {
    try {
      const definition = readDefinition(req.body, res);
      if (!definition) return;

      const { document, warnings, documentHash } = compileFlow(definition, { layout: options.layout });
      res.json({ document, warnings, documentHash });
    } catch (err) {
      sendError(res, err);
    }
  });

  /**
   * POST /flows/decompile
   * Body: wire document. Responds with the definition and builder source.
   */
  router.post('/decompile', (req, res) => {
    try {
      const { graph, warnings } = decompileFlow(req.body);
      res.json({ flow: graph.toDefinition(), warnings, source: renderBuilderSource(graph) });
    } catch (err) {
      sendError(res, err);
    }
  });

  /**
   * POST /flows/validate
   * Body: FlowDefinition. Always 200 once the body parses; see `valid`.
   */
  router.post('/validate', (req, res) => {
    try {
      const definition = readDefinition(req.body, res);
      if (!definition) return;

      const graph = FlowGraph.fromDefinition(definition);
      res.json(validateFlow(graph, { catalog: defaultBlockCatalog }));
    } catch (err) {
      sendError(res, err);
    }
  });

  /**
   * POST /flows
   * Store a wire document. It is decompiled and recompiled first, so what is
   * kept is always a normalized, valid document.
   */
  router.post('/', async (req, res) => {
    try {
      const { graph } = decompileFlow(req.body);
      const { document, warnings } = compileFlow(graph, { layout: options.layout });
      const now = new Date().toISOString();

      const flow = await store.flows.create({
        id: `flow_${uuid()}`,
        name: document.Name,
        revision: 1,
        document,
        createdAt: now,
        updatedAt: now,
      });
      res.status(201).json({ flow, warnings });
    } catch (err) {
      sendError(res, err);
    }
  });

  /**
   * GET /flows
   * Optional `limit` and `offset` query parameters.
   */
  router.get('/', async (req, res) => {
    try {
      const limit = req.query.limit ? parseInt(String(req.query.limit), 10) : undefined;
      const offset = req.query.offset ? parseInt(String(req.query.offset), 10) : undefined;
      const flows = await store.flows.list({ limit, offset });
      res.json({ flows });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get('/:flowId', async (req, res) => {
    try {
      const flow = await store.flows.getById(req.params.flowId);
      if (!flow) {
        sendTypedError(res, notFoundError('Flow', req.params.flowId));
        return;
      }
      res.json({ flow });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.put('/:flowId', async (req, res) => {
    try {
      const existing = await store.flows.getById(req.params.flowId);
      if (!existing) {
        sendTypedError(res, notFoundError('Flow', req.params.flowId));
        return;
      }

      const { graph } = decompileFlow(req.body);
      const { document, warnings } = compileFlow(graph, { layout: options.layout });
      const flow = await store.flows.update(existing.id, {
        ...existing,
        name: document.Name,
        revision: existing.revision + 1,
        document,
        updatedAt: new Date().toISOString(),
      });
      res.json({ flow, warnings });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.delete('/:flowId', async (req, res) => {
    try {
      const deleted = await store.flows.delete(req.params.flowId);
      if (!deleted) {
        sendTypedError(res, notFoundError('Flow', req.params.flowId));
        return;
      }
      res.status(204).end();
    } catch (err) {
      sendError(res, err);
    }
  });

  return router;
}
