/**
 * Flow document files.
 *
 * Reading and writing wire documents sits outside the pure compile and
 * decompile core; build scripts and the CLI layer call these helpers.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { FlowDocument } from '../dsl/wire';
import { serializeDocument } from '../dsl/compiler';
import { logger } from '../logger';

const log = logger.child({ module: 'flow-file' });

/** Write a compiled document, creating parent directories as needed. */
export async function writeFlowDocument(filePath: string, document: FlowDocument, indent = 2): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, serializeDocument(document, indent) + '\n', 'utf8');
  log.info('Flow compiled to file', { path: filePath, actions: document.Actions.length });
}

/**
 * Read a document for the decompiler. The result is untyped JSON; shape
 * checks happen in `decompileFlow`.
 */
export async function readFlowDocument(filePath: string): Promise<unknown> {
  const text = await fs.readFile(filePath, 'utf8');
  return JSON.parse(text);
}
