/**
 * @fileoverview All-or-nothing file writes for exports.
 *
 * Content goes to a sibling temp file that is renamed over the destination,
 * so a reader never sees a half-written export. Any failure surfaces as an
 * IOError; nothing is retried.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { IOError, toError } from '../core/errors.js';

export interface WriteResult {
  path: string;
  bytes: number;
}

export function writeFileAtomic(outputPath: string, content: string): WriteResult {
  const resolvedPath = path.resolve(outputPath);
  const tempPath = `${resolvedPath}.${process.pid}.${Date.now().toString(36)}.tmp`;

  try {
    fs.mkdirSync(path.dirname(resolvedPath), { recursive: true });
    fs.writeFileSync(tempPath, content, 'utf-8');
    fs.renameSync(tempPath, resolvedPath);
  } catch (error) {
    if (fs.existsSync(tempPath)) fs.rmSync(tempPath, { force: true });
    throw new IOError('write', resolvedPath, toError(error));
  }

  return { path: resolvedPath, bytes: Buffer.byteLength(content, 'utf-8') };
}
