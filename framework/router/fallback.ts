/**
 * Fallback Handlers
 *
 * What runs when the trie has no route for a request: an asset lookup on
 * the local filesystem, then the not-found response.
 */

import type { Stats } from 'node:fs';
import { stat } from 'node:fs/promises';
import { join, relative, resolve, sep, isAbsolute } from 'node:path';
import type { HttpContext } from '../http/context.ts';
import type { AssetHandler, NotFoundHandler } from '../http/types.ts';

export interface AssetHandlerOptions {
  /** Directory assets are served from (default: process.cwd()) */
  root?: string;
  /** File served for a directory (default: index.html) */
  indexFile?: string;
}

/**
 * Serve files under a root directory.
 * Resolves to true (continue routing) when nothing was found.
 */
export function createAssetHandler(options: AssetHandlerOptions = {}): AssetHandler {
  const root = resolve(options.root ?? process.cwd());
  const indexFile = options.indexFile ?? 'index.html';

  return async (ctx: HttpContext): Promise<boolean> => {
    const target = resolveAssetPath(root, ctx.path);
    if (target === null) return true;

    const file = await findFile(target, indexFile);
    if (file === null) return true;

    await ctx.response.file(file);
    return false;
  };
}

/**
 * Plain-text 404
 */
export const defaultNotFoundHandler: NotFoundHandler = (ctx: HttpContext): void => {
  ctx.response.error(404, '404 - Not Found');
};

/**
 * Map a request path onto the root, or null when it would escape it
 */
export function resolveAssetPath(root: string, requestPath: string): string | null {
  let decoded: string;
  try {
    decoded = decodeURIComponent(requestPath);
  } catch {
    return null;
  }
  if (decoded.includes('\0')) return null;

  const target = resolve(root, `.${sep}${decoded.replace(/^\/+/, '')}`);
  const rel = relative(root, target);
  if (rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel)) return null;
  return target;
}

async function findFile(target: string, indexFile: string): Promise<string | null> {
  const info = await statOrNull(target);
  if (info === null) return null;
  if (info.isFile()) return target;
  if (!info.isDirectory()) return null;

  const index = join(target, indexFile);
  const indexInfo = await statOrNull(index);
  return indexInfo?.isFile() ? index : null;
}

async function statOrNull(path: string): Promise<Stats | null> {
  try {
    return await stat(path);
  } catch (error) {
    if (isMissing(error)) return null;
    throw error;
  }
}

function isMissing(error: unknown): boolean {
  if (!(error instanceof Error) || !('code' in error)) return false;
  return error.code === 'ENOENT' || error.code === 'ENOTDIR' || error.code === 'ENAMETOOLONG';
}
