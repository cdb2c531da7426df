/**
 * Static assets: files under the content root served as they are.
 *
 * Assets bypass plugins, themes and the render pipeline.
 */

import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import { ErrorCode } from '../types/errors.js';
import { CoreError, errorMessage } from './core-error.js';
import type { ResponseParts } from './response-builder.js';

export const DEFAULT_ASSET_TYPE = 'application/octet-stream';

const ASSET_TYPES: Readonly<Record<string, string>> = {
  '.css': 'text/css; charset=utf-8',
  '.js': 'text/javascript; charset=utf-8',
  '.mjs': 'text/javascript; charset=utf-8',
  '.txt': 'text/plain; charset=utf-8',
  '.xml': 'application/xml',
  '.svg': 'image/svg+xml',
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.gif': 'image/gif',
  '.webp': 'image/webp',
  '.avif': 'image/avif',
  '.ico': 'image/x-icon',
  '.woff': 'font/woff',
  '.woff2': 'font/woff2',
  '.pdf': 'application/pdf',
  '.wasm': 'application/wasm',
  '.map': 'application/json',
};

export function assetContentType(path: string): string {
  const ext = extname(path).toLowerCase();
  return Object.hasOwn(ASSET_TYPES, ext) ? ASSET_TYPES[ext] : DEFAULT_ASSET_TYPE;
}

/**
 * Read the asset at `bodyPath` into a 200 response.
 *
 * @throws CoreError IO when the file cannot be read
 */
export async function serveStaticAsset(bodyPath: string): Promise<ResponseParts> {
  let body: Buffer;
  try {
    body = await readFile(bodyPath);
  } catch (err) {
    throw new CoreError(ErrorCode.IO, `cannot read asset: ${errorMessage(err)}`, {
      cause: err,
      detail: { path: bodyPath },
    });
  }
  return {
    status: 200,
    headers: {
      'Content-Type': [assetContentType(bodyPath)],
      'Content-Length': [String(body.length)],
    },
    body,
  };
}
