/**
 * Content resolver: maps a request path to a file under the content root
 * and reads its front matter.
 *
 * Lookup order for a path without an extension is `<path>.html`, then
 * `<path>/index.html`; `/` and paths ending in `/` map to their
 * `index.html`. The first existing regular file wins. Nothing matching
 * is not an error: the result is empty asset content.
 */

import { readFile, stat } from 'node:fs/promises';
import { extname, join, sep } from 'node:path';
import type { ContentKind, ResolvedContent } from '../types/context.js';
import { EMPTY_CONTENT } from '../types/context.js';
import { ErrorCode } from '../types/errors.js';
import { CoreError, errorMessage } from './core-error.js';
import { parseFrontMatter } from './front-matter.js';
import { createLogger } from './logger.js';
import type { Logger } from './logger.js';

// ---------------------------------------------------------------------------
// Interface
// ---------------------------------------------------------------------------

/**
 * Resolves a request path to content. Implementations are injected once
 * at startup; a rejected promise is treated as empty content by the
 * request flow.
 */
export interface ContentResolver {
  resolve(path: string, method: string): Promise<ResolvedContent>;
}

/** Used when no resolver is configured: every path is an asset without a body. */
export const fallbackResolver: ContentResolver = {
  resolve: () => Promise.resolve(EMPTY_CONTENT),
};

// ---------------------------------------------------------------------------
// Path helpers
// ---------------------------------------------------------------------------

/** Classify by extension, case-insensitively. */
export function contentKindFor(path: string): ContentKind {
  const ext = extname(path).toLowerCase();
  if (ext === '.html' || ext === '.htm') return 'html';
  if (ext === '.json') return 'json';
  return 'asset';
}

/**
 * Collapse repeated slashes and reject `..` segments.
 *
 * @throws CoreError CONTEXT_ERROR
 */
export function normalizeContentPath(path: string): string {
  const collapsed = `/${path}`.replace(/\/{2,}/g, '/');
  const segments = collapsed.split('/');
  if (segments.some((segment) => segment === '..')) {
    throw new CoreError(ErrorCode.CONTEXT_ERROR, `path escapes the content root: ${path}`);
  }
  return collapsed;
}

/** Relative file candidates for a normalized path, in lookup order. */
export function candidatePaths(normalized: string): string[] {
  if (normalized.endsWith('/')) {
    return [`${normalized}index.html`];
  }
  const last = normalized.slice(normalized.lastIndexOf('/') + 1);
  if (extname(last) === '') {
    return [`${normalized}.html`, `${normalized}/index.html`];
  }
  return [normalized];
}

// ---------------------------------------------------------------------------
// FileContentResolver
// ---------------------------------------------------------------------------

export interface FileContentResolverOptions {
  /** Absolute content root. */
  root: string;
  logger?: Logger;
}

export class FileContentResolver implements ContentResolver {
  private readonly root: string;
  private readonly logger: Logger;

  constructor(options: FileContentResolverOptions) {
    this.root = options.root;
    this.logger = options.logger ?? createLogger('resolver');
  }

  /**
   * @throws CoreError CONTEXT_ERROR for an escaping path or an unreadable file
   */
  async resolve(path: string, _method: string): Promise<ResolvedContent> {
    const normalized = normalizeContentPath(path);

    for (const candidate of candidatePaths(normalized)) {
      const file = join(this.root, ...candidate.split('/').filter(Boolean));
      if (!(await isFile(file))) continue;
      return this.read(file);
    }
    return EMPTY_CONTENT;
  }

  private async read(file: string): Promise<ResolvedContent> {
    const kind = contentKindFor(file);
    if (kind === 'asset') {
      return { kind, frontMatter: {}, bodyPath: file, body: null };
    }

    let text: string;
    try {
      text = await readFile(file, 'utf-8');
    } catch (err) {
      throw new CoreError(ErrorCode.CONTEXT_ERROR, `could not read ${file}: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    try {
      const { frontMatter, body } = parseFrontMatter(text);
      return { kind, frontMatter, bodyPath: file, body };
    } catch (err) {
      this.logger.debug('front matter ignored', {
        file: file.split(sep).slice(-2).join('/'),
        error: errorMessage(err),
      });
      return { kind, frontMatter: {}, bodyPath: file, body: text };
    }
  }
}

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}
