/**
 * Request processor: the full flow for one request.
 *
 *   resolve → build context → before hooks → theme → header and model
 *   patches → render body → after hooks → response
 *
 * Static assets are answered straight after resolution. A resolver
 * failure counts as empty content. Any other failure becomes the generic
 * plain-text 500; details go to the log only.
 */

import type { RequestContext } from '../types/context.js';
import { EMPTY_CONTENT } from '../types/context.js';
import type { ResolvedContent } from '../types/context.js';
import type { BodyRenderPipeline } from '../render/pipeline.js';
import type { TemplateRegistry } from '../render/template.js';
import type { ContentResolver } from './content-resolver.js';
import type { ContextBuilder, RequestParts } from './context-builder.js';
import type { DispatchResult } from './theme-dispatcher.js';
import { applyHeaderPatches, applyRecommendations } from './patch-applicator.js';
import { buildResponse, internalErrorResponse } from './response-builder.js';
import type { ResponseParts } from './response-builder.js';
import { serveStaticAsset } from './static-assets.js';
import { errorMessage, isCoreError } from './core-error.js';
import { createLogger } from './logger.js';
import type { Logger } from './logger.js';

// ---------------------------------------------------------------------------
// Collaborators
// ---------------------------------------------------------------------------

export interface HookChain {
  runBefore(ctx: RequestContext): Promise<RequestContext>;
  runAfter(ctx: RequestContext): Promise<RequestContext>;
}

export interface Dispatcher {
  dispatch(ctx: RequestContext): Promise<DispatchResult>;
}

export interface RequestProcessorOptions {
  resolver: ContentResolver;
  buildContext: ContextBuilder;
  middleware: HookChain;
  dispatcher: Dispatcher;
  pipeline: BodyRenderPipeline;
  /** Template registries by theme id. */
  templates?: ReadonlyMap<string, TemplateRegistry>;
  logger?: Logger;
  now?: () => number;
}

// ---------------------------------------------------------------------------
// RequestProcessor
// ---------------------------------------------------------------------------

export class RequestProcessor {
  private readonly resolver: ContentResolver;
  private readonly buildContext: ContextBuilder;
  private readonly middleware: HookChain;
  private readonly dispatcher: Dispatcher;
  private readonly pipeline: BodyRenderPipeline;
  private readonly templates: ReadonlyMap<string, TemplateRegistry>;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(options: RequestProcessorOptions) {
    this.resolver = options.resolver;
    this.buildContext = options.buildContext;
    this.middleware = options.middleware;
    this.dispatcher = options.dispatcher;
    this.pipeline = options.pipeline;
    this.templates = options.templates ?? new Map();
    this.logger = options.logger ?? createLogger('request');
    this.now = options.now ?? (() => Date.now());
  }

  /** Handle one request. Never rejects. */
  async handle(parts: RequestParts): Promise<ResponseParts> {
    const startedAt = this.now();
    let requestId: string | undefined;
    try {
      const content = await this.resolve(parts);
      if (content.kind === 'asset' && content.bodyPath !== null) {
        const response = await serveStaticAsset(content.bodyPath);
        this.logger.info('asset served', {
          method: parts.method,
          path: parts.path,
          status: response.status,
          duration_ms: this.now() - startedAt,
        });
        return response;
      }

      const ctx = this.buildContext(parts, content);
      requestId = ctx.requestId;
      const { response, themeId } = await this.process(ctx);
      this.logger.info('request handled', {
        request: requestId,
        theme: themeId,
        method: ctx.method,
        path: ctx.path,
        status: response.status,
        duration_ms: this.now() - startedAt,
      });
      return response;
    } catch (err) {
      this.logger.error('request failed', {
        request: requestId,
        method: parts.method,
        path: parts.path,
        ok: false,
        duration_ms: this.now() - startedAt,
        error_code: isCoreError(err) ? err.code : undefined,
        error: errorMessage(err),
      });
      return internalErrorResponse();
    }
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private async resolve(parts: RequestParts): Promise<ResolvedContent> {
    try {
      return await this.resolver.resolve(parts.path, parts.method);
    } catch (err) {
      this.logger.debug('content resolution failed, using empty content', {
        path: parts.path,
        error_code: isCoreError(err) ? err.code : undefined,
        error: errorMessage(err),
      });
      return EMPTY_CONTENT;
    }
  }

  private async process(
    initial: RequestContext,
  ): Promise<{ response: ResponseParts; themeId: string }> {
    const log = this.logger.withContext({ request: initial.requestId });

    const before = await this.middleware.runBefore(initial);
    const dispatched = await this.dispatcher.dispatch(before);
    const patched = applyRecommendations(dispatched.ctx, log);
    const rendered = await this.pipeline.render(
      patched.response.body,
      patched.recommendations.bodyPatches,
      this.templates.get(dispatched.themeId),
    );

    // After hooks may still change status and headers; the body is final.
    const appliedHeaders = patched.recommendations.headerPatches.length;
    const after = await this.middleware.runAfter(patched);
    const headers = applyHeaderPatches(
      after.response.headers,
      after.recommendations.headerPatches.slice(appliedHeaders),
      log,
    );

    const response = buildResponse(
      { status: after.response.status, headers, body: patched.response.body },
      rendered,
    );
    return { response, themeId: dispatched.themeId };
  }
}
