/**
 * Body render pipeline: turns a finalized response body and the body
 * patches into response bytes.
 *
 * Patches are split by kind, keeping their order within each kind:
 *
 *   HTML  render → regex (streamed) → DOM rewrite; JSON Patch ignored
 *   JSON  serialize → regex → parse → JSON Patch → serialize
 *   none  empty body
 *
 * Regex patterns compile before anything renders. Any failure aborts the
 * whole body; nothing partial is returned.
 */

import { Readable, Writable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import type { JsonValue } from '../types/json.js';
import type { ResponseBodySpec } from '../types/context.js';
import type {
  BodyPatch,
  HtmlDomPatch,
  JsonPatchPatch,
  RegexPatch,
} from '../types/recommendations.js';
import { ErrorCode } from '../types/errors.js';
import { CoreError, errorMessage } from '../core/core-error.js';
import { createLogger } from '../core/logger.js';
import type { Logger } from '../core/logger.js';
import { fromScriptValue } from '../script/value-bridge.js';
import { applyRegexes, compileRegexPatches } from './regex.js';
import type { CompiledRegex } from './regex.js';
import { RegexWriter } from './regex-writer.js';
import { rewriteHtml } from './html-rewriter.js';
import { applyJsonPatch } from './json-patch.js';
import type { TemplateRegistry } from './template.js';

export const HTML_CONTENT_TYPE = 'text/html; charset=utf-8';
export const JSON_CONTENT_TYPE = 'application/json';

export const DEFAULT_TAIL_WINDOW = 4096;

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RenderedBody {
  /** Null for an empty body. */
  contentType: string | null;
  bytes: Buffer;
}

export interface PartitionedPatches {
  regex: RegexPatch[];
  dom: HtmlDomPatch[];
  json: JsonPatchPatch[];
}

export interface BodyRenderPipelineOptions {
  /** Characters the streaming regex step holds back between chunks. */
  tailWindow?: number;
  logger?: Logger;
}

export function partitionBodyPatches(patches: readonly BodyPatch[]): PartitionedPatches {
  const partitioned: PartitionedPatches = { regex: [], dom: [], json: [] };
  for (const patch of patches) {
    switch (patch.kind) {
      case 'regex':
        partitioned.regex.push(patch);
        break;
      case 'htmlDom':
        partitioned.dom.push(patch);
        break;
      case 'jsonPatch':
        partitioned.json.push(patch);
        break;
    }
  }
  return partitioned;
}

// ---------------------------------------------------------------------------
// BodyRenderPipeline
// ---------------------------------------------------------------------------

export class BodyRenderPipeline {
  private readonly tailWindow: number;
  private readonly logger: Logger;

  constructor(options: BodyRenderPipelineOptions = {}) {
    this.tailWindow = options.tailWindow ?? DEFAULT_TAIL_WINDOW;
    if (!Number.isInteger(this.tailWindow) || this.tailWindow < 1) {
      throw new Error('tailWindow must be a positive integer');
    }
    this.logger = options.logger ?? createLogger('render');
  }

  /**
   * Render `body` with `patches` applied. `templates` is the registry of
   * the theme that produced the body; it is needed only for templates.
   *
   * @throws CoreError MISSING_BODY for an unset body, or the code of the
   *   failing stage
   */
  async render(
    body: ResponseBodySpec,
    patches: readonly BodyPatch[],
    templates?: TemplateRegistry,
  ): Promise<RenderedBody> {
    const { regex, dom, json } = partitionBodyPatches(patches);

    switch (body.kind) {
      case 'unset':
        throw new CoreError(ErrorCode.MISSING_BODY, 'response body was never set');
      case 'none':
        return { contentType: null, bytes: Buffer.alloc(0) };
      case 'htmlTemplate':
      case 'htmlString': {
        const rules = compileRegexPatches(regex);
        const html = body.kind === 'htmlString' ? body.html : renderTemplate(body, templates);
        const replaced = await this.streamRegexes(html, rules);
        const rewritten = rewriteHtml(replaced, dom);
        this.logger.debug('html body rendered', {
          regex: rules.length,
          dom: dom.length,
          ignored_json: json.length,
        });
        return { contentType: HTML_CONTENT_TYPE, bytes: Buffer.from(rewritten, 'utf-8') };
      }
      case 'json': {
        const rules = compileRegexPatches(regex);
        let value = body.value;
        if (rules.length > 0) {
          value = parseAfterRegex(applyRegexes(JSON.stringify(value), rules));
        }
        for (const patch of json) {
          value = applyJsonPatch(value, Array.isArray(patch.patch) ? patch.patch : [patch.patch]);
        }
        this.logger.debug('json body rendered', { regex: rules.length, json: json.length });
        return {
          contentType: JSON_CONTENT_TYPE,
          bytes: Buffer.from(JSON.stringify(value), 'utf-8'),
        };
      }
    }
  }

  /** Run `text` through a {@link RegexWriter} and collect what it emits. */
  private async streamRegexes(text: string, rules: readonly CompiledRegex[]): Promise<string> {
    if (rules.length === 0) return text;
    const chunks: Buffer[] = [];
    await pipeline(
      Readable.from([Buffer.from(text, 'utf-8')]),
      new RegexWriter({ rules, tailWindow: this.tailWindow }),
      new Writable({
        write(chunk: Buffer, _encoding, callback) {
          chunks.push(chunk);
          callback();
        },
      }),
    );
    return Buffer.concat(chunks).toString('utf-8');
  }
}

// ---------------------------------------------------------------------------
// Stages
// ---------------------------------------------------------------------------

function renderTemplate(
  body: { readonly template: string; readonly model: JsonValue },
  templates: TemplateRegistry | undefined,
): string {
  if (templates === undefined) {
    throw new CoreError(
      ErrorCode.TEMPLATE,
      `template "${body.template}" requested but no templates are registered`,
    );
  }
  return templates.render(body.template, body.model);
}

function parseAfterRegex(text: string): JsonValue {
  try {
    const parsed: unknown = JSON.parse(text);
    return fromScriptValue(parsed);
  } catch (err) {
    throw new CoreError(
      ErrorCode.JSON_AFTER_REGEX,
      `body is not valid JSON after regex patches: ${errorMessage(err)}`,
      { cause: err },
    );
  }
}
