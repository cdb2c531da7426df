/**
 * Template registry: the Handlebars templates of one theme.
 *
 * Each theme gets its own isolated Handlebars environment, so helpers
 * and partials never leak between themes. Templates are addressed by
 * name; every template is also registered as a partial under that name.
 */

import { readdir, readFile } from 'node:fs/promises';
import { extname, join, sep } from 'node:path';
import Handlebars from 'handlebars';
import type { JsonValue } from '../types/json.js';
import { ErrorCode } from '../types/errors.js';
import { CoreError, errorMessage } from '../core/core-error.js';

/** File extensions loaded by {@link TemplateRegistry.fromDirectory}. */
export const TEMPLATE_EXTENSIONS: readonly string[] = ['.hbs', '.html'];

type CompiledTemplate = ReturnType<typeof Handlebars.compile>;

export class TemplateRegistry {
  private readonly hbs = Handlebars.create();
  private readonly templates = new Map<string, CompiledTemplate>();

  get names(): string[] {
    return [...this.templates.keys()].sort();
  }

  has(name: string): boolean {
    return this.templates.has(name);
  }

  /**
   * Register `source` under `name`, replacing any earlier template.
   *
   * @throws CoreError TEMPLATE when the source does not parse
   */
  register(name: string, source: string): void {
    try {
      this.hbs.parse(source);
    } catch (err) {
      throw new CoreError(
        ErrorCode.TEMPLATE,
        `template "${name}" does not parse: ${errorMessage(err)}`,
        { cause: err, detail: { template: name } },
      );
    }
    this.templates.set(name, this.hbs.compile(source));
    this.hbs.registerPartial(name, source);
  }

  /**
   * Render the template `name` with `model`.
   *
   * @throws CoreError TEMPLATE for an unknown name or a render failure
   */
  render(name: string, model: JsonValue): string {
    const template = this.templates.get(name);
    if (template === undefined) {
      throw new CoreError(ErrorCode.TEMPLATE, `template "${name}" is not registered`, {
        detail: { template: name },
      });
    }
    try {
      return template(model);
    } catch (err) {
      throw new CoreError(
        ErrorCode.TEMPLATE,
        `template "${name}" failed to render: ${errorMessage(err)}`,
        { cause: err, detail: { template: name } },
      );
    }
  }

  /**
   * Load every `*.hbs` and `*.html` file below `dir`. A template is named
   * by its path relative to `dir`, without extension and with `/`
   * separators (`partials/nav.hbs` → `partials/nav`). A missing
   * directory yields an empty registry.
   */
  static async fromDirectory(dir: string): Promise<TemplateRegistry> {
    const registry = new TemplateRegistry();
    let entries: string[];
    try {
      entries = await readdir(dir, { recursive: true });
    } catch (err) {
      if (isNotFound(err)) return registry;
      throw new CoreError(ErrorCode.IO, `cannot read templates in ${dir}: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    for (const entry of entries.sort()) {
      const ext = extname(entry);
      if (!TEMPLATE_EXTENSIONS.includes(ext)) continue;
      const name = entry.slice(0, -ext.length).split(sep).join('/');
      const source = await readFile(join(dir, entry), 'utf-8');
      registry.register(name, source);
    }
    return registry;
  }
}

function isNotFound(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}
