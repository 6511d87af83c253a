import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { TemplateNotFoundError } from '../errors.js';
import { exists } from '../util/fs.js';

/** Bundled templates, shipped beside `src/` and `dist/`. */
export const DEFAULT_TEMPLATE_DIR = fileURLToPath(new URL('../../templates/', import.meta.url));

export interface LoadTemplateOptions {
  /** Fail with TemplateNotFoundError instead of using the in-code fallback. */
  required?: boolean;
}

/**
 * Reads operator-editable `<name>.md` templates from a directory. Each
 * template file is read at most once per store; create one store per process and
 * pass it to whatever renders issues.
 */
export class TemplateStore {
  private readonly cache = new Map<string, string>();

  constructor(
    private readonly dir: string = DEFAULT_TEMPLATE_DIR,
    private readonly fallbacks: Readonly<Record<string, string>> = {},
  ) {}

  templatePath(name: string): string {
    return join(this.dir, `${name}.md`);
  }

  async load(name: string, options: LoadTemplateOptions = {}): Promise<string> {
    const cached = this.cache.get(name);
    if (cached !== undefined) return cached;

    const path = this.templatePath(name);
    if (await exists(path)) {
      const template = await readFile(path, 'utf-8');
      this.cache.set(name, template);
      return template;
    }

    // Only text read from disk is cached
    const fallback = this.fallbacks[name];
    if (options.required || fallback === undefined) {
      throw new TemplateNotFoundError(`Issue template "${name}" not found at ${path}`, name, path);
    }
    return fallback;
  }
}
