import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import Handlebars from 'handlebars';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

const VIEW_ROOT = path.resolve(__dirname, '../../views');

type CompiledView = ReturnType<typeof Handlebars.compile>;

export type ViewName = 'home' | 'version-report' | 'interview-summary' | 'error';

/**
 * Renders views/<name>.hbs inside views/layout.hbs. Compiled templates are cached per renderer.
 */
export class PageRenderer {
  private readonly hbs = Handlebars.create();
  private readonly cache = new Map<string, CompiledView>();

  constructor(private readonly viewRoot: string = VIEW_ROOT) {
    this.hbs.registerHelper('percent', (value: unknown) =>
      typeof value === 'number' ? `${Math.round(value * 100)}%` : '-'
    );
    this.hbs.registerHelper('join', (value: unknown) =>
      Array.isArray(value) ? value.filter((item) => typeof item === 'string').join(', ') : ''
    );
    this.hbs.registerHelper('inc', (value: unknown) => (typeof value === 'number' ? value + 1 : value));
  }

  private async template(name: string): Promise<CompiledView> {
    const cached = this.cache.get(name);
    if (cached) return cached;
    const raw = await readFile(path.join(this.viewRoot, `${name}.hbs`), 'utf8');
    const compiled = this.hbs.compile(raw);
    this.cache.set(name, compiled);
    return compiled;
  }

  async render(view: ViewName, title: string, data: object): Promise<string> {
    const [layout, page] = await Promise.all([this.template('layout'), this.template(view)]);
    return layout({ title, body: page(data) });
  }
}
