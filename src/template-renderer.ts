import * as fs from 'fs-extra';
import * as path from 'path';
import Handlebars from 'handlebars';
import { NotFoundError } from './errors';
import { TemplateBindings } from './types';

const TEMPLATE_EXTENSION = '.hbs';

type CompiledTemplate = (bindings: TemplateBindings) => string;

const XML_ATTRIBUTE_ESCAPES: Record<string, string> = { '&': '&amp;', '<': '&lt;', '>': '&gt;', '"': '&quot;' };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// `{{xmlAttributes attributes}}` renders ` key="value"` pairs, quoting only what XML needs.
function createEnvironment(): typeof Handlebars {
  const env = Handlebars.create();
  env.registerHelper('xmlAttributes', (attributes: unknown) => {
    if (!isRecord(attributes)) return '';
    const rendered = Object.entries(attributes)
      .filter((entry): entry is [string, string] => typeof entry[1] === 'string')
      .map(([key, value]) => ` ${key}="${value.replace(/[&<>"]/g, char => XML_ATTRIBUTE_ESCAPES[char] ?? char)}"`)
      .join('');
    return new env.SafeString(rendered);
  });
  return env;
}

/**
 * Loads templates from a directory. Files ending in `.hbs` are rendered with
 * Handlebars; anything else is copied verbatim. Values are XML-escaped only in
 * `.xml.hbs` templates.
 */
export class TemplateRenderer {
  private readonly handlebars = createEnvironment();
  private readonly cache = new Map<string, CompiledTemplate>();

  constructor(private readonly templatesDir: string) {}

  isTemplate(name: string): boolean {
    return name.endsWith(TEMPLATE_EXTENSION);
  }

  async render(name: string, bindings: TemplateBindings): Promise<string> {
    const template = await this.load(name);
    return template(bindings);
  }

  renderString(source: string, bindings: TemplateBindings): string {
    return this.handlebars.compile(source, { noEscape: true })(bindings);
  }

  private async load(name: string): Promise<CompiledTemplate> {
    const cached = this.cache.get(name);
    if (cached) return cached;

    const templatePath = path.join(this.templatesDir, name);
    if (!await fs.pathExists(templatePath)) {
      throw new NotFoundError(templatePath, 'Template');
    }
    const source = await fs.readFile(templatePath, 'utf8');

    let compiled: CompiledTemplate;
    if (this.isTemplate(name)) {
      const escape = name.endsWith(`.xml${TEMPLATE_EXTENSION}`);
      const delegate = this.handlebars.compile(source, { noEscape: !escape });
      compiled = bindings => delegate(bindings);
    } else {
      compiled = () => source;
    }
    this.cache.set(name, compiled);
    return compiled;
  }
}
