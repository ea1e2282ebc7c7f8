import type { QualityRegistry } from '../content/qualityRegistry.js';
import type { Quality } from '../models.js';
import type { Save } from '../persistence/saveState.js';
import { logDiagnostics, type DiagnosticSink } from '../utils/diagnostics.js';
import { logger } from '../utils/logger.js';

export interface ReferenceTemplates {
  /** Bound to `{id}`, `{name}`, `{value}`, `{base}`, `{modifier}`, `{cap}`. */
  quality: string;
  /** `{}` receives the resolved dice expression. */
  dice: string;
  /** `{}` receives the unknown id. */
  notFound: string;
  /** `{}` receives a non-numeric quality reference. */
  name: string;
}

export const DEFAULT_TEMPLATES: Readonly<ReferenceTemplates> = {
  quality: '[{name}]',
  dice: '[1 to {}]',
  notFound: '[Quality({})]',
  name: '[<{}>]',
};

export interface ResolveOptions {
  save?: Save;
  templates?: Partial<ReferenceTemplates>;
  /** Who owns the text, for warnings. */
  referrer?: string;
}

// A value may hold one level of nested [..] markers, e.g. [d:[q:42]].
const MARKER_PATTERN = /\[([a-z]+):((?:[^[\]]+|\[[^[\]]+\])+)\]/g;

export function formatTemplate(template: string, fields: Record<string, string | number>, positional = ''): string {
  return template.replace(/\{(\w*)\}/g, (placeholder, key: string) => {
    if (key === '') return positional;
    return key in fields ? String(fields[key]) : placeholder;
  });
}

export function hasReferences(text: string): boolean {
  return new RegExp(MARKER_PATTERN.source).test(text);
}

export class ReferenceResolver {
  constructor(
    private readonly qualities: QualityRegistry,
    private readonly diagnostics: DiagnosticSink = logDiagnostics
  ) {}

  resolve(text: string, options: ResolveOptions = {}): string {
    const templates: ReferenceTemplates = { ...DEFAULT_TEMPLATES, ...options.templates };
    return this.substitute(text, templates, options);
  }

  private substitute(text: string, templates: ReferenceTemplates, options: ResolveOptions): string {
    let result = text;

    for (const match of text.matchAll(MARKER_PATTERN)) {
      const [marker, key, value] = match;
      let replacement: string | undefined;

      switch (key) {
        case 'q':
        case 'qb':
          replacement = this.qualityReference(value, key === 'qb', templates, options);
          break;
        case 'd':
          replacement = formatTemplate(templates.dice, {}, this.substitute(value, templates, options));
          break;
        default:
          logger.warn('Unknown reference key', { key, text, referrer: options.referrer });
      }

      if (replacement !== undefined) {
        const substitution = replacement;
        result = result.replace(marker, () => substitution);
      }
    }

    return result;
  }

  private qualityReference(value: string, base: boolean, templates: ReferenceTemplates, options: ResolveOptions): string {
    if (!/^\d+$/.test(value)) {
      return formatTemplate(templates.name, {}, value);
    }

    const quality = this.qualities.get(Number(value));
    if (!quality) {
      this.diagnostics.report({
        severity: 'warning',
        code: 'UNKNOWN_QUALITY',
        message: `Could not find Quality ${value} referenced in text`,
        path: options.referrer,
        context: { qualityId: Number(value) },
      });
      return formatTemplate(templates.notFound, {}, value);
    }

    return formatTemplate(templates.quality, this.fields(quality, base, options.save));
  }

  private fields(quality: Quality, base: boolean, save?: Save): Record<string, string | number> {
    const entry = save?.peek(quality.id);
    const level = entry?.value ?? 0;
    const modifier = entry?.modifier ?? 0;
    return {
      id: quality.id,
      name: quality.name,
      value: base ? level : level + modifier,
      base: level,
      modifier,
      cap: quality.cap,
    };
  }
}
