import type { Quality, QualityId, StatusKind } from '../models.js';
import { logDiagnostics, type DiagnosticSink } from '../utils/diagnostics.js';
import { ValidationError } from '../utils/errorhandler.js';

export interface QualityRegistryOptions {
  integrityChecks?: boolean;
  diagnostics?: DiagnosticSink;
}

const EMPTY_STATUS: ReadonlyMap<number, string> = new Map();

export function createQuality(fields: Partial<Quality> & Pick<Quality, 'id'>): Quality {
  return {
    name: '',
    description: '',
    cap: 0,
    category: 0,
    difficultyScaler: 0,
    isLuck: false,
    usesPyramidNumbers: false,
    pyramidLimit: 0,
    levelStatus: EMPTY_STATUS,
    changeStatus: EMPTY_STATUS,
    tag: '',
    nature: 0,
    persistent: false,
    visible: false,
    ...fields,
  };
}

export function placeholderQuality(id: QualityId, name = ''): Quality {
  return createQuality({ id, name, placeholder: true });
}

/** Status text for the highest threshold not greater than `value`. */
export function statusFor(statuses: ReadonlyMap<number, string>, value: number): string | undefined {
  let best: number | undefined;
  for (const threshold of statuses.keys()) {
    if (threshold <= value && (best === undefined || threshold > best)) {
      best = threshold;
    }
  }
  return best === undefined ? undefined : statuses.get(best);
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Case-insensitive name filter; `exact` matches the whole name literally. */
export function compileNameFilter(query: string, exact = false): RegExp {
  if (exact) {
    return new RegExp(`^${escapeRegExp(query)}$`, 'i');
  }
  try {
    return new RegExp(query, 'i');
  } catch (error) {
    throw new ValidationError(`bad name filter '${query}'`, 'filter', error instanceof Error ? error.message : error);
  }
}

export class QualityRegistry {
  private readonly qualities = new Map<QualityId, Quality>();
  private readonly order: Quality[] = [];
  private readonly placeholders = new Map<QualityId, Quality>();
  private readonly diagnostics: DiagnosticSink;

  constructor(qualities: Iterable<Quality>, options: QualityRegistryOptions = {}) {
    this.diagnostics = options.diagnostics ?? logDiagnostics;

    for (const quality of qualities) {
      const existing = this.qualities.get(quality.id);
      if (existing) {
        if (options.integrityChecks) {
          this.diagnostics.report({
            severity: 'warning',
            code: 'DUPLICATE_QUALITY',
            message: `Quality ${quality.id} is defined more than once; keeping '${existing.name}'`,
            path: `qualities.${quality.id}`,
          });
        }
        continue;
      }
      this.qualities.set(quality.id, quality);
      this.order.push(quality);
    }
  }

  get size(): number {
    return this.order.length;
  }

  get(id: QualityId): Quality | undefined {
    return this.qualities.get(id);
  }

  has(id: QualityId): boolean {
    return this.qualities.has(id);
  }

  all(): readonly Quality[] {
    return this.order;
  }

  find(filter?: string): Quality[] {
    if (!filter) return [...this.order];
    const pattern = compileNameFilter(filter);
    return this.order.filter((quality) => pattern.test(quality.name));
  }

  /**
   * Like `get`, but an unknown id yields a stand-in quality and a warning.
   * The same stand-in is returned for repeated lookups of that id.
   */
  resolve(id: QualityId, fallbackName = '', referrer?: string): Quality {
    const quality = this.qualities.get(id);
    if (quality) return quality;

    let placeholder = this.placeholders.get(id);
    if (!placeholder) {
      placeholder = placeholderQuality(id, fallbackName);
      this.placeholders.set(id, placeholder);
      this.diagnostics.report({
        severity: 'warning',
        code: 'UNKNOWN_QUALITY',
        message: `Could not find Quality ${id}${referrer ? ` for ${referrer}` : ''}`,
        path: referrer,
        context: { qualityId: id },
      });
    }
    return placeholder;
  }

  assignedSlot(id: QualityId): Quality | undefined {
    const slotId = this.qualities.get(id)?.assignToSlotId;
    return slotId === undefined ? undefined : this.qualities.get(slotId);
  }

  status(id: QualityId, value: number, kind: StatusKind = 'level'): string | undefined {
    const quality = this.qualities.get(id);
    if (!quality) return undefined;
    return statusFor(kind === 'level' ? quality.levelStatus : quality.changeStatus, value);
  }
}
