import type { Location } from '../models.js';
import { logDiagnostics, type DiagnosticSink } from '../utils/diagnostics.js';
import { compileNameFilter } from './qualityRegistry.js';

export interface LocationCatalogOptions {
  integrityChecks?: boolean;
  diagnostics?: DiagnosticSink;
}

export function createLocation(fields: Partial<Location> & Pick<Location, 'id'>): Location {
  return { name: '', description: '', message: '', ...fields };
}

/** Areas events can be limited to, keyed by id. */
export class LocationCatalog {
  private readonly locations = new Map<number, Location>();
  private readonly order: Location[] = [];
  private readonly placeholders = new Map<number, Location>();
  private readonly diagnostics: DiagnosticSink;

  constructor(locations: Iterable<Location> = [], options: LocationCatalogOptions = {}) {
    this.diagnostics = options.diagnostics ?? logDiagnostics;

    for (const location of locations) {
      const existing = this.locations.get(location.id);
      if (existing) {
        if (options.integrityChecks) {
          this.diagnostics.report({
            severity: 'warning',
            code: 'DUPLICATE_LOCATION',
            message: `Location ${location.id} is defined more than once; keeping '${existing.name}'`,
            path: `areas.${location.id}`,
          });
        }
        continue;
      }
      this.locations.set(location.id, location);
      this.order.push(location);
    }
  }

  get size(): number {
    return this.order.length;
  }

  get(id: number): Location | undefined {
    return this.locations.get(id);
  }

  has(id: number): boolean {
    return this.locations.has(id);
  }

  all(): readonly Location[] {
    return this.order;
  }

  find(filter?: string): Location[] {
    if (!filter) return [...this.order];
    const pattern = compileNameFilter(filter);
    return this.order.filter((location) => pattern.test(location.name));
  }

  /** Unknown ids get one shared stand-in each, named from the reference when it carries a name. */
  resolve(id: number, fallbackName = '', referrer?: string): Location {
    const location = this.locations.get(id);
    if (location) return location;

    let placeholder = this.placeholders.get(id);
    if (!placeholder) {
      placeholder = createLocation({ id, name: fallbackName, placeholder: true });
      this.placeholders.set(id, placeholder);
      this.diagnostics.report({
        severity: 'warning',
        code: 'UNKNOWN_LOCATION',
        message: `Could not find Location ${id}${referrer ? ` for ${referrer}` : ''}`,
        path: referrer,
        context: { locationId: id },
      });
    }
    return placeholder;
  }
}
