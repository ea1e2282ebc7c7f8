import { compileNameFilter } from '../content/qualityRegistry.js';
import type { Save, SaveQuality } from '../persistence/saveState.js';
import { QualityLookupError } from '../utils/errorhandler.js';
import { logger } from '../utils/logger.js';

export interface QualityChange {
  id: number;
  name: string;
  from: number;
  to: number;
}

const byName = (a: SaveQuality, b: SaveQuality) => a.name.toLowerCase().localeCompare(b.name.toLowerCase());

/** Edits the qualities a save already holds, addressed by name pattern or numeric id. */
export class SaveEditor {
  constructor(readonly save: Save) {}

  find(query?: string, exact = false): SaveQuality[] {
    const entries = this.save.all();
    if (!query) return entries.sort(byName);

    if (/^\d+$/.test(query)) {
      const entry = this.save.peek(Number(query));
      if (entry) return [entry];
    }

    const pattern = compileNameFilter(query, exact);
    const matches = entries.filter((entry) => pattern.test(entry.name)).sort(byName);
    if (matches.length === 0) {
      throw new QualityLookupError(`Quality not found in save: ${query}`, query);
    }
    return matches;
  }

  /** Exactly one match, trying an exact name first. */
  fetch(query: string): SaveQuality {
    let matches: SaveQuality[];
    try {
      matches = this.find(query, true);
    } catch (error) {
      if (!(error instanceof QualityLookupError)) throw error;
      matches = this.find(query);
    }

    if (matches.length > 1) {
      throw new QualityLookupError(
        `${matches.length} qualities match '${query}'`,
        query,
        matches.map((entry) => entry.toString())
      );
    }
    return matches[0];
  }

  change(target: string | SaveQuality, amount: number, add = false): QualityChange {
    const entry = typeof target === 'string' ? this.fetch(target) : target;
    const from = entry.value;
    const requested = add ? from + amount : amount;

    entry.value = requested;
    logger.info(`Change quality [${entry.id}] '${entry.name}' from ${from} to ${entry.value}`, {
      requested,
      delta: entry.value - from,
    });
    return { id: entry.id, name: entry.name, from, to: entry.value };
  }

  set(query: string, value: number): QualityChange {
    return this.change(query, value);
  }

  add(query: string, amount: number): QualityChange {
    return this.change(query, amount, true);
  }
}
