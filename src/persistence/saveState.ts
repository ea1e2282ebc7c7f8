import type { QualityRegistry } from '../content/qualityRegistry.js';
import type { Quality, QualityId, SaveQualityRecord, SaveRecord } from '../models.js';
import { logger } from '../utils/logger.js';

/**
 * Mutable per-save state of one quality. Level writes are clamped to
 * `[0, cap]` and a negative result is dropped, leaving the level as it was.
 */
export class SaveQuality {
  private level: number;
  modifier: number;
  xp: number;

  constructor(readonly quality: Quality, record: Partial<SaveQualityRecord> = {}) {
    // Loaded values are kept as-is so untouched entries round-trip unchanged.
    this.level = record.value ?? 0;
    this.modifier = record.modifier ?? 0;
    this.xp = record.xp ?? 0;
  }

  get id(): QualityId {
    return this.quality.id;
  }

  get name(): string {
    return this.quality.name;
  }

  get value(): number {
    return this.level;
  }

  set value(next: number) {
    if (next < 0) return;
    const cap = this.quality.cap;
    this.level = cap > 0 ? Math.min(next, cap) : next;
  }

  /** Level plus the display-only modifier. */
  get effectiveValue(): number {
    return this.level + this.modifier;
  }

  get pyramidLimit(): number {
    return Math.min(this.level, this.quality.pyramidLimit || this.level);
  }

  increaseBy(amount: number) {
    if (!this.quality.usesPyramidNumbers) {
      this.value = this.level + amount;
      return;
    }

    if (amount < 0) {
      logger.debug('Negative change ignored on pyramid quality', { qualityId: this.id, amount });
    }

    for (let step = 0; step < amount; step++) {
      this.xp += 1;
      if (this.xp > this.pyramidLimit) {
        this.value = this.level + 1;
        this.xp = 0;
      }
    }
  }

  toRecord(): SaveQualityRecord {
    return { value: this.level, modifier: this.modifier, xp: this.xp };
  }

  toString(): string {
    const name = this.name || `Quality(${this.id})`;
    return this.modifier ? `${this.id}\t${name}: ${this.level} (${this.modifier >= 0 ? '+' : ''}${this.modifier})` : `${this.id}\t${name}: ${this.level}`;
  }
}

/** One player snapshot: quality id to SaveQuality, created lazily at level 0. */
export class Save {
  private readonly entries = new Map<QualityId, SaveQuality>();

  constructor(private readonly qualities: QualityRegistry, record: SaveRecord = {}) {
    for (const [key, entry] of Object.entries(record)) {
      const id = Number(key);
      this.entries.set(id, new SaveQuality(this.qualities.resolve(id, '', 'save'), entry));
    }
  }

  get size(): number {
    return this.entries.size;
  }

  get(id: QualityId): SaveQuality {
    let entry = this.entries.get(id);
    if (!entry) {
      entry = new SaveQuality(this.qualities.resolve(id, '', 'save'));
      this.entries.set(id, entry);
    }
    return entry;
  }

  peek(id: QualityId): SaveQuality | undefined {
    return this.entries.get(id);
  }

  has(id: QualityId): boolean {
    return this.entries.has(id);
  }

  all(): SaveQuality[] {
    return [...this.entries.values()];
  }

  toRecord(): SaveRecord {
    const record: SaveRecord = {};
    for (const [id, entry] of this.entries) {
      record[id] = entry.toRecord();
    }
    return record;
  }
}
