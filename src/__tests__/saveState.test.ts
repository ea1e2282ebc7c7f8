import { describe, expect, it } from 'vitest';
import { createQuality } from '../content/qualityRegistry.js';
import { SaveQuality } from '../persistence/saveState.js';
import { IRON, LORE, record, registry, save, WITS } from './helpers.js';

describe('SaveQuality value', () => {
  it('clamps to the cap', () => {
    const iron = new SaveQuality(IRON, record(3));
    iron.value = 15;
    expect(iron.value).toBe(10);
  });

  it('drops negative results', () => {
    const iron = new SaveQuality(IRON, record(3));
    iron.value = -1;
    expect(iron.value).toBe(3);
    iron.increaseBy(-5);
    expect(iron.value).toBe(3);
  });

  it('leaves uncapped qualities unbounded', () => {
    const wits = new SaveQuality(WITS);
    wits.value = 1000;
    expect(wits.value).toBe(1000);
  });

  it('adds the modifier only to the effective value', () => {
    const iron = new SaveQuality(IRON, record(3, 2));
    expect(iron.effectiveValue).toBe(5);
    expect(iron.toString()).toBe('42\tIron: 3 (+2)');
    expect(new SaveQuality(IRON, record(3)).toString()).toBe('42\tIron: 3');
  });
});

describe('plain increments', () => {
  it('returns to the start after adding and taking away the same amount', () => {
    for (const [quality, start, amount] of [
      [IRON, 4, 3],
      [IRON, 3, -3],
      [WITS, 4, 300],
      [WITS, 0, 0],
    ] as const) {
      const entry = new SaveQuality(quality, record(start));
      entry.increaseBy(amount);
      entry.increaseBy(-amount);
      expect(entry.value).toBe(start);
    }
  });

  it('does not return once the cap clamped the increase', () => {
    const iron = new SaveQuality(IRON, record(8));
    iron.increaseBy(5);
    expect(iron.value).toBe(10);
    iron.increaseBy(-5);
    expect(iron.value).toBe(5);
  });

  it('does not return once a decrease below zero was dropped', () => {
    const iron = new SaveQuality(IRON, record(2));
    iron.increaseBy(-5);
    expect(iron.value).toBe(2);
    iron.increaseBy(5);
    expect(iron.value).toBe(7);
  });
});

describe('pyramid increments', () => {
  it('levels up once xp passes the current level', () => {
    const lore = new SaveQuality(LORE, record(3));
    lore.increaseBy(4);
    expect(lore.toRecord()).toEqual(record(4, 0, 0));
  });

  it('banks xp below the threshold', () => {
    const lore = new SaveQuality(LORE, record(3));
    lore.increaseBy(3);
    expect(lore.toRecord()).toEqual(record(3, 0, 3));
  });

  it('raises the threshold as the level grows', () => {
    const lore = new SaveQuality(LORE);
    lore.increaseBy(2);
    expect(lore.toRecord()).toEqual(record(1, 0, 1));
  });

  it('uses the quality limit when lower than the level', () => {
    const limited = createQuality({ id: 98, name: 'Limited', usesPyramidNumbers: true, pyramidLimit: 2 });
    const entry = new SaveQuality(limited, record(5));
    entry.increaseBy(3);
    expect(entry.toRecord()).toEqual(record(6, 0, 0));
  });

  it('ignores negative amounts', () => {
    const lore = new SaveQuality(LORE, record(3, 0, 2));
    lore.increaseBy(-2);
    expect(lore.toRecord()).toEqual(record(3, 0, 2));
  });
});

describe('Save', () => {
  it('creates entries lazily at zero', () => {
    const snapshot = save();
    expect(snapshot.peek(42)).toBeUndefined();
    expect(snapshot.get(42).value).toBe(0);
    expect(snapshot.size).toBe(1);
    expect(snapshot.has(42)).toBe(true);
  });

  it('keeps loaded values even above the cap', () => {
    expect(save({ 42: record(50) }).get(42).value).toBe(50);
  });

  it('backs unknown ids with placeholders', () => {
    const { qualities, diagnostics } = registry();
    const snapshot = save({ 500: record(2) }, qualities);
    expect(snapshot.get(500).quality.placeholder).toBe(true);
    expect(diagnostics.codes()).toEqual(['UNKNOWN_QUALITY']);
  });

  it('round-trips its record', () => {
    const original = { 42: record(3, 1, 0), 99: record(2, 0, 1) };
    expect(save(original).toRecord()).toEqual(original);
  });
});
