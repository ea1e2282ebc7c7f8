import { createQuality, QualityRegistry } from '../content/qualityRegistry.js';
import { Effect, Requirement } from '../engine/operators.js';
import type { Action, Outcome, OutcomeKind, Quality, RawOperators, SaveRecord } from '../models.js';
import { Save } from '../persistence/saveState.js';
import { CollectingDiagnosticSink } from '../utils/diagnostics.js';

export const IRON = createQuality({ id: 42, name: 'Iron', cap: 10 });
export const WITS = createQuality({ id: 7, name: 'Wits', difficultyScaler: 60 });
export const LUCK = createQuality({ id: 16, name: 'Luck', category: 16000, isLuck: true, difficultyScaler: 10 });
export const LORE = createQuality({ id: 99, name: 'Lore', usesPyramidNumbers: true });

export function registry(qualities: Quality[] = [IRON, WITS, LUCK, LORE]) {
  const diagnostics = new CollectingDiagnosticSink();
  return { qualities: new QualityRegistry(qualities, { diagnostics }), diagnostics };
}

export function save(record: SaveRecord = {}, qualities = registry().qualities): Save {
  return new Save(qualities, record);
}

let nextId = 1000;

export function requirement(quality: Quality, operators: RawOperators): Requirement {
  return new Requirement(quality, { id: nextId++, qualityId: quality.id, operators });
}

export function effect(quality: Quality, operators: RawOperators): Effect {
  return new Effect(quality, { id: nextId++, qualityId: quality.id, operators });
}

export function outcome(kind: OutcomeKind, effects: Effect[] = [], chance?: number): Outcome {
  return { kind, id: nextId++, name: `${kind} branch`, description: '', chance, effects };
}

export function action(
  requirements: Requirement[],
  outcomes: Partial<Record<OutcomeKind, Outcome>> & { Default: Outcome },
  name = 'Test action'
): Action {
  return { id: nextId++, name, description: '', requirements, outcomes };
}

export function record(value: number, modifier = 0, xp = 0) {
  return { value, modifier, xp };
}
