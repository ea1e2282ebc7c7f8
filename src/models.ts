import type { Effect, Requirement } from './engine/operators.js';

export type QualityId = number;

export type StatusKind = 'level' | 'change';

export interface Quality {
  id: QualityId;
  name: string;
  description: string;
  /** Maximum level; 0 means uncapped. */
  cap: number;
  category: number;
  /** Greater than 0 when the quality takes part in challenge percentage math. */
  difficultyScaler: number;
  isLuck: boolean;
  usesPyramidNumbers: boolean;
  /** Per-level XP threshold override; 0 means the current level is the threshold. */
  pyramidLimit: number;
  levelStatus: ReadonlyMap<number, string>;
  changeStatus: ReadonlyMap<number, string>;
  assignToSlotId?: QualityId;
  tag: string;
  nature: number;
  persistent: boolean;
  visible: boolean;
  /** Set on stand-ins created for ids the catalog does not know. */
  placeholder?: boolean;
}

export type OperatorValue = number | string;
export type RawOperators = Readonly<Record<string, OperatorValue>>;

export interface OperatorData {
  id: number;
  qualityId: QualityId;
  operators: RawOperators;
}

export type OutcomeKind = 'Default' | 'RareDefault' | 'Success' | 'RareSuccess';

export const OUTCOME_KINDS: readonly OutcomeKind[] = ['Default', 'RareDefault', 'Success', 'RareSuccess'];

export type CheckResult = 'LOCKED' | 'DEFAULT' | 'FAILURE' | 'SUCCESS';

export interface Outcome {
  kind: OutcomeKind;
  id: number;
  name: string;
  description: string;
  /** Percentage chance (0-100); only meaningful on the Rare branches. */
  chance?: number;
  effects: readonly Effect[];
  // Carried for callers, never interpreted by the engine.
  triggerEventId?: number;
  moveToAreaId?: number;
  exoticEffects?: string;
}

export type OutcomeTable = { Default: Outcome } & Partial<Record<Exclude<OutcomeKind, 'Default'>, Outcome>>;

export interface Action {
  id: number;
  name: string;
  description: string;
  requirements: readonly Requirement[];
  outcomes: OutcomeTable;
}

export interface Location {
  id: number;
  name: string;
  description: string;
  /** Shown when the player moves there. */
  message: string;
  /** Set on stand-ins created for ids the catalog does not know. */
  placeholder?: boolean;
}

export interface GameEvent {
  id: number;
  name: string;
  description: string;
  /** The area the event is limited to, if any. */
  location?: Location;
  autofire: boolean;
  category: number;
  requirements: readonly Requirement[];
  effects: readonly Effect[];
  actions: readonly Action[];
}

export interface SaveQualityRecord {
  value: number;
  modifier: number;
  xp: number;
}

export type SaveRecord = Record<QualityId, SaveQualityRecord>;

export interface ResolutionStep {
  result: Exclude<CheckResult, 'LOCKED'>;
  outcome: OutcomeKind;
  rare: boolean;
}
