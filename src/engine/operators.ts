import type { OperatorData, OperatorValue, Quality, QualityId, RawOperators } from '../models.js';

export const REQUIREMENT_OPERATORS = [
  'DifficultyLevel',
  'DifficultyAdvanced',
  'MinLevel',
  'MinAdvanced',
  'MaxLevel',
  'MaxAdvanced',
] as const;

export const EFFECT_OPERATORS = [
  'Level',
  'ChangeByAdvanced',
  'SetToExactly',
  'SetToExactlyAdvanced',
  'OnlyIfAtLeast',
  'OnlyIfNoMoreThan',
] as const;

export type RequirementOperator = (typeof REQUIREMENT_OPERATORS)[number];
export type EffectOperator = (typeof EFFECT_OPERATORS)[number];

// Display hints the game attaches to requirements; neither operators nor invalid.
export const DISPLAY_HINTS: ReadonlySet<string> = new Set([
  'VisibleWhenRequirementFailed',
  'BranchVisibleWhenRequirementFailed',
]);

export const CHALLENGE_FACTOR = 100;
export const LUCK_BASE = 50;

/**
 * Level at which a challenge is certain, or the success percentage for Luck.
 */
export function challengeCap(quality: Quality, difficulty: number): number {
  if (quality.isLuck) {
    return LUCK_BASE - difficulty * quality.difficultyScaler;
  }
  if (quality.difficultyScaler > 0) {
    return Math.ceil((difficulty * CHALLENGE_FACTOR) / quality.difficultyScaler);
  }
  return difficulty;
}

type LevelBound = { advanced: false; value: number };
type AdvancedBound = { advanced: true; value: string };
type Bound = LevelBound | AdvancedBound;

type RangeBounds =
  | { advanced: false; min: number; max: number }
  | { advanced: true; min: string; max: string };

export type RequirementToken =
  | ({ kind: 'MIN' | 'MAX' | 'EQUAL' } & Bound)
  | ({ kind: 'RANGE' } & RangeBounds)
  | { kind: 'CHALLENGE' | 'LUCK'; difficulty: number; cap: number }
  | { kind: 'CHALLENGEADV'; expression: string; scaler: number; factor: number }
  | { kind: 'INVALID'; operator: string; value: OperatorValue };

export type EffectToken =
  | { kind: 'LEVEL'; amount: number }
  | { kind: 'SETTO'; value: number }
  | { kind: 'IFMIN' | 'IFMAX' | 'IFEQUAL'; value: number }
  | { kind: 'CHANGEADV' | 'SETTOADV'; expression: string }
  | { kind: 'IFRANGE'; min: number; max: number }
  | { kind: 'INVALID'; operator: string; value: OperatorValue };

export type EffectGuardToken = Extract<EffectToken, { kind: 'IFMIN' | 'IFMAX' | 'IFEQUAL' | 'IFRANGE' }>;
export type EffectMutationToken = Extract<EffectToken, { kind: 'LEVEL' | 'SETTO' | 'CHANGEADV' | 'SETTOADV' }>;

export function asNumber(value: OperatorValue): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (value.trim() === '') return undefined;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function toBound(value: OperatorValue, advanced: boolean): Bound | undefined {
  if (advanced) {
    return { advanced: true, value: String(value) };
  }
  const level = asNumber(value);
  return level === undefined ? undefined : { advanced: false, value: level };
}

/** Min/Max on the same value collapse to EQUAL, on adjacent values to RANGE. */
function pairShape(min: Bound, max: Bound): 'EQUAL' | 'RANGE' | undefined {
  if (min.value === max.value) return 'EQUAL';
  const lo = asNumber(min.value);
  const hi = asNumber(max.value);
  if (lo === undefined || hi === undefined) return undefined;
  if (lo === hi) return 'EQUAL';
  if (hi === lo + 1) return 'RANGE';
  return undefined;
}

function rangeOf(min: Bound, max: Bound): RangeBounds | undefined {
  if (!min.advanced && !max.advanced) return { advanced: false, min: min.value, max: max.value };
  if (min.advanced && max.advanced) return { advanced: true, min: min.value, max: max.value };
  return undefined;
}

function invalidLeftovers(operators: RawOperators, known: readonly string[]) {
  const tokens: { kind: 'INVALID'; operator: string; value: OperatorValue }[] = [];
  for (const [operator, value] of Object.entries(operators)) {
    if (!known.includes(operator) && !DISPLAY_HINTS.has(operator)) {
      tokens.push({ kind: 'INVALID', operator, value });
    }
  }
  return tokens;
}

export function tokenizeRequirement(quality: Quality, operators: RawOperators): RequirementToken[] {
  const tokens: RequirementToken[] = [];
  const consumed = new Set<string>();

  for (const operator of REQUIREMENT_OPERATORS) {
    if (!(operator in operators) || consumed.has(operator)) continue;
    const value = operators[operator];

    if (operator === 'DifficultyAdvanced') {
      tokens.push({
        kind: 'CHALLENGEADV',
        expression: String(value),
        scaler: quality.difficultyScaler,
        factor: CHALLENGE_FACTOR,
      });
      continue;
    }

    if (operator === 'DifficultyLevel') {
      const difficulty = asNumber(value);
      if (difficulty === undefined) {
        tokens.push({ kind: 'INVALID', operator, value });
      } else {
        tokens.push({ kind: quality.isLuck ? 'LUCK' : 'CHALLENGE', difficulty, cap: challengeCap(quality, difficulty) });
      }
      continue;
    }

    const advanced = operator.endsWith('Advanced');
    const bound = toBound(value, advanced);
    if (!bound) {
      tokens.push({ kind: 'INVALID', operator, value });
      continue;
    }

    if (operator === 'MaxLevel' || operator === 'MaxAdvanced') {
      tokens.push({ kind: 'MAX', ...bound });
      continue;
    }

    const maxOperator = advanced ? 'MaxAdvanced' : 'MaxLevel';
    const maxBound = maxOperator in operators ? toBound(operators[maxOperator], advanced) : undefined;
    const shape = maxBound ? pairShape(bound, maxBound) : undefined;
    const range = maxBound && shape === 'RANGE' ? rangeOf(bound, maxBound) : undefined;

    if (shape === 'EQUAL') {
      tokens.push({ kind: 'EQUAL', ...bound });
      consumed.add(maxOperator);
    } else if (range) {
      tokens.push({ kind: 'RANGE', ...range });
      consumed.add(maxOperator);
    } else {
      tokens.push({ kind: 'MIN', ...bound });
    }
  }

  return [...tokens, ...invalidLeftovers(operators, REQUIREMENT_OPERATORS)];
}

export function tokenizeEffect(operators: RawOperators): EffectToken[] {
  const tokens: EffectToken[] = [];
  let guardsPaired = false;

  for (const operator of EFFECT_OPERATORS) {
    if (!(operator in operators)) continue;
    const value = operators[operator];

    if (operator === 'ChangeByAdvanced' || operator === 'SetToExactlyAdvanced') {
      tokens.push({ kind: operator === 'ChangeByAdvanced' ? 'CHANGEADV' : 'SETTOADV', expression: String(value) });
      continue;
    }

    const level = asNumber(value);
    if (level === undefined) {
      tokens.push({ kind: 'INVALID', operator, value });
      continue;
    }

    switch (operator) {
      case 'Level':
        tokens.push({ kind: 'LEVEL', amount: level });
        break;
      case 'SetToExactly':
        tokens.push({ kind: 'SETTO', value: level });
        break;
      case 'OnlyIfAtLeast': {
        const ceiling = 'OnlyIfNoMoreThan' in operators ? asNumber(operators.OnlyIfNoMoreThan) : undefined;
        const shape = ceiling === undefined
          ? undefined
          : pairShape({ advanced: false, value: level }, { advanced: false, value: ceiling });
        if (ceiling !== undefined && shape === 'EQUAL') {
          tokens.push({ kind: 'IFEQUAL', value: level });
          guardsPaired = true;
        } else if (ceiling !== undefined && shape === 'RANGE') {
          tokens.push({ kind: 'IFRANGE', min: level, max: ceiling });
          guardsPaired = true;
        } else {
          tokens.push({ kind: 'IFMIN', value: level });
        }
        break;
      }
      case 'OnlyIfNoMoreThan':
        if (!guardsPaired) tokens.push({ kind: 'IFMAX', value: level });
        break;
    }
  }

  return [...tokens, ...invalidLeftovers(operators, EFFECT_OPERATORS)];
}

function formatOperators(operators: RawOperators): string {
  return Object.entries(operators)
    .map(([name, value]) => `${name}: ${value}`)
    .join(', ');
}

/** Operators attached to one quality, shared shape of Requirement and Effect. */
abstract class QualityOperator {
  readonly id: number;
  readonly operators: RawOperators;

  constructor(readonly quality: Quality, data: OperatorData) {
    this.id = data.id;
    this.operators = Object.freeze({ ...data.operators });
  }

  get qualityId(): QualityId {
    return this.quality.id;
  }

  /** Operator names that are not meaningful for this kind. */
  abstract invalidOperators(): string[];

  toString(): string {
    return `${this.quality.name || `Quality(${this.quality.id})`} (${formatOperators(this.operators)})`;
  }
}

export class Requirement extends QualityOperator {
  readonly tokens: readonly RequirementToken[];

  constructor(quality: Quality, data: OperatorData) {
    super(quality, data);
    this.tokens = tokenizeRequirement(quality, this.operators);
  }

  invalidOperators(): string[] {
    return this.tokens.flatMap((token) => (token.kind === 'INVALID' ? [token.operator] : []));
  }

  /** Tokens accepted as present but never evaluated: challenge, luck and advanced bounds. */
  unevaluated(): RequirementToken[] {
    return this.tokens.filter((token) => {
      switch (token.kind) {
        case 'CHALLENGE':
        case 'LUCK':
        case 'CHALLENGEADV':
          return true;
        case 'MIN':
        case 'MAX':
        case 'EQUAL':
        case 'RANGE':
          return token.advanced;
        case 'INVALID':
          return false;
      }
    });
  }

  /**
   * Only the numeric Min/Max gates decide; everything else passes.
   */
  isSatisfiedBy(value: number): boolean {
    for (const token of this.tokens) {
      if (!('advanced' in token) || token.advanced) continue;
      switch (token.kind) {
        case 'MIN':
          if (value < token.value) return false;
          break;
        case 'MAX':
          if (value > token.value) return false;
          break;
        case 'EQUAL':
          if (value !== token.value) return false;
          break;
        case 'RANGE':
          if (value < token.min || value > token.max) return false;
          break;
      }
    }
    return true;
  }
}

const VALUE_SETTERS: readonly EffectOperator[] = ['Level', 'ChangeByAdvanced', 'SetToExactly', 'SetToExactlyAdvanced'];

const MUTATION_KINDS: ReadonlySet<EffectToken['kind']> = new Set(['LEVEL', 'SETTO', 'CHANGEADV', 'SETTOADV']);

function isMutation(token: EffectToken): token is EffectMutationToken {
  return MUTATION_KINDS.has(token.kind);
}

function isGuard(token: EffectToken): token is EffectGuardToken {
  return token.kind === 'IFMIN' || token.kind === 'IFMAX' || token.kind === 'IFEQUAL' || token.kind === 'IFRANGE';
}

export function guardAllows(token: EffectGuardToken, value: number): boolean {
  switch (token.kind) {
    case 'IFMIN':
      return value >= token.value;
    case 'IFMAX':
      return value <= token.value;
    case 'IFEQUAL':
      return value === token.value;
    case 'IFRANGE':
      return value >= token.min && value <= token.max;
  }
}

export class Effect extends QualityOperator {
  readonly tokens: readonly EffectToken[];

  constructor(quality: Quality, data: OperatorData) {
    super(quality, data);
    this.tokens = tokenizeEffect(this.operators);
  }

  invalidOperators(): string[] {
    return this.tokens.flatMap((token) => (token.kind === 'INVALID' ? [token.operator] : []));
  }

  /** Guards first, then mutations: the reverse of the declaration order. */
  evaluationOrder(): EffectToken[] {
    return [...this.tokens].reverse().filter((token) => token.kind !== 'INVALID');
  }

  guards(): EffectGuardToken[] {
    return this.evaluationOrder().filter(isGuard);
  }

  /** The single value-changing token that applies, if any. */
  mutation(): EffectMutationToken | undefined {
    return this.evaluationOrder().find(isMutation);
  }

  /** More than one value-setting operator (e.g. Level with SetToExactly) is a data defect. */
  exclusiveConflict(): EffectOperator[] {
    const setters = VALUE_SETTERS.filter((name) => name in this.operators);
    return setters.length > 1 ? setters : [];
  }
}
