import type { Action, CheckResult, Outcome, OutcomeKind, ResolutionStep } from '../models.js';
import type { Save } from '../persistence/saveState.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import { guardAllows, type Effect, type Requirement } from './operators.js';
import { mathRandom, type RandomSource } from './random.js';

type BaseOutcome = 'Default' | 'Success';

const BASE_OUTCOME: Record<Exclude<CheckResult, 'LOCKED'>, BaseOutcome> = {
  DEFAULT: 'Default',
  // A failed challenge plays the Default branch; Success only exists on actions that can fail.
  FAILURE: 'Default',
  SUCCESS: 'Success',
};

const RARE_SIBLING: Record<BaseOutcome, OutcomeKind> = {
  Default: 'RareDefault',
  Success: 'RareSuccess',
};

const RESULT_PRECEDENCE: readonly CheckResult[] = ['LOCKED', 'FAILURE', 'SUCCESS', 'DEFAULT'];

/** LOCKED beats FAILURE beats SUCCESS beats DEFAULT. */
export function combineResults(results: Iterable<CheckResult>): CheckResult {
  const seen = new Set(results);
  return RESULT_PRECEDENCE.find((result) => seen.has(result)) ?? 'DEFAULT';
}

export function canFail(action: Action): boolean {
  return action.outcomes.Success !== undefined;
}

export interface RuleEngineOptions {
  random?: RandomSource;
  logger?: Logger;
}

export class RuleEngine {
  private readonly random: RandomSource;
  private readonly logger: Logger;

  constructor(options: RuleEngineOptions = {}) {
    this.random = options.random ?? mathRandom;
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Only numeric MinLevel/MaxLevel bounds are evaluated. Challenge, luck and
   * advanced bounds are accepted as present and never lock or fail the action.
   */
  check(requirements: readonly Requirement[], save: Save): CheckResult {
    for (const requirement of requirements) {
      const entry = save.get(requirement.qualityId);
      if (!requirement.isSatisfiedBy(entry.value)) {
        this.logger.debug('Requirement not met', {
          requirement: requirement.id,
          quality: requirement.qualityId,
          value: entry.value,
        });
        return 'LOCKED';
      }
      const skipped = requirement.unevaluated();
      if (skipped.length > 0) {
        this.logger.debug('Requirement operators not evaluated', {
          requirement: requirement.id,
          kinds: skipped.map((token) => token.kind),
        });
      }
    }
    return 'DEFAULT';
  }

  pickOutcome(action: Action, result: Exclude<CheckResult, 'LOCKED'>): { outcome: Outcome; rare: boolean } {
    let branch = BASE_OUTCOME[result];
    if (!action.outcomes[branch]) {
      this.logger.warn('Outcome branch missing, using Default', { action: action.id, branch });
      branch = 'Default';
    }

    const chosen = action.outcomes[branch] ?? action.outcomes.Default;
    const rare = action.outcomes[RARE_SIBLING[branch]];
    if (rare && this.random.nextInt(100) < (rare.chance ?? 0)) {
      return { outcome: rare, rare: true };
    }
    return { outcome: chosen, rare: false };
  }

  /** Returns whether the effect changed anything it was allowed to. */
  applyEffect(effect: Effect, save: Save): boolean {
    const entry = save.get(effect.qualityId);

    for (const guard of effect.guards()) {
      if (!guardAllows(guard, entry.value)) {
        this.logger.debug('Effect guard not met', { effect: effect.id, guard: guard.kind, value: entry.value });
        return false;
      }
    }

    const mutation = effect.mutation();
    if (!mutation) return false;

    switch (mutation.kind) {
      case 'SETTO':
        entry.value = mutation.value;
        return true;
      case 'LEVEL':
        entry.increaseBy(mutation.amount);
        return true;
      case 'CHANGEADV':
      case 'SETTOADV':
        this.logger.warn('Advanced effect not implemented', {
          effect: effect.id,
          quality: effect.qualityId,
          kind: mutation.kind,
          expression: mutation.expression,
        });
        return false;
    }
  }

  applyEffects(effects: readonly Effect[], save: Save): number {
    let applied = 0;
    for (const effect of effects) {
      if (this.applyEffect(effect, save)) applied++;
    }
    return applied;
  }

  /**
   * Runs an action up to `repeats` times, stopping at the first LOCKED check.
   * Locked iterations are not recorded.
   */
  resolve(action: Action, save: Save, repeats = 1): ResolutionStep[] {
    const steps: ResolutionStep[] = [];

    for (let i = 0; i < repeats; i++) {
      const result = this.check(action.requirements, save);
      if (result === 'LOCKED') break;

      const { outcome, rare } = this.pickOutcome(action, result);
      this.applyEffects(outcome.effects, save);
      steps.push({ result, outcome: outcome.kind, rare });
    }

    this.logger.info(`Resolved action ${action.id} ${steps.length}/${repeats} times`, {
      action: action.id,
      name: action.name,
      outcomes: steps.map((step) => step.outcome),
    });
    return steps;
  }
}

export function countResolutions(steps: readonly ResolutionStep[], outcome?: OutcomeKind): number {
  return outcome ? steps.filter((step) => step.outcome === outcome).length : steps.length;
}
