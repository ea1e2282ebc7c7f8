import type { Ruleset } from '../content/rulesetLoader.js';
import { EFFECT_OPERATORS, REQUIREMENT_OPERATORS, type Effect, type Requirement } from '../engine/operators.js';
import { OUTCOME_KINDS, type Action, type GameEvent, type Outcome } from '../models.js';
import type { DiagnosticCode, DiagnosticSeverity, DiagnosticSink } from '../utils/diagnostics.js';

export interface ValidationIssue {
  path: string;
  severity: DiagnosticSeverity;
  code: DiagnosticCode;
  message: string;
}

export interface ValidationResult {
  ok: boolean;
  issues: ValidationIssue[];
}

function result(issues: ValidationIssue[]): ValidationResult {
  return { ok: issues.every((issue) => issue.severity !== 'error'), issues };
}

type OperatorKind = 'requirement' | 'effect';

const KNOWN_OPERATORS: Record<OperatorKind, ReadonlySet<string>> = {
  requirement: new Set<string>(REQUIREMENT_OPERATORS),
  effect: new Set<string>(EFFECT_OPERATORS),
};

// A known operator only turns invalid when its value does not parse.
function operatorIssue(kind: OperatorKind, operator: string, owner: Requirement | Effect, path: string): ValidationIssue {
  if (KNOWN_OPERATORS[kind].has(operator)) {
    return {
      path,
      severity: 'error',
      code: 'UNPARSEABLE_OPERATOR_VALUE',
      message: `${kind} operator '${operator}' has an unparseable value on ${owner.toString()}`,
    };
  }
  return {
    path,
    severity: 'error',
    code: 'UNKNOWN_OPERATOR',
    message: `unknown ${kind} operator '${operator}' on ${owner.toString()}`,
  };
}

export class IntegrityValidator {
  validateRuleset(ruleset: Ruleset): ValidationResult {
    return result(ruleset.events.all().flatMap((event) => this.validateEvent(event).issues));
  }

  validateEvent(event: GameEvent): ValidationResult {
    const path = `events.${event.id}`;
    const issues = [
      ...this.checkRequirements(event.requirements, `${path}.QualitiesRequired`),
      ...this.checkEffects(event.effects, `${path}.QualitiesAffected`),
    ];

    event.actions.forEach((action, index) => {
      issues.push(...this.validateAction(action, `${path}.ChildBranches[${index}]`).issues);
    });
    return result(issues);
  }

  validateAction(action: Action, path = `actions.${action.id}`): ValidationResult {
    const issues = this.checkRequirements(action.requirements, `${path}.QualitiesRequired`);

    if (action.outcomes.RareSuccess && !action.outcomes.Success) {
      issues.push({
        path: `${path}.RareSuccessEvent`,
        severity: 'warning',
        code: 'ORPHAN_RARE_OUTCOME',
        message: 'rare success outcome without a success outcome',
      });
    }

    for (const kind of OUTCOME_KINDS) {
      const outcome = action.outcomes[kind];
      if (outcome) {
        issues.push(...this.checkOutcome(outcome, `${path}.${kind}Event`));
      }
    }
    return result(issues);
  }

  private checkOutcome(outcome: Outcome, path: string): ValidationIssue[] {
    const issues = this.checkEffects(outcome.effects, `${path}.QualitiesAffected`);
    if (outcome.chance !== undefined && (outcome.chance < 0 || outcome.chance > 100)) {
      issues.push({
        path: `${path}Chance`,
        severity: 'error',
        code: 'INVALID_CHANCE',
        message: `chance ${outcome.chance} is outside 0-100`,
      });
    }
    return issues;
  }

  private checkDuplicates(operators: readonly (Requirement | Effect)[], path: string): ValidationIssue[] {
    const seen = new Set<number>();
    const issues: ValidationIssue[] = [];
    for (const operator of operators) {
      if (seen.has(operator.qualityId)) {
        issues.push({
          path,
          severity: 'warning',
          code: 'DUPLICATE_QUALITY_REF',
          message: `quality ${operator.qualityId} is referenced more than once`,
        });
      }
      seen.add(operator.qualityId);
    }
    return issues;
  }

  private checkRequirements(requirements: readonly Requirement[], path: string): ValidationIssue[] {
    const issues = this.checkDuplicates(requirements, path);
    requirements.forEach((requirement, index) => {
      for (const operator of requirement.invalidOperators()) {
        issues.push(operatorIssue('requirement', operator, requirement, `${path}[${index}]`));
      }
    });
    return issues;
  }

  private checkEffects(effects: readonly Effect[], path: string): ValidationIssue[] {
    const issues = this.checkDuplicates(effects, path);
    effects.forEach((effect, index) => {
      for (const operator of effect.invalidOperators()) {
        issues.push(operatorIssue('effect', operator, effect, `${path}[${index}]`));
      }
      const conflict = effect.exclusiveConflict();
      if (conflict.length > 0) {
        issues.push({
          path: `${path}[${index}]`,
          severity: 'error',
          code: 'EXCLUSIVE_EFFECT_OPERATORS',
          message: `${conflict.join(' and ')} cannot be combined on ${effect.toString()}`,
        });
      }
    });
    return issues;
  }
}

export function reportIssues(validation: ValidationResult, sink: DiagnosticSink) {
  for (const issue of validation.issues) {
    sink.report(issue);
  }
}
