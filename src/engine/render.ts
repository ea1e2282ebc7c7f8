import { OUTCOME_KINDS, type Action, type Outcome } from '../models.js';
import type { Effect, EffectToken, Requirement, RequirementToken } from './operators.js';
import type { ReferenceResolver, ResolveOptions } from './references.js';

export interface RenderOptions extends ResolveOptions {
  /** Expands [q:..] / [d:..] markers in advanced values when given. */
  resolver?: ReferenceResolver;
}

function expression(text: string, options: RenderOptions): string {
  return options.resolver ? options.resolver.resolve(text, options) : text;
}

function signed(amount: number): string {
  return amount >= 0 ? `+${amount}` : String(amount);
}

function bound(value: number | string, advanced: boolean, options: RenderOptions): string {
  return advanced ? expression(String(value), options) : String(value);
}

export function renderRequirementToken(token: RequirementToken, options: RenderOptions = {}): string {
  switch (token.kind) {
    case 'MIN':
      return `≥ ${bound(token.value, token.advanced, options)}`;
    case 'MAX':
      return `≤ ${bound(token.value, token.advanced, options)}`;
    case 'EQUAL':
      return `= ${bound(token.value, token.advanced, options)}`;
    case 'RANGE':
      return `${bound(token.min, token.advanced, options)}–${bound(token.max, token.advanced, options)}`;
    case 'CHALLENGE':
      return `challenge ${token.difficulty} (100% at ${token.cap})`;
    case 'LUCK':
      return `luck ${token.cap}%`;
    case 'CHALLENGEADV':
      return `challenge ${expression(token.expression, options)} (scaler ${token.scaler}, ×${token.factor})`;
    case 'INVALID':
      return `${token.operator} ${token.value}`;
  }
}

export function renderEffectToken(token: EffectToken, options: RenderOptions = {}): string {
  switch (token.kind) {
    case 'LEVEL':
      return signed(token.amount);
    case 'SETTO':
      return `= ${token.value}`;
    case 'CHANGEADV':
      return `+ (${expression(token.expression, options)})`;
    case 'SETTOADV':
      return `= (${expression(token.expression, options)})`;
    case 'IFMIN':
      return `if ≥ ${token.value}`;
    case 'IFMAX':
      return `if ≤ ${token.value}`;
    case 'IFEQUAL':
      return `if = ${token.value}`;
    case 'IFRANGE':
      return `if ${token.min}–${token.max}`;
    case 'INVALID':
      return `${token.operator} ${token.value}`;
  }
}

function qualityLabel(operator: Requirement | Effect): string {
  return operator.quality.name || `Quality(${operator.quality.id})`;
}

export function describeRequirement(requirement: Requirement, options: RenderOptions = {}): string {
  const parts = requirement.tokens.map((token) => renderRequirementToken(token, options));
  return `${qualityLabel(requirement)} [${parts.join(' and ')}]`;
}

export function describeEffect(effect: Effect, options: RenderOptions = {}): string {
  const parts = effect.tokens.map((token) => renderEffectToken(token, options));
  return `${qualityLabel(effect)} [${parts.join(', ')}]`;
}

export function describeOutcome(outcome: Outcome, options: RenderOptions = {}): string {
  const header = outcome.chance ? `${outcome.kind} ${outcome.chance}%` : outcome.kind;
  const lines = [`${header}:${outcome.name ? ` ${outcome.name}` : ''}`];
  for (const effect of outcome.effects) {
    lines.push(`\t${describeEffect(effect, options)}`);
  }
  if (outcome.triggerEventId !== undefined) {
    lines.push(`\tTrigger event: ${outcome.triggerEventId}`);
  }
  return lines.join('\n');
}

export function describeAction(action: Action, options: RenderOptions = {}): string {
  const lines = [`${action.id} - ${action.name}`];
  if (action.requirements.length > 0) {
    lines.push(`\tRequirements: ${action.requirements.length}`);
    for (const requirement of action.requirements) {
      lines.push(`\t\t${describeRequirement(requirement, options)}`);
    }
  }
  for (const kind of OUTCOME_KINDS) {
    const outcome = action.outcomes[kind];
    if (!outcome) continue;
    lines.push(...describeOutcome(outcome, options).split('\n').map((line) => `\t${line}`));
  }
  return lines.join('\n');
}
