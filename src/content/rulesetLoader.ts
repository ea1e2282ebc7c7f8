import fs from 'fs-extra';
import path from 'path';
import { DISPLAY_HINTS, Effect, Requirement } from '../engine/operators.js';
import {
  OUTCOME_KINDS,
  type Action,
  type GameEvent,
  type Location,
  type OperatorData,
  type OperatorValue,
  type Outcome,
  type OutcomeKind,
  type OutcomeTable,
  type Quality,
} from '../models.js';
import { IntegrityValidator, reportIssues } from '../testing/integrityValidator.js';
import { logDiagnostics, type DiagnosticSink } from '../utils/diagnostics.js';
import { RulesetLoadError } from '../utils/errorhandler.js';
import { logger } from '../utils/logger.js';
import { EventCatalog } from './eventCatalog.js';
import { createLocation, LocationCatalog } from './locationCatalog.js';
import { createQuality, QualityRegistry } from './qualityRegistry.js';

export const DEFAULT_LUCK_CATEGORY = 16000;

export interface RulesetOptions {
  integrityChecks?: boolean;
  diagnostics?: DiagnosticSink;
  luckCategory?: number;
}

export interface Ruleset {
  qualities: QualityRegistry;
  locations: LocationCatalog;
  events: EventCatalog;
}

/** Parsed JSON arrays as read from the entity dumps. */
export interface RawEntities {
  qualities?: unknown[];
  areas?: unknown[];
  events?: unknown[];
}

type UnknownRecord = Record<string, unknown>;
type EntityKind = 'quality' | 'location' | 'event' | 'action' | 'outcome';

interface FieldRules {
  required: ReadonlySet<string>;
  known: ReadonlySet<string>;
}

function fieldRules(required: string[], optional: string[], ignored: string[]): FieldRules {
  return {
    required: new Set(['Id', ...required]),
    known: new Set(['Id', 'Name', 'Description', 'Image', ...required, ...optional, ...ignored]),
  };
}

const OUTCOME_FIELDS = OUTCOME_KINDS.flatMap((kind) => [`${kind}Event`, `${kind}EventChance`]);

const FIELDS: Record<EntityKind, FieldRules> = {
  quality: fieldRules(
    ['Name'],
    ['ChangeDescriptionText', 'LevelDescriptionText', 'LevelImageText', 'AvailableAt', 'Cap', 'Category',
      'IsSlot', 'Nature', 'Persistent', 'Tag', 'Visible'],
    ['AllowedOn', 'AssignToSlot', 'CssClasses', 'DifficultyScaler', 'DifficultyTestType', 'Enhancements', 'Notes',
      'Ordering', 'OwnerName', 'PyramidNumberIncreaseLimit', 'QEffectPriority', 'QualitiesPossessedList',
      'UseEvent', 'UsePyramidNumbers']
  ),
  location: fieldRules(['Name'], ['ImageName', 'MoveMessage'], []),
  event: fieldRules(
    ['ChildBranches', 'QualitiesRequired'],
    ['Autofire', 'Category', 'LimitedToArea', 'QualitiesAffected'],
    ['CanGoBack', 'ChallengeLevel', 'Deck', 'Distribution', 'ExoticEffects', 'Ordering', 'Setting', 'Stickiness',
      'Transient', 'Urgency']
  ),
  action: fieldRules(['QualitiesRequired', 'ParentEvent'], OUTCOME_FIELDS, ['ActionCost', 'ButtonText', 'Ordering']),
  outcome: fieldRules(
    [],
    ['QualitiesAffected', 'LinkToEvent'],
    ['Category', 'ExoticEffects', 'MoveToArea', 'Urgency', 'SwitchToSetting', 'SwitchToSettingId']
  ),
};

const isRecord = (value: unknown): value is UnknownRecord =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

function num(record: UnknownRecord, key: string, fallback = 0): number {
  const value = record[key];
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim() !== '' && Number.isFinite(Number(value))) return Number(value);
  return fallback;
}

function optionalNum(record: UnknownRecord, key: string): number | undefined {
  return record[key] === undefined || record[key] === null ? undefined : num(record, key);
}

function str(record: UnknownRecord, key: string): string {
  const value = record[key];
  return typeof value === 'string' ? value : '';
}

function bool(record: UnknownRecord, key: string): boolean {
  return record[key] === true;
}

function refId(record: UnknownRecord, key: string): number | undefined {
  const ref = record[key];
  return isRecord(ref) && typeof ref.Id === 'number' ? ref.Id : undefined;
}

function records(record: UnknownRecord, key: string): UnknownRecord[] {
  const value = record[key];
  return Array.isArray(value) ? value.filter(isRecord) : [];
}

/** "0|Unknown~3|Known~10|Famous" into threshold -> text. */
export function parseStatusText(text: string): Map<number, string> {
  const statuses = new Map<number, string>();
  if (!text) return statuses;
  for (const row of text.split('~')) {
    const separator = row.indexOf('|');
    if (separator < 0) continue;
    const threshold = Number(row.slice(0, separator));
    if (Number.isInteger(threshold)) {
      statuses.set(threshold, row.slice(separator + 1));
    }
  }
  return statuses;
}

export function parseQuality(raw: UnknownRecord, luckCategory = DEFAULT_LUCK_CATEGORY): Quality {
  const category = num(raw, 'Category');
  return createQuality({
    id: num(raw, 'Id'),
    name: str(raw, 'Name'),
    description: str(raw, 'Description'),
    cap: num(raw, 'Cap'),
    category,
    difficultyScaler: Math.max(0, num(raw, 'DifficultyScaler')),
    isLuck: category === luckCategory,
    usesPyramidNumbers: bool(raw, 'UsePyramidNumbers'),
    pyramidLimit: Math.max(0, num(raw, 'PyramidNumberIncreaseLimit')),
    levelStatus: parseStatusText(str(raw, 'LevelDescriptionText')),
    changeStatus: parseStatusText(str(raw, 'ChangeDescriptionText')),
    assignToSlotId: refId(raw, 'AssignToSlot'),
    tag: str(raw, 'Tag'),
    nature: num(raw, 'Nature'),
    persistent: bool(raw, 'Persistent'),
    visible: bool(raw, 'Visible'),
  });
}

export function parseLocation(raw: UnknownRecord): Location {
  return createLocation({
    id: num(raw, 'Id'),
    name: str(raw, 'Name'),
    description: str(raw, 'Description'),
    message: str(raw, 'MoveMessage'),
  });
}

export function parseOperatorData(raw: UnknownRecord): OperatorData | undefined {
  const qualityId = refId(raw, 'AssociatedQuality');
  if (qualityId === undefined) return undefined;

  const operators: Record<string, OperatorValue> = {};
  for (const [name, value] of Object.entries(raw)) {
    if (name === 'Id' || name === 'AssociatedQuality' || value === null || value === undefined) continue;
    if (typeof value === 'number' || typeof value === 'string') {
      operators[name] = value;
    } else if (!DISPLAY_HINTS.has(name)) {
      operators[name] = typeof value === 'boolean' ? String(value) : JSON.stringify(value);
    }
  }
  return { id: num(raw, 'Id'), qualityId, operators };
}

class RulesetBuilder {
  private readonly diagnostics: DiagnosticSink;
  private readonly integrityChecks: boolean;

  constructor(
    private readonly qualities: QualityRegistry,
    private readonly locations: LocationCatalog,
    options: RulesetOptions
  ) {
    this.diagnostics = options.diagnostics ?? logDiagnostics;
    this.integrityChecks = options.integrityChecks ?? false;
  }

  checkFields(kind: EntityKind, raw: UnknownRecord, entityPath: string) {
    if (!this.integrityChecks) return;
    const rules = FIELDS[kind];
    const fields = Object.keys(raw);

    const missing = [...rules.required].filter((field) => !(field in raw)).sort();
    if (missing.length > 0) {
      this.diagnostics.report({
        severity: 'error',
        code: 'MISSING_FIELDS',
        message: `${entityPath} is missing required fields: ${missing.join(', ')}`,
        path: entityPath,
      });
    }

    const unknown = fields.filter((field) => !rules.known.has(field)).sort();
    if (unknown.length > 0) {
      this.diagnostics.report({
        severity: 'warning',
        code: 'UNKNOWN_FIELDS',
        message: `${entityPath} contains unknown fields: ${unknown.join(', ')}`,
        path: entityPath,
      });
    }
  }

  private operators<T>(
    raw: UnknownRecord,
    key: string,
    entityPath: string,
    create: (quality: Quality, data: OperatorData) => T
  ): T[] {
    const built: T[] = [];
    records(raw, key).forEach((item, index) => {
      const itemPath = `${entityPath}.${key}[${index}]`;
      const data = parseOperatorData(item);
      if (!data) {
        this.diagnostics.report({
          severity: 'error',
          code: 'MISSING_FIELDS',
          message: `${itemPath} has no AssociatedQuality`,
          path: itemPath,
        });
        return;
      }
      const associated = item.AssociatedQuality;
      const fallbackName = isRecord(associated) ? str(associated, 'Name') : '';
      built.push(create(this.qualities.resolve(data.qualityId, fallbackName, itemPath), data));
    });
    return built;
  }

  requirements(raw: UnknownRecord, entityPath: string): Requirement[] {
    return this.operators(raw, 'QualitiesRequired', entityPath, (quality, data) => new Requirement(quality, data));
  }

  effects(raw: UnknownRecord, entityPath: string): Effect[] {
    return this.operators(raw, 'QualitiesAffected', entityPath, (quality, data) => new Effect(quality, data));
  }

  outcome(raw: UnknownRecord, kind: OutcomeKind, chance: number | undefined, entityPath: string): Outcome {
    this.checkFields('outcome', raw, entityPath);
    return {
      kind,
      id: num(raw, 'Id'),
      name: str(raw, 'Name'),
      description: str(raw, 'Description'),
      chance,
      effects: this.effects(raw, entityPath),
      triggerEventId: refId(raw, 'LinkToEvent'),
      moveToAreaId: refId(raw, 'MoveToArea'),
      exoticEffects: str(raw, 'ExoticEffects') || undefined,
    };
  }

  action(raw: UnknownRecord, parent: number, entityPath: string): Action {
    this.checkFields('action', raw, entityPath);
    const id = num(raw, 'Id');

    const parentId = refId(raw, 'ParentEvent');
    if (this.integrityChecks && parentId !== undefined && parentId !== parent) {
      this.diagnostics.report({
        severity: 'warning',
        code: 'PARENT_MISMATCH',
        message: `${entityPath} names parent ${parentId} but belongs to event ${parent}`,
        path: entityPath,
      });
    }

    const branches: Partial<Record<OutcomeKind, Outcome>> = {};
    for (const kind of OUTCOME_KINDS) {
      const branch = raw[`${kind}Event`];
      if (isRecord(branch)) {
        branches[kind] = this.outcome(branch, kind, optionalNum(raw, `${kind}EventChance`), `${entityPath}.${kind}Event`);
      }
    }

    let fallback = branches.Default;
    if (!fallback) {
      if (this.integrityChecks) {
        this.diagnostics.report({
          severity: 'error',
          code: 'MISSING_DEFAULT_OUTCOME',
          message: `${entityPath} has no DefaultEvent`,
          path: entityPath,
        });
      }
      fallback = { kind: 'Default', id, name: '', description: '', effects: [] };
    }
    const outcomes: OutcomeTable = { ...branches, Default: fallback };

    return {
      id,
      name: str(raw, 'Name'),
      description: str(raw, 'Description'),
      requirements: this.requirements(raw, entityPath),
      outcomes,
    };
  }

  event(raw: UnknownRecord, entityPath: string): GameEvent {
    this.checkFields('event', raw, entityPath);
    const id = num(raw, 'Id');
    const area = raw.LimitedToArea;
    const areaId = refId(raw, 'LimitedToArea');
    const location = areaId === undefined
      ? undefined
      : this.locations.resolve(areaId, isRecord(area) ? str(area, 'Name') : '', `${entityPath}.LimitedToArea`);

    return {
      id,
      name: str(raw, 'Name'),
      description: str(raw, 'Description'),
      location,
      autofire: bool(raw, 'Autofire'),
      category: num(raw, 'Category'),
      requirements: this.requirements(raw, entityPath),
      effects: this.effects(raw, entityPath),
      actions: records(raw, 'ChildBranches').map((item, index) =>
        this.action(item, id, `${entityPath}.ChildBranches[${index}]`)
      ),
    };
  }
}

function withIds(raws: unknown[], kind: string, diagnostics: DiagnosticSink): UnknownRecord[] {
  const usable: UnknownRecord[] = [];
  raws.forEach((raw, index) => {
    if (isRecord(raw) && typeof raw.Id === 'number') {
      usable.push(raw);
      return;
    }
    diagnostics.report({
      severity: 'error',
      code: 'MISSING_FIELDS',
      message: `${kind}[${index}] has no numeric Id and was skipped`,
      path: `${kind}[${index}]`,
    });
  });
  return usable;
}

export function buildRuleset(raw: RawEntities, options: RulesetOptions = {}): Ruleset {
  const diagnostics = options.diagnostics ?? logDiagnostics;
  const luckCategory = options.luckCategory ?? DEFAULT_LUCK_CATEGORY;

  const qualityRecords = withIds(raw.qualities ?? [], 'qualities', diagnostics);
  const qualities = new QualityRegistry(
    qualityRecords.map((item) => parseQuality(item, luckCategory)),
    { integrityChecks: options.integrityChecks, diagnostics }
  );

  const areaRecords = withIds(raw.areas ?? [], 'areas', diagnostics);
  const locations = new LocationCatalog(areaRecords.map(parseLocation), {
    integrityChecks: options.integrityChecks,
    diagnostics,
  });

  const builder = new RulesetBuilder(qualities, locations, options);
  for (const item of qualityRecords) {
    builder.checkFields('quality', item, `qualities.${num(item, 'Id')}`);
  }
  for (const item of areaRecords) {
    builder.checkFields('location', item, `areas.${num(item, 'Id')}`);
  }

  const events = new EventCatalog(
    withIds(raw.events ?? [], 'events', diagnostics).map((item) => builder.event(item, `events.${num(item, 'Id')}`))
  );
  const ruleset: Ruleset = { qualities, locations, events };

  if (options.integrityChecks) {
    reportIssues(new IntegrityValidator().validateRuleset(ruleset), diagnostics);
  }

  logger.debug('Ruleset built', { qualities: qualities.size, locations: locations.size, events: events.size });
  return ruleset;
}

export function entityPath(dataDir: string, entity: string): string {
  return path.join(dataDir, 'entities', `${entity}_import.json`);
}

export function loadEntities(dataDir: string, entity: string): unknown[] {
  const file = entityPath(dataDir, entity);
  logger.debug(`Opening data file for '${entity}'`, { file });

  if (!fs.pathExistsSync(file)) {
    logger.error(`Could not load data file for '${entity}'`, { file });
    return [];
  }

  let data: unknown;
  try {
    data = fs.readJSONSync(file);
  } catch (error) {
    throw new RulesetLoadError(error instanceof Error ? error.message : String(error), file);
  }

  if (!Array.isArray(data)) {
    throw new RulesetLoadError(`expected a JSON array of ${entity}`, file);
  }
  return data;
}

export function loadRuleset(dataDir: string, options: RulesetOptions = {}): Ruleset {
  return buildRuleset(
    {
      qualities: loadEntities(dataDir, 'qualities'),
      areas: loadEntities(dataDir, 'areas'),
      events: loadEntities(dataDir, 'events'),
    },
    options
  );
}
