export * from './models.js';
export { CFG, type AppConfig } from './config.js';
export { QualityRegistry, createQuality, placeholderQuality, statusFor, compileNameFilter } from './content/qualityRegistry.js';
export { EventCatalog } from './content/eventCatalog.js';
export { LocationCatalog, createLocation, type LocationCatalogOptions } from './content/locationCatalog.js';
export {
  DEFAULT_LUCK_CATEGORY,
  buildRuleset,
  loadRuleset,
  parseQuality,
  parseLocation,
  parseOperatorData,
  parseStatusText,
  type RawEntities,
  type Ruleset,
  type RulesetOptions,
} from './content/rulesetLoader.js';
export * from './engine/operators.js';
export { RuleEngine, combineResults, canFail, countResolutions, type RuleEngineOptions } from './engine/rules.js';
export { ReferenceResolver, DEFAULT_TEMPLATES, formatTemplate, hasReferences } from './engine/references.js';
export type { ReferenceTemplates, ResolveOptions } from './engine/references.js';
export * from './engine/render.js';
export { SeededRandom, mathRandom, constantRandom, type RandomSource } from './engine/random.js';
export { Save, SaveQuality } from './persistence/saveState.js';
export { JsonSaveStore, openSaveStore, type SaveStore } from './persistence/saveStore.js';
export { SaveDatabase, SqliteSaveStore } from './persistence/db.js';
export { SaveEditor, type QualityChange } from './tools/saveEditor.js';
export { IntegrityValidator, reportIssues, type ValidationIssue, type ValidationResult } from './testing/integrityValidator.js';
export * from './utils/diagnostics.js';
export * from './utils/errorhandler.js';
export { Logger, createLogger, logger, type LogLevelName, type LogMeta } from './utils/logger.js';
