import fs from 'fs-extra';
import path from 'path';
import equal from 'fast-deep-equal';
import { nanoid } from 'nanoid';
import type { SaveQualityRecord, SaveRecord } from '../models.js';
import { SaveStoreError } from '../utils/errorhandler.js';
import { logger } from '../utils/logger.js';
import { SaveDatabase, SqliteSaveStore } from './db.js';

export interface SaveStore {
  load(): SaveRecord;
  /** Persists the record; returns false when nothing changed and no write happened. */
  write(record: SaveRecord): boolean;
  close?(): void;
}

type UnknownRecord = Record<string, unknown>;

const isRecord = (value: unknown): value is UnknownRecord =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const ENTRIES = 'QualitiesPossessedList';

function entriesOf(document: UnknownRecord): unknown[] {
  const entries: unknown = document[ENTRIES];
  return Array.isArray(entries) ? entries : [];
}

function entryId(entry: UnknownRecord): number | undefined {
  const quality = entry.AssociatedQuality;
  return isRecord(quality) && typeof quality.Id === 'number' ? quality.Id : undefined;
}

function numberField(entry: UnknownRecord, key: string): number {
  const value = entry[key];
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim() !== '' && Number.isFinite(Number(value))) return Number(value);
  return 0;
}

function copyRecord(record: SaveRecord): SaveRecord {
  return Object.fromEntries(Object.entries(record).map(([id, entry]) => [id, { ...entry }]));
}

function toEntry(id: number, record: SaveQualityRecord): UnknownRecord {
  return { AssociatedQuality: { Id: id }, Level: record.value, EffectiveLevelModifier: record.modifier, XP: record.xp };
}

/** Rewrites only the fields whose value moved since the entry was read. */
function updateEntry(entry: UnknownRecord, loaded: SaveQualityRecord, next: SaveQualityRecord): UnknownRecord {
  if (equal(loaded, next)) return entry;
  const updated: UnknownRecord = { ...entry };
  if (next.value !== loaded.value) updated.Level = next.value;
  if (next.modifier !== loaded.modifier) updated.EffectiveLevelModifier = next.modifier;
  if (next.xp !== loaded.xp) updated.XP = next.xp;
  return updated;
}

/**
 * Save file in the game's autosave layout. Fields the ledger does not own,
 * at the top level and inside each entry, are written back untouched, and so
 * are entries it cannot read.
 */
export class JsonSaveStore implements SaveStore {
  private document: UnknownRecord = {};
  private loaded: SaveRecord = {};

  constructor(readonly filePath: string) {}

  load(): SaveRecord {
    if (!fs.pathExistsSync(this.filePath)) {
      logger.info('No save file yet, starting empty', { file: this.filePath });
      this.document = {};
      this.loaded = {};
      return {};
    }

    let data: unknown;
    try {
      data = fs.readJSONSync(this.filePath);
    } catch (error) {
      throw new SaveStoreError(error instanceof Error ? error.message : String(error), 'load', { file: this.filePath });
    }
    if (!isRecord(data)) {
      throw new SaveStoreError('save file is not a JSON object', 'load', { file: this.filePath });
    }
    this.document = data;

    const record: SaveRecord = {};
    entriesOf(data).forEach((entry, index) => {
      const id = isRecord(entry) ? entryId(entry) : undefined;
      if (!isRecord(entry) || id === undefined) {
        logger.warn('Keeping save entry without a quality id as is', { file: this.filePath, index });
        return;
      }
      if (id in record) {
        logger.warn('Keeping repeated save entry as is', { file: this.filePath, index, qualityId: id });
        return;
      }
      record[id] = {
        value: numberField(entry, 'Level'),
        modifier: numberField(entry, 'EffectiveLevelModifier'),
        xp: numberField(entry, 'XP'),
      };
    });

    this.loaded = record;
    logger.debug('Save loaded', { file: this.filePath, qualities: Object.keys(record).length });
    return copyRecord(record);
  }

  // Walks the file's entries in order; the first entry of each id is the one the ledger owns.
  private compose(record: SaveRecord): UnknownRecord {
    const owned = new Set<number>();
    const entries: unknown[] = [];

    for (const entry of entriesOf(this.document)) {
      const id = isRecord(entry) ? entryId(entry) : undefined;
      if (!isRecord(entry) || id === undefined || owned.has(id) || !(id in this.loaded)) {
        entries.push(entry);
        continue;
      }
      owned.add(id);
      const next = record[id];
      if (next) entries.push(updateEntry(entry, this.loaded[id], next));
    }

    for (const [key, next] of Object.entries(record)) {
      const id = Number(key);
      if (!owned.has(id)) entries.push(toEntry(id, next));
    }

    return { ...this.document, [ENTRIES]: entries };
  }

  write(record: SaveRecord): boolean {
    const document = this.compose(record);
    if (equal(document, this.document) && fs.pathExistsSync(this.filePath)) {
      logger.debug('Save unchanged, not writing', { file: this.filePath });
      return false;
    }

    const temp = path.join(path.dirname(this.filePath), `.${path.basename(this.filePath)}.${nanoid(8)}.tmp`);
    try {
      fs.outputJSONSync(temp, document, { spaces: 2 });
      fs.moveSync(temp, this.filePath, { overwrite: true });
    } catch (error) {
      fs.removeSync(temp);
      throw new SaveStoreError(error instanceof Error ? error.message : String(error), 'write', { file: this.filePath });
    }

    this.document = document;
    this.loaded = copyRecord(record);
    logger.info('Save written', { file: this.filePath, qualities: Object.keys(record).length });
    return true;
  }
}

const SQLITE_EXTENSIONS = new Set(['.db', '.sqlite', '.sqlite3']);

/** A JSON store, or a sqlite slot when the path looks like a database. */
export function openSaveStore(target: string, slot?: string): SaveStore {
  if (SQLITE_EXTENSIONS.has(path.extname(target).toLowerCase())) {
    return new SqliteSaveStore(new SaveDatabase(target), slot);
  }
  return new JsonSaveStore(target);
}
