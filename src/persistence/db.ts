import fs from 'fs-extra';
import path from 'path';
import Database from 'better-sqlite3';
import equal from 'fast-deep-equal';
import { nanoid } from 'nanoid';
import type { SaveQualityRecord, SaveRecord } from '../models.js';
import { SaveStoreError } from '../utils/errorhandler.js';
import { logger } from '../utils/logger.js';
import type { SaveStore } from './saveStore.js';

export const MEMORY = ':memory:';

const SCHEMA = `
CREATE TABLE IF NOT EXISTS save_slots (
  slot TEXT PRIMARY KEY,
  revision TEXT NOT NULL,
  updated_at INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS save_qualities (
  slot TEXT NOT NULL,
  quality_id INTEGER NOT NULL,
  value INTEGER NOT NULL DEFAULT 0,
  modifier INTEGER NOT NULL DEFAULT 0,
  xp INTEGER NOT NULL DEFAULT 0,
  PRIMARY KEY (slot, quality_id),
  FOREIGN KEY (slot) REFERENCES save_slots(slot) ON DELETE CASCADE
);
`;

interface QualityRow {
  quality_id: number;
  value: number;
  modifier: number;
  xp: number;
}

interface SlotRow {
  slot: string;
  revision: string;
  updated_at: number;
}

function open(dbPath: string): Database.Database {
  try {
    if (dbPath !== MEMORY) {
      fs.ensureDirSync(path.dirname(dbPath));
    }
    const connection = new Database(dbPath);
    if (dbPath !== MEMORY) {
      connection.pragma('journal_mode = WAL');
      connection.pragma('synchronous = NORMAL');
    }
    connection.pragma('foreign_keys = ON');
    connection.exec(SCHEMA);
    return connection;
  } catch (error) {
    throw new SaveStoreError(error instanceof Error ? error.message : String(error), 'open', { file: dbPath });
  }
}

export class SaveDatabase {
  readonly connection: Database.Database;

  constructor(readonly dbPath: string = MEMORY) {
    this.connection = open(dbPath);
    logger.debug('Save database opened', { file: dbPath });
  }

  slots(): SlotRow[] {
    return this.connection.prepare<[], SlotRow>('SELECT slot, revision, updated_at FROM save_slots ORDER BY slot').all();
  }

  close() {
    this.connection.close();
  }
}

/** One named save slot; every write replaces the slot in a single transaction. */
export class SqliteSaveStore implements SaveStore {
  constructor(readonly db: SaveDatabase, readonly slot = 'autosave') {}

  revision(): string | undefined {
    return this.db.connection
      .prepare<[string], Pick<SlotRow, 'revision'>>('SELECT revision FROM save_slots WHERE slot = ?')
      .get(this.slot)?.revision;
  }

  load(): SaveRecord {
    const rows = this.db.connection
      .prepare<[string], QualityRow>(
        'SELECT quality_id, value, modifier, xp FROM save_qualities WHERE slot = ? ORDER BY quality_id'
      )
      .all(this.slot);

    const record: SaveRecord = {};
    for (const row of rows) {
      record[row.quality_id] = { value: row.value, modifier: row.modifier, xp: row.xp };
    }
    return record;
  }

  write(record: SaveRecord): boolean {
    if (this.revision() !== undefined && equal(this.load(), record)) {
      logger.debug('Save slot unchanged, not writing', { slot: this.slot });
      return false;
    }

    const { connection } = this.db;
    const upsertSlot = connection.prepare<[string, string, number]>(
      `INSERT INTO save_slots (slot, revision, updated_at) VALUES (?, ?, ?)
       ON CONFLICT(slot) DO UPDATE SET revision = excluded.revision, updated_at = excluded.updated_at`
    );
    const clear = connection.prepare<[string]>('DELETE FROM save_qualities WHERE slot = ?');
    const insert = connection.prepare<[string, number, number, number, number]>(
      'INSERT INTO save_qualities (slot, quality_id, value, modifier, xp) VALUES (?, ?, ?, ?, ?)'
    );

    const revision = nanoid();
    const replace = connection.transaction((entries: [string, SaveQualityRecord][]) => {
      upsertSlot.run(this.slot, revision, Date.now());
      clear.run(this.slot);
      for (const [id, entry] of entries) {
        insert.run(this.slot, Number(id), entry.value, entry.modifier, entry.xp);
      }
    });

    try {
      replace(Object.entries(record));
    } catch (error) {
      throw new SaveStoreError(error instanceof Error ? error.message : String(error), 'write', { slot: this.slot });
    }

    logger.info('Save slot written', { slot: this.slot, revision, qualities: Object.keys(record).length });
    return true;
  }

  close() {
    this.db.close();
  }
}
