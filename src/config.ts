import 'dotenv/config';
import { logger } from './utils/logger.js';

function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const parsed = Number(raw);
  if (!Number.isInteger(parsed)) {
    logger.warn(`Ignoring non-integer ${name}`, { value: raw, fallback });
    return fallback;
  }
  return parsed;
}

function flagFromEnv(name: string): boolean {
  const raw = (process.env[name] || '').trim().toLowerCase();
  return raw === '1' || raw === 'true' || raw === 'yes';
}

const seed = process.env.RNG_SEED ? intFromEnv('RNG_SEED', 0) : undefined;

export const CFG = Object.freeze({
  dataDir: process.env.RULESET_DIR || './data',
  savePath: process.env.SAVE_PATH || './data/autosave.json',
  saveSlot: process.env.SAVE_SLOT || 'autosave',
  integrityChecks: flagFromEnv('INTEGRITY_CHECKS'),
  luckCategory: intFromEnv('LUCK_CATEGORY', 16000),
  rngSeed: seed,
});

export type AppConfig = typeof CFG;
