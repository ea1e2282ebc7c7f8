import { CFG, type AppConfig } from './config.js';
import { loadRuleset, type Ruleset } from './content/rulesetLoader.js';
import { describeAction } from './engine/render.js';
import { ReferenceResolver } from './engine/references.js';
import { countResolutions, RuleEngine } from './engine/rules.js';
import { mathRandom, SeededRandom } from './engine/random.js';
import { OUTCOME_KINDS } from './models.js';
import { Save } from './persistence/saveState.js';
import { openSaveStore, type SaveStore } from './persistence/saveStore.js';
import { SaveEditor, type QualityChange } from './tools/saveEditor.js';
import { CollectingDiagnosticSink } from './utils/diagnostics.js';
import { formatErrorForUser, LedgerError, trackError, ValidationError } from './utils/errorhandler.js';
import { logger } from './utils/logger.js';

export const USAGE = `Usage: quality-ledger <command> [options]

Commands:
  qualities [filter]                 List rule qualities whose name matches filter
  locations [filter]                 List areas whose name matches filter
  events [filter]                    List events whose name matches filter
  show [filter]                      List qualities held by the save
  event <eventId>                    Describe an event and its actions
  resolve <eventId> <action#>        Resolve an action against the save
  set <quality> <value>              Set (or with --add, change) a save quality
  validate                           Check the rule data for integrity problems

Options:
  -a, --add            Add the value instead of setting it
  -s, --save           Write changes back to the save
  -n, --repeat <n>     Resolve the action n times (default 1)
      --seed <s>       Seed the random source
  -d, --data <dir>     Rule data directory
  -f, --save-file <p>  Save file (.json, or .db/.sqlite for a database slot)
      --slot <name>    Database save slot
  -v, --verbose        Debug logging
  -q, --quiet          Warnings and errors only
  -h, --help           Show this help`;

const VALUE_OPTIONS = ['repeat', 'seed', 'data', 'save-file', 'slot'] as const;
const FLAG_OPTIONS = ['add', 'save', 'verbose', 'quiet', 'help'] as const;

type ValueOption = (typeof VALUE_OPTIONS)[number];
type FlagOption = (typeof FLAG_OPTIONS)[number];

const SHORT: Record<string, ValueOption | FlagOption> = {
  a: 'add',
  s: 'save',
  n: 'repeat',
  d: 'data',
  f: 'save-file',
  v: 'verbose',
  q: 'quiet',
  h: 'help',
};

export interface CommandLine {
  positionals: string[];
  values: Partial<Record<ValueOption, string>>;
  flags: Set<FlagOption>;
}

const isValueOption = (name: string): name is ValueOption => VALUE_OPTIONS.some((option) => option === name);
const isFlagOption = (name: string): name is FlagOption => FLAG_OPTIONS.some((option) => option === name);

/** Negative numbers are positionals, so `set Fuel -5 --add` works. */
export function parseCommandLine(argv: readonly string[]): CommandLine {
  const line: CommandLine = { positionals: [], values: {}, flags: new Set() };

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i];

    if (token === '--') {
      line.positionals.push(...argv.slice(i + 1));
      break;
    }
    if (!token.startsWith('-') || /^-\d+$/.test(token)) {
      line.positionals.push(token);
      continue;
    }

    const [rawName, inline]: [string, string | undefined] = token.startsWith('--') ? splitInline(token.slice(2)) : [token.slice(1), undefined];
    const name = token.startsWith('--') ? rawName : SHORT[rawName];

    if (name !== undefined && isFlagOption(name)) {
      line.flags.add(name);
    } else if (name !== undefined && isValueOption(name)) {
      const value = inline ?? argv[++i];
      if (value === undefined) {
        throw new ValidationError(`option --${name} needs a value`, name);
      }
      line.values[name] = value;
    } else {
      throw new ValidationError(`unknown option ${token}`, 'option', token);
    }
  }
  return line;
}

function splitInline(option: string): [string, string | undefined] {
  const equals = option.indexOf('=');
  return equals < 0 ? [option, undefined] : [option.slice(0, equals), option.slice(equals + 1)];
}

function integer(value: string | undefined, field: string): number {
  const parsed = Number(value);
  if (value === undefined || value.trim() === '' || !Number.isInteger(parsed)) {
    throw new ValidationError(`${field} must be an integer, got '${value ?? ''}'`, field, value);
  }
  return parsed;
}

function signed(amount: number): string {
  return amount >= 0 ? `+${amount}` : String(amount);
}

function formatChange(change: QualityChange): string {
  return `${change.id} ${change.name}: from ${change.from} to ${change.to} (${signed(change.to - change.from)})`;
}

export interface RunOptions {
  config?: Partial<AppConfig>;
  out?: (line: string) => void;
}

class Session {
  private ruleset?: Ruleset;
  private store?: SaveStore;
  private save?: Save;

  constructor(readonly config: AppConfig, readonly line: CommandLine, readonly out: (line: string) => void) {}

  rules(): Ruleset {
    if (!this.ruleset) {
      this.ruleset = loadRuleset(this.line.values.data ?? this.config.dataDir, {
        integrityChecks: this.config.integrityChecks,
        luckCategory: this.config.luckCategory,
      });
    }
    return this.ruleset;
  }

  loadSave(): Save {
    if (!this.save) {
      const target = this.line.values['save-file'] ?? this.config.savePath;
      this.store = openSaveStore(target, this.line.values.slot ?? this.config.saveSlot);
      this.save = new Save(this.rules().qualities, this.store.load());
    }
    return this.save;
  }

  persist() {
    if (!this.save || !this.store) return;
    if (!this.line.flags.has('save')) {
      logger.info('Test run, not saving. Use --save to apply changes');
      return;
    }
    this.store.write(this.save.toRecord());
  }

  close() {
    this.store?.close?.();
  }
}

type Command = (session: Session, args: string[]) => number;

const COMMANDS: Record<string, Command> = {
  qualities(session, [filter]) {
    const qualities = session.rules().qualities.find(filter);
    qualities.sort((a, b) => a.name.toLowerCase().localeCompare(b.name.toLowerCase()));
    for (const quality of qualities) {
      session.out(`${quality.id}\t${quality.name}`);
    }
    return 0;
  },

  locations(session, [filter]) {
    const locations = session.rules().locations.find(filter);
    locations.sort((a, b) => a.name.toLowerCase().localeCompare(b.name.toLowerCase()));
    for (const location of locations) {
      session.out(`${location.id}\t${location.name}`);
    }
    return 0;
  },

  events(session, [filter]) {
    for (const event of session.rules().events.find(filter)) {
      session.out(event.location ? `${event.id}\t${event.name}\t(${event.location.name})` : `${event.id}\t${event.name}`);
    }
    return 0;
  },

  show(session, [filter]) {
    const save = session.loadSave();
    const { qualities } = session.rules();
    for (const entry of new SaveEditor(save).find(filter)) {
      const slot = entry.value > 0 ? qualities.assignedSlot(entry.id) : undefined;
      session.out(slot ? `${entry.toString()}\t(${slot.name})` : entry.toString());
    }
    return 0;
  },

  event(session, [eventId]) {
    const id = integer(eventId, 'eventId');
    const { qualities, events } = session.rules();
    const event = events.get(id);
    if (!event) {
      throw new ValidationError(`no event with id ${id}`, 'eventId', id);
    }

    const resolver = new ReferenceResolver(qualities);
    session.out(`${event.id} - ${event.name}`);
    if (event.location) session.out(`Location: ${event.location.name || `Location(${event.location.id})`}`);
    event.actions.forEach((action, index) => {
      session.out(`${index + 1}. ${describeAction(action, { resolver, referrer: `event ${event.id}` })}`);
    });
    return 0;
  },

  resolve(session, [eventId, position]) {
    const id = integer(eventId, 'eventId');
    const index = integer(position, 'action');
    const action = session.rules().events.action(id, index);
    if (!action) {
      throw new ValidationError(`event ${id} has no action ${index}`, 'action', index);
    }

    const repeats = session.line.values.repeat === undefined ? 1 : integer(session.line.values.repeat, 'repeat');
    const seedText = session.line.values.seed;
    const seed = seedText === undefined ? session.config.rngSeed : integer(seedText, 'seed');
    const engine = new RuleEngine({ random: seed === undefined ? mathRandom : new SeededRandom(seed) });

    const steps = engine.resolve(action, session.loadSave(), repeats);
    if (steps.length === 0) {
      session.out(`${action.name}: locked`);
      return 0;
    }

    session.out(`${action.name}: ${steps.length}/${repeats}`);
    for (const kind of OUTCOME_KINDS) {
      const count = countResolutions(steps, kind);
      if (count > 0) session.out(`\t${kind}: ${count}`);
    }
    session.persist();
    return 0;
  },

  set(session, [query, value]) {
    if (!query) throw new ValidationError('missing quality', 'quality');
    const amount = integer(value, 'value');
    const editor = new SaveEditor(session.loadSave());
    session.out(formatChange(editor.change(query, amount, session.line.flags.has('add'))));
    session.persist();
    return 0;
  },

  validate(session) {
    const sink = new CollectingDiagnosticSink();
    loadRuleset(session.line.values.data ?? session.config.dataDir, {
      integrityChecks: true,
      diagnostics: sink,
      luckCategory: session.config.luckCategory,
    });

    for (const diagnostic of sink.diagnostics) {
      session.out(`${diagnostic.severity.toUpperCase()} ${diagnostic.code} ${diagnostic.path ?? '-'}: ${diagnostic.message}`);
    }
    const errors = sink.diagnostics.filter((diagnostic) => diagnostic.severity === 'error').length;
    session.out(`${sink.diagnostics.length} issue(s), ${errors} error(s)`);
    return errors > 0 ? 1 : 0;
  },
};

/** Runs one command line and returns the process exit code. */
export function run(argv: readonly string[], options: RunOptions = {}): number {
  const out = options.out ?? ((line: string) => console.log(line));
  let session: Session | undefined;

  try {
    const line = parseCommandLine(argv);
    if (line.flags.has('verbose')) logger.setLevel('DEBUG');
    if (line.flags.has('quiet')) logger.setLevel('WARN');

    const [name, ...args] = line.positionals;
    const command = name !== undefined && Object.prototype.hasOwnProperty.call(COMMANDS, name) ? COMMANDS[name] : undefined;
    if (line.flags.has('help') || !command) {
      out(USAGE);
      return line.flags.has('help') ? 0 : 2;
    }

    session = new Session({ ...CFG, ...options.config }, line, out);
    return command(session, args);
  } catch (error) {
    if (error instanceof LedgerError) {
      logger.error(formatErrorForUser(error));
      return 3;
    }
    trackError(error, { argv: argv.join(' ') });
    return 1;
  } finally {
    session?.close();
  }
}
