import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { buildRuleset, loadRuleset, parseOperatorData, parseStatusText } from '../content/rulesetLoader.js';
import { CollectingDiagnosticSink } from '../utils/diagnostics.js';
import { RulesetLoadError } from '../utils/errorhandler.js';

const QUALITIES = [
  { Id: 42, Name: 'Iron', Cap: 10, Category: 1, LevelDescriptionText: '0|None~5|Some' },
  { Id: 16, Name: 'Luck', Category: 16000, DifficultyScaler: 10 },
  { Id: 99, Name: 'Lore', UsePyramidNumbers: true, PyramidNumberIncreaseLimit: 4, AssignToSlot: { Id: 42 } },
];

const AREAS = [
  { Id: 5, Name: 'Docks', Description: 'Tar and rope.', MoveMessage: 'You tie up at the quay.' },
  { Id: 6, Name: 'Archive' },
];

const EVENTS = [
  {
    Id: 1,
    Name: 'Harbour',
    QualitiesRequired: [],
    QualitiesAffected: [],
    LimitedToArea: { Id: 5 },
    ChildBranches: [
      {
        Id: 10,
        Name: 'Work',
        ParentEvent: { Id: 1 },
        QualitiesRequired: [{ Id: 100, AssociatedQuality: { Id: 42 }, MinLevel: 2, VisibleWhenRequirementFailed: true }],
        DefaultEvent: {
          Id: 11,
          Name: 'Worked',
          QualitiesAffected: [{ Id: 101, AssociatedQuality: { Id: 42 }, Level: 1 }],
          LinkToEvent: { Id: 2 },
        },
        RareDefaultEvent: { Id: 12, Name: 'Lucky', QualitiesAffected: [] },
        RareDefaultEventChance: 10,
      },
      {
        Id: 20,
        Name: 'Idle',
        ParentEvent: { Id: 1 },
        QualitiesRequired: [{ Id: 102, AssociatedQuality: { Id: 555, Name: 'Ghost' }, MaxLevel: 3 }],
      },
    ],
  },
];

let dataDir: string;

beforeEach(() => {
  dataDir = fs.mkdtempSync(path.join(os.tmpdir(), 'ruleset-'));
});

afterEach(() => {
  fs.removeSync(dataDir);
});

function writeEntities(qualities: unknown, events: unknown, areas: unknown = AREAS) {
  fs.outputJSONSync(path.join(dataDir, 'entities', 'qualities_import.json'), qualities);
  fs.outputJSONSync(path.join(dataDir, 'entities', 'areas_import.json'), areas);
  fs.outputJSONSync(path.join(dataDir, 'entities', 'events_import.json'), events);
}

describe('loadRuleset', () => {
  it('maps qualities', () => {
    writeEntities(QUALITIES, EVENTS);
    const { qualities } = loadRuleset(dataDir, { diagnostics: new CollectingDiagnosticSink() });

    expect(qualities.size).toBe(3);
    expect(qualities.get(42)?.cap).toBe(10);
    expect(qualities.status(42, 6)).toBe('Some');
    expect(qualities.get(16)?.isLuck).toBe(true);
    expect(qualities.get(16)?.difficultyScaler).toBe(10);
    expect(qualities.get(99)?.usesPyramidNumbers).toBe(true);
    expect(qualities.get(99)?.pyramidLimit).toBe(4);
    expect(qualities.assignedSlot(99)?.name).toBe('Iron');
  });

  it('maps events, actions and outcomes', () => {
    writeEntities(QUALITIES, EVENTS);
    const { events } = loadRuleset(dataDir, { diagnostics: new CollectingDiagnosticSink() });

    const harbour = events.get(1);
    expect(harbour?.actions.map((action) => action.name)).toEqual(['Work', 'Idle']);

    const work = events.action(1, 1);
    expect(work?.requirements[0].tokens).toEqual([{ kind: 'MIN', advanced: false, value: 2 }]);
    expect(work?.outcomes.Default.name).toBe('Worked');
    expect(work?.outcomes.Default.triggerEventId).toBe(2);
    expect(work?.outcomes.Default.effects[0].tokens).toEqual([{ kind: 'LEVEL', amount: 1 }]);
    expect(work?.outcomes.RareDefault?.chance).toBe(10);
    expect(events.action(1, 3)).toBeUndefined();
  });

  it('loads areas and places events through them', () => {
    writeEntities(QUALITIES, EVENTS);
    const { locations, events } = loadRuleset(dataDir, { diagnostics: new CollectingDiagnosticSink() });

    expect(locations.size).toBe(2);
    expect(locations.get(5)).toEqual({
      id: 5,
      name: 'Docks',
      description: 'Tar and rope.',
      message: 'You tie up at the quay.',
    });
    expect(locations.find('arch').map((location) => location.id)).toEqual([6]);
    expect(events.get(1)?.location).toBe(locations.get(5));
    expect(events.at(5).map((event) => event.id)).toEqual([1]);
    expect(events.at('docks').map((event) => event.id)).toEqual([1]);
    expect(events.at('archive')).toEqual([]);
  });

  it('stands in for unknown areas', () => {
    writeEntities(QUALITIES, [{ ...EVENTS[0], ChildBranches: [], LimitedToArea: { Id: 9, Name: 'Fog Bank' } }]);
    const diagnostics = new CollectingDiagnosticSink();
    const { events } = loadRuleset(dataDir, { diagnostics });

    expect(events.get(1)?.location).toEqual({ id: 9, name: 'Fog Bank', description: '', message: '', placeholder: true });
    expect(events.at('fog').map((event) => event.id)).toEqual([1]);
    expect(diagnostics.diagnostics).toEqual([
      {
        severity: 'warning',
        code: 'UNKNOWN_LOCATION',
        message: 'Could not find Location 9 for events.1.LimitedToArea',
        path: 'events.1.LimitedToArea',
        context: { locationId: 9 },
      },
    ]);
  });

  it('fills in a missing Default branch and placeholder qualities', () => {
    writeEntities(QUALITIES, EVENTS);
    const diagnostics = new CollectingDiagnosticSink();
    const { events } = loadRuleset(dataDir, { diagnostics });

    const idle = events.action(1, 2);
    expect(idle?.outcomes.Default.effects).toEqual([]);
    expect(idle?.requirements[0].quality.placeholder).toBe(true);
    expect(idle?.requirements[0].quality.name).toBe('Ghost');
    expect(diagnostics.codes()).toEqual(['UNKNOWN_QUALITY']);
  });

  it('reports integrity problems only when asked', () => {
    writeEntities(QUALITIES, EVENTS);
    const diagnostics = new CollectingDiagnosticSink();
    loadRuleset(dataDir, { integrityChecks: true, diagnostics });

    expect(diagnostics.codes()).toEqual(['MISSING_DEFAULT_OUTCOME', 'UNKNOWN_QUALITY']);
    expect(diagnostics.diagnostics[0].path).toBe('events.1.ChildBranches[1]');
  });

  it('returns empty collections for missing files', () => {
    const ruleset = loadRuleset(dataDir);
    expect(ruleset.qualities.size).toBe(0);
    expect(ruleset.locations.size).toBe(0);
    expect(ruleset.events.size).toBe(0);
  });

  it('raises on malformed files', () => {
    fs.outputFileSync(path.join(dataDir, 'entities', 'qualities_import.json'), '{ not json');
    expect(() => loadRuleset(dataDir)).toThrow(RulesetLoadError);

    fs.outputJSONSync(path.join(dataDir, 'entities', 'qualities_import.json'), { Id: 1 });
    expect(() => loadRuleset(dataDir)).toThrow('expected a JSON array of qualities');
  });
});

describe('buildRuleset', () => {
  it('reports unknown and missing fields under integrity checks', () => {
    const diagnostics = new CollectingDiagnosticSink();
    buildRuleset(
      {
        qualities: [{ Id: 1, Name: 'Odd', Shiny: true }, { Name: 'No id' }],
        areas: [{ Id: 3, Name: 'Reef', Depth: 4 }, { Id: 3, Name: 'Reef again' }],
      },
      { integrityChecks: true, diagnostics }
    );

    expect(diagnostics.diagnostics.map((d) => d.message)).toEqual([
      'qualities[1] has no numeric Id and was skipped',
      "Location 3 is defined more than once; keeping 'Reef'",
      'qualities.1 contains unknown fields: Shiny',
      'areas.3 contains unknown fields: Depth',
    ]);
  });

  it('flags mismatched parents and conflicting effects', () => {
    const diagnostics = new CollectingDiagnosticSink();
    const forge = {
      Id: 1,
      Name: 'Forge',
      QualitiesRequired: [],
      ChildBranches: [
        {
          Id: 10,
          ParentEvent: { Id: 2 },
          QualitiesRequired: [],
          DefaultEvent: {
            Id: 11,
            QualitiesAffected: [{ Id: 100, AssociatedQuality: { Id: 42 }, Level: 1, SetToExactly: 3 }],
          },
        },
      ],
    };
    buildRuleset({ qualities: [{ Id: 42, Name: 'Iron' }], events: [forge] }, { integrityChecks: true, diagnostics });

    expect(diagnostics.codes()).toEqual(['PARENT_MISMATCH', 'EXCLUSIVE_EFFECT_OPERATORS']);
  });

  it('derives luck from the configured category', () => {
    const { qualities } = buildRuleset({ qualities: [{ Id: 42, Name: 'Iron', Category: 1 }] }, { luckCategory: 1 });
    expect(qualities.get(42)?.isLuck).toBe(true);
  });
});

describe('raw field parsing', () => {
  it('parses status text', () => {
    expect(parseStatusText('0|None~5|Some~x|bad')).toEqual(
      new Map([
        [0, 'None'],
        [5, 'Some'],
      ])
    );
    expect(parseStatusText('').size).toBe(0);
  });

  it('keeps operators and drops display hints', () => {
    expect(
      parseOperatorData({ Id: 5, AssociatedQuality: { Id: 42 }, Level: 2, VisibleWhenRequirementFailed: true, Flag: false })
    ).toEqual({ id: 5, qualityId: 42, operators: { Level: 2, Flag: 'false' } });
    expect(parseOperatorData({ Id: 5, Level: 2 })).toBeUndefined();
  });
});
