import { describe, it, expect } from 'vitest';
import {
  addStartPoint,
  applyLanePolicy,
  assignGroupDevice,
  assignLaneDevice,
  buildSchedule,
  checkCommandFresh,
  computeHandicaps,
  createRaceContext,
  deserializeRaceContext,
  dropStartPoint,
  encodeCommand,
  enterAthlete,
  laneMap,
  markDispatched,
  overrideStartOffset,
  prepareRace,
  putAthlete,
  releaseDevice,
  serializeRaceContext,
  setVolume,
  shiftStartOffsets,
  withdrawAthlete,
} from './race.js';
import type { RaceContext, RaceEntry } from './types.js';
import { RaceSetupError, RaceStageError } from './errors.js';

/** Ann (12.0) and Ben (13.5) entered at a two-lane 100m with devices 01 and 02. */
function makeLanedRace(): RaceContext {
  let ctx = createRaceContext();
  ctx = putAthlete(ctx, { id: 'A1', name: 'Ann', personalBests: { '100m': 12 } });
  ctx = putAthlete(ctx, { id: 'B2', name: 'Ben', personalBests: { '100m': 13.5 } });
  ctx = addStartPoint(ctx, { distance: '100m', laneCount: 2 });
  ctx = assignLaneDevice(ctx, '100m', 1, '01');
  ctx = assignLaneDevice(ctx, '100m', 2, '02');
  ctx = enterAthlete(ctx, 'A1', '100m');
  ctx = enterAthlete(ctx, 'B2', '100m');
  return ctx;
}

const LANED_COMMAND = 'START:01{0,5,9,11};02{2,7,11,13};\n';

describe('createRaceContext', () => {
  it('starts empty in the configuring stage', () => {
    const ctx = createRaceContext();
    expect(ctx.stage).toBe('configuring');
    expect(ctx.revision).toBe(0);
    expect(ctx.entries).toEqual([]);
    expect(ctx.timing).toEqual({ redSeconds: 5, greenSeconds: 9, offSeconds: 11 });
  });

  it('rejects invalid signal timing', () => {
    expect(() => createRaceContext({ timing: { redSeconds: 9, greenSeconds: 5, offSeconds: 11 } }))
      .toThrow(RaceSetupError);
  });
});

describe('enterAthlete', () => {
  it('normalizes the athlete ID', () => {
    const ctx = makeLanedRace();
    expect(ctx.entries.map(e => e.athleteId)).toEqual(['A1', 'B2']);
    expect(ctx.entries[0].lane).toBeNull();
  });

  it('rejects unknown and duplicate athletes', () => {
    const ctx = makeLanedRace();
    expect(() => enterAthlete(ctx, 'zz', '100m')).toThrow('Unknown athlete ZZ');
    expect(() => enterAthlete(ctx, 'a1', '100m')).toThrow('A1 is already entered at 100m');
  });

  it('rejects a lane that is out of range or already taken', () => {
    let ctx = createRaceContext();
    ctx = putAthlete(ctx, { id: 'A1', name: 'Ann' });
    ctx = putAthlete(ctx, { id: 'B2', name: 'Ben' });
    ctx = addStartPoint(ctx, { distance: '100m', laneCount: 2 });
    expect(() => enterAthlete(ctx, 'A1', '100m', 3)).toThrow('Lane 3 is outside 1-2 for 100m');

    ctx = enterAthlete(ctx, 'A1', '100m', 2);
    expect(() => enterAthlete(ctx, 'B2', '100m', 2)).toThrow('Lane 2 at 100m is already taken by A1');
  });

  it('puts scratch entries in the scratch group', () => {
    let ctx = createRaceContext();
    ctx = putAthlete(ctx, { id: 'A1', name: 'Ann' });
    ctx = addStartPoint(ctx, { distance: '800m' });
    expect(() => enterAthlete(ctx, 'A1', '800m', 1)).toThrow('Start point 800m has no lanes');

    ctx = enterAthlete(ctx, 'A1', '800m');
    expect(ctx.entries[0].lane).toEqual({ kind: 'scratch' });
  });
});

describe('stage ordering', () => {
  it('refuses lane assignment before handicaps are computed', () => {
    const ctx = makeLanedRace();
    expect(() => applyLanePolicy(ctx, '100m', 'outside-in')).toThrow(RaceStageError);
    expect(() => applyLanePolicy(ctx, '100m', 'outside-in'))
      .toThrow("Cannot assign lanes in stage 'configuring': compute handicaps first");
  });

  it('refuses to build a schedule before handicaps are computed', () => {
    expect(() => buildSchedule(makeLanedRace())).toThrow(RaceStageError);
  });

  it('moves through every stage to an encoded command', () => {
    let ctx = computeHandicaps(makeLanedRace());
    expect(ctx.stage).toBe('handicaps-computed');
    expect(ctx.entries.map(e => [e.athleteId, e.startOffset])).toEqual([['A1', 1.5], ['B2', 0]]);

    ctx = applyLanePolicy(ctx, '100m', 'outside-in');
    expect(ctx.stage).toBe('lanes-assigned');
    expect(laneMap(ctx, '100m')).toEqual({ 1: 'B2', 2: 'A1' });

    ctx = buildSchedule(ctx);
    expect(ctx.stage).toBe('schedule-built');

    const encoded = encodeCommand(ctx);
    expect(encoded.context.stage).toBe('command-encoded');
    expect(encoded.command?.text).toBe(LANED_COMMAND);
    expect(encoded.command?.revision).toBe(ctx.revision);
  });
});

describe('edits after a schedule is built', () => {
  it('discard derived data and return to configuring', () => {
    const built = buildSchedule(applyLanePolicy(computeHandicaps(makeLanedRace()), '100m', 'outside-in'));
    const edited = setVolume(built, 12);

    expect(edited.stage).toBe('configuring');
    expect(edited.schedule).toBeNull();
    expect(edited.revision).toBe(built.revision + 1);
    expect(edited.entries.every(e => e.startOffset === 0 && e.device === null)).toBe(true);
  });

  it('make encodeCommand report a stale schedule', () => {
    const built = buildSchedule(computeHandicaps(makeLanedRace()));
    const edited = putAthlete(built, { id: 'C3', name: 'Cal' });

    const result = encodeCommand(edited);

    expect(result.command).toBeNull();
    expect(result.diagnostics).toEqual([
      { kind: 'stale-schedule-dispatch', reason: 'race data changed since the last schedule was built' },
    ]);
  });

  it('rebuilding the schedule makes an earlier command stale', () => {
    const { context, command } = prepareRace(makeLanedRace(), { lanePolicies: { '100m': 'outside-in' } });
    if (command === null) throw new Error('Expected a command');

    const rebuilt = buildSchedule(context, { idleDevices: 'omit' });
    expect(rebuilt.revision).toBe(context.revision + 1);
    expect(rebuilt.schedule?.revision).toBe(rebuilt.revision);
    expect(checkCommandFresh(rebuilt, command))
      .toBe(`command was encoded at revision ${command.revision}, race is at revision ${rebuilt.revision}`);

    const reencoded = encodeCommand(rebuilt);
    if (reencoded.command === null) throw new Error('Expected a command');
    expect(checkCommandFresh(reencoded.context, reencoded.command)).toBeNull();
  });

  it('make an earlier command stale', () => {
    const { context, command } = prepareRace(makeLanedRace(), { lanePolicies: { '100m': 'outside-in' } });
    if (command === null) throw new Error('Expected a command');
    expect(checkCommandFresh(context, command)).toBeNull();

    const edited = releaseDevice(context, '02');
    expect(checkCommandFresh(edited, command))
      .toBe(`command was encoded at revision ${command.revision}, race is at revision ${edited.revision}`);

    const marked = markDispatched(edited, command);
    expect(marked.context.stage).toBe('configuring');
    expect(marked.diagnostics.map(d => d.kind)).toEqual(['stale-schedule-dispatch']);
  });

  it('drop entries of a removed start point', () => {
    let ctx = makeLanedRace();
    ctx = addStartPoint(ctx, { distance: '800m' });
    ctx = putAthlete(ctx, { id: 'C3', name: 'Cal' });
    ctx = enterAthlete(ctx, 'C3', '800m');
    ctx = dropStartPoint(ctx, '100m');
    expect(ctx.entries.map(e => e.athleteId)).toEqual(['C3']);
  });

  it('withdraw an athlete', () => {
    const ctx = withdrawAthlete(makeLanedRace(), 'a1');
    expect(ctx.entries.map(e => e.athleteId)).toEqual(['B2']);
    expect(() => withdrawAthlete(ctx, 'A1')).toThrow('A1 is not entered');
  });
});

describe('start offset adjustments', () => {
  it('overrides one offset and keeps the lanes', () => {
    let ctx = applyLanePolicy(computeHandicaps(makeLanedRace()), '100m', 'outside-in');
    ctx = overrideStartOffset(ctx, 'A1', 3.2);

    expect(ctx.stage).toBe('lanes-assigned');
    expect(ctx.entries.find(e => e.athleteId === 'A1')?.startOffset).toBe(3.2);
    expect(encodeCommand(buildSchedule(ctx)).command?.text).toBe('START:01{0,5,9,11};02{3,8,12,14};\n');
  });

  it('shifts every offset of a distance', () => {
    const ctx = shiftStartOffsets(computeHandicaps(makeLanedRace()), 0.5, '100m');
    expect(ctx.entries.map(e => e.startOffset)).toEqual([2, 0.5]);
  });

  it('rejects a shift that would make an offset negative', () => {
    const ctx = computeHandicaps(makeLanedRace());
    expect(() => shiftStartOffsets(ctx, -1))
      .toThrow('Shifting by -1s would give B2 a negative start offset');
  });

  it('requires computed handicaps', () => {
    expect(() => overrideStartOffset(makeLanedRace(), 'A1', 1)).toThrow(RaceStageError);
  });
});

describe('prepareRace', () => {
  it('produces byte-identical commands for the same input', () => {
    const ctx = makeLanedRace();
    const options = { lanePolicies: { '100m': 'outside-in' as const } };

    const first = prepareRace(ctx, options);
    const second = prepareRace(ctx, options);

    expect(first.command?.text).toBe(LANED_COMMAND);
    expect(second.command?.text).toBe(first.command?.text);
  });

  it('collects diagnostics of every stage', () => {
    let ctx = makeLanedRace();
    ctx = putAthlete(ctx, { id: 'C3', name: 'Cal' });
    ctx = enterAthlete(ctx, 'C3', '100m');
    ctx = setVolume(ctx, 45);

    const result = prepareRace(ctx, { lanePolicies: { '100m': 'outside-in' } });

    expect(result.diagnostics.map(d => d.kind)).toEqual([
      'missing-personal-best',
      'lane-overflow',
      'unassigned-entry',
      'invalid-volume',
    ]);
    expect(result.command?.text).toBe('START:01{0,5,9,11}@30;02{0,5,9,11}@30;\n');
  });

  it('fires a scratch group at the group\'s earliest offset', () => {
    let ctx = createRaceContext();
    ctx = putAthlete(ctx, { id: 'A1', name: 'Ann', personalBests: { '800m': 130 } });
    ctx = putAthlete(ctx, { id: 'B2', name: 'Ben', personalBests: { '800m': 125 } });
    ctx = addStartPoint(ctx, { distance: '800m' });
    ctx = assignGroupDevice(ctx, '800m', '5');
    ctx = assignGroupDevice(ctx, '800m', '6');
    ctx = enterAthlete(ctx, 'A1', '800m');
    ctx = enterAthlete(ctx, 'B2', '800m');

    const result = prepareRace(ctx);

    expect(result.command?.text).toBe('START:05{0,5,9,11};06{0,5,9,11};\n');
    expect(result.context.entries.map(e => e.device)).toEqual(['05', '05']);
  });
});

describe('serialization', () => {
  it('restores a saved context', () => {
    const { context } = prepareRace(makeLanedRace(), { lanePolicies: { '100m': 'outside-in' } });
    expect(deserializeRaceContext(serializeRaceContext(context))).toEqual(context);
  });

  it('rejects JSON that is not a race context', () => {
    expect(() => deserializeRaceContext('{"stage":"configuring"}')).toThrow(RaceSetupError);
  });

  describe('rejects a context that breaks the topology or entry rules', () => {
    function savedRace(): RaceContext {
      return structuredClone(prepareRace(makeLanedRace(), { lanePolicies: { '100m': 'outside-in' } }).context);
    }

    function restore(context: RaceContext): () => RaceContext {
      return () => deserializeRaceContext(serializeRaceContext(context));
    }

    it('a lane binding outside the lane count', () => {
      const saved = savedRace();
      saved.topology['100m'] = {
        distance: '100m',
        hasLanes: true,
        laneCount: 2,
        laneDevices: { 1: '01', 2: '02', 7: '05' },
      };
      expect(restore(saved)).toThrow('Invalid race context: Lane 7 at 100m is outside 1-2');
    });

    it('a start point filed under another distance', () => {
      const saved = savedRace();
      saved.topology['200'] = { distance: '999', hasLanes: false, groupDevices: ['03'] };
      expect(restore(saved)).toThrow('Invalid race context: Start point 200 is labelled 999');
    });

    it('a device bound in two places', () => {
      const saved = savedRace();
      saved.topology['200m'] = { distance: '200m', hasLanes: false, groupDevices: ['02'] };
      expect(restore(saved)).toThrow('Invalid race context: Device 02 is bound to both 100m lane 2 and the 200m group');
    });

    it('an entry for an athlete missing from the roster', () => {
      const saved = savedRace();
      const { A1: _removed, ...roster } = saved.roster;
      saved.roster = roster;
      expect(restore(saved)).toThrow('Invalid race context: Entry A1 is not on the roster');
    });

    it('an entry at an unknown start point', () => {
      const saved = savedRace();
      saved.entries = saved.entries.map((e): RaceEntry => (e.athleteId === 'B2' ? { ...e, distance: '400m' } : e));
      expect(restore(saved)).toThrow('Invalid race context: Entry B2 names unknown start point 400m');
    });

    it('two entries in one lane', () => {
      const saved = savedRace();
      saved.entries = saved.entries.map((e): RaceEntry => ({ ...e, lane: { kind: 'lane', index: 1 } }));
      expect(restore(saved)).toThrow('Invalid race context: Lane 1 at 100m is taken twice');
    });
  });
});
