import { describe, it, expect } from 'vitest';
import {
  buildProposalSnapshot,
  computeProposalSnapshot,
  readPreviousRun,
  recordSnapshot,
  resolveFormDefaults,
  warningsOf,
} from '../proposalSnapshot';
import { createMemoryStorage, createSessionContext } from '../session';
import { APP_CONFIG, SESSION_KEYS } from '../../config';
import type { ProposalForm } from '../../types';

function form(overrides: Partial<ProposalForm> = {}): ProposalForm {
  return { ...resolveFormDefaults(), ...overrides };
}

describe('buildProposalSnapshot', () => {
  it('prices the default project', () => {
    const snapshot = buildProposalSnapshot(form());
    expect(snapshot.inputs.r).toBe(0.6);
    expect(snapshot.inputs.q).toBeNull();
    expect(snapshot.fee.ratio).toBeCloseTo(0.72, 12);
    expect(snapshot.fee.basePrice).toBeCloseTo(77760, 6);
    expect(snapshot.fee.totalPrice).toBeCloseTo(77760, 6);
    expect(snapshot.schedule.totalPct).toBe(100);
    expect(snapshot.complexityIndex).toBe(1);
    expect(snapshot.advisories).toEqual([]);
  });

  it('applies the surcharge only when enabled', () => {
    expect(buildProposalSnapshot(form({ surchargePct: 10 })).fee.totalPrice).toBeCloseTo(77760, 6);
    const snapshot = buildProposalSnapshot(form({ surchargeEnabled: true, surchargePct: 10 }));
    expect(snapshot.fee.totalPrice).toBeCloseTo(85536, 6);
    expect(snapshot.schedule.entries[0].value).toBeCloseTo(8553.6, 6);
  });

  it('estimates r from the repetition count', () => {
    const snapshot = buildProposalSnapshot(form({ repetition: { mode: 'estimated', repetitions: 20 } }));
    expect(snapshot.inputs.r).toBe(0.4);
    expect(snapshot.inputs.q).toBe(20);
    expect(snapshot.fee.ratio).toBeCloseTo((1500 + 3500 * 0.4) / 5000, 12);
  });

  it('interpolates fp against the total area', () => {
    const calibration = { first: { area: 3000, factor: 0.22 }, second: { area: 10000, factor: 0.15 } };
    const snapshot = buildProposalSnapshot(form({ factor: { mode: 'interpolated', calibration } }));
    expect(snapshot.inputs.percentageFactor).toBeCloseTo(0.2, 12);
    expect(snapshot.inputs.calibration).toEqual(calibration);
    expect(snapshot.fee.basePrice).toBeCloseTo(86400, 6);
  });

  it('computes BH from the cost index and typology', () => {
    const snapshot = buildProposalSnapshot(form({ unitRate: { mode: 'computed', costIndex: 2000, typology: 'residential_multi' } }));
    expect(snapshot.inputs.computedUnitRate).toBe(1800);
    expect(snapshot.inputs.unitRate).toBe(1800);
    expect(snapshot.inputs.costIndex).toBe(2000);
    expect(snapshot.inputs.typologyKey).toBe('residential_multi');
  });

  it('falls back to the session BH, then the default, for a blank manual rate', () => {
    const blank = form({ unitRate: { mode: 'manual' } });
    expect(buildProposalSnapshot(blank).inputs.unitRate).toBe(120);

    const session = createSessionContext(createMemoryStorage({ 'feeProposal.lastUnitRate': '1500' }));
    expect(buildProposalSnapshot(blank, session).inputs.unitRate).toBe(1500);
  });

  it('writes the run outputs back to the session', () => {
    const session = createSessionContext();
    buildProposalSnapshot(form(), session);
    expect(session.has(SESSION_KEYS.lastUnitRate)).toBe(false);
    expect(session.getNumber(SESSION_KEYS.lastRatio)).toBeCloseTo(0.72, 12);
    expect(session.getNumber(SESSION_KEYS.lastPriceTotal)).toBeCloseTo(77760, 6);

    buildProposalSnapshot(form({ unitRate: { mode: 'computed', costIndex: 2000, typology: 'residential_multi' } }), session);
    expect(session.getNumber(SESSION_KEYS.lastUnitRate)).toBe(1800);
    expect(resolveFormDefaults(session).unitRate).toEqual({ mode: 'manual', rate: 1800 });
  });

  it('reads the carried-over BH without writing when computing only', () => {
    const session = createSessionContext(createMemoryStorage({ 'feeProposal.lastUnitRate': '1500' }));
    const snapshot = computeProposalSnapshot(form({ unitRate: { mode: 'manual' } }), session);
    expect(snapshot.inputs.unitRate).toBe(1500);
    expect(session.has(SESSION_KEYS.lastPriceTotal)).toBe(false);
  });

  it('reports the previous run once one has been recorded', () => {
    const session = createSessionContext();
    expect(readPreviousRun(session)).toBeNull();
    buildProposalSnapshot(form(), session);
    const previous = readPreviousRun(session);
    expect(previous?.ratio).toBeCloseTo(0.72, 12);
    expect(previous?.priceTotal).toBeCloseTo(77760, 6);
  });

  it('records a snapshot explicitly', () => {
    const session = createSessionContext();
    recordSnapshot(session, buildProposalSnapshot(form({ areas: { totalArea: 0, nonRepeatedArea: 0, repeatedArea: 0 } })));
    expect(session.getNumber(SESSION_KEYS.lastRatio, -1)).toBe(0);
    expect(session.getNumber(SESSION_KEYS.lastPriceTotal, -1)).toBe(0);
  });
});

describe('advisories', () => {
  it('notes a zero total area and the area mismatch it causes', () => {
    const snapshot = buildProposalSnapshot(form({ areas: { totalArea: 0, nonRepeatedArea: 1500, repeatedArea: 3500 } }));
    expect(snapshot.fee.ratio).toBe(0);
    expect(snapshot.fee.totalPrice).toBe(0);
    expect(snapshot.advisories.map(a => [a.code, a.severity])).toEqual([
      ['ZERO_TOTAL_AREA', 'info'],
      ['AREA_MISMATCH', 'info'],
    ]);
    expect(warningsOf(snapshot)).toEqual([]);
  });

  it('compares the sub-areas to the total within the configured tolerance', () => {
    expect(APP_CONFIG.areaSumTolerance).toBe(1e-9);
    const close = buildProposalSnapshot(form({ areas: { totalArea: 5000, nonRepeatedArea: 1500, repeatedArea: 3500 + 1e-10 } }));
    expect(close.advisories).toEqual([]);
    const off = buildProposalSnapshot(form({ areas: { totalArea: 5000, nonRepeatedArea: 1500, repeatedArea: 3500 + 1e-6 } }));
    expect(off.advisories.map(a => a.code)).toEqual(['AREA_MISMATCH']);
  });

  it('warns about negative inputs and still computes', () => {
    const snapshot = buildProposalSnapshot(form({ areas: { totalArea: 5000, nonRepeatedArea: 1500, repeatedArea: -100 } }));
    expect(warningsOf(snapshot)).toEqual([
      { code: 'NEGATIVE_INPUT', severity: 'warning', message: 'Repeated area is negative (-100).' },
    ]);
    expect(snapshot.fee.ratio).toBeCloseTo((1500 - 60) / 5000, 12);
  });

  it('notes a degenerate calibration pair', () => {
    const calibration = { first: { area: 4000, factor: 0.2 }, second: { area: 4000, factor: 0.1 } };
    const snapshot = buildProposalSnapshot(form({ factor: { mode: 'interpolated', calibration } }));
    expect(snapshot.inputs.percentageFactor).toBe(0.2);
    expect(snapshot.advisories.map(a => a.code)).toEqual(['DEGENERATE_CALIBRATION']);
  });

  it('warns about factors outside [0, 1]', () => {
    const snapshot = buildProposalSnapshot(form({
      repetition: { mode: 'manual', coefficient: 1.5 },
      factor: { mode: 'manual', factor: 1.2 },
    }));
    expect(warningsOf(snapshot).map(a => a.message)).toEqual([
      'Repetition coefficient r = 1.5 is outside [0, 1].',
      'Percentage factor fp = 1.2 is outside [0, 1].',
    ]);
  });

  it('checks the surcharge only when it is applied', () => {
    expect(buildProposalSnapshot(form({ surchargePct: 150 })).advisories).toEqual([]);
    const snapshot = buildProposalSnapshot(form({ surchargeEnabled: true, surchargePct: 150 }));
    expect(snapshot.advisories.map(a => a.code)).toEqual(['SURCHARGE_OUT_OF_RANGE']);
  });

  it('lists schedule problems after input problems', () => {
    const schedule = resolveFormDefaults().schedule.map((s, i) => (i === 1 ? { ...s, pct: 10 } : s));
    const snapshot = buildProposalSnapshot(form({
      areas: { totalArea: 5000, nonRepeatedArea: -1, repeatedArea: 3500 },
      schedule,
    }));
    expect(snapshot.advisories.map(a => a.code)).toEqual(['AREA_MISMATCH', 'NEGATIVE_INPUT', 'SCHEDULE_SUM_MISMATCH']);
    expect(snapshot.schedule.entries[1].value).toBeCloseTo(snapshot.fee.totalPrice * 0.1, 6);
  });
});
