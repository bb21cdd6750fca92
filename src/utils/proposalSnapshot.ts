import type {
  AdjustmentFactors,
  Advisory,
  AreaInputs,
  CalibrationPair,
  FactorMode,
  FeeResult,
  ProjectIdentification,
  ProposalForm,
  RepetitionMode,
  ScheduleResult,
  TypologyKey,
  UnitRateMode,
} from '../types';
import { DEFAULT_INPUTS } from '../constants';
import { APP_CONFIG, SESSION_KEYS } from '../config';
import {
  aggregateComplexityIndex,
  complexityLevelsFromSelections,
  computeAdjustmentFactors,
  computeAreaRatio,
  computeFee,
  interpolatePercentageFactor,
  resolveRepetitionCoefficient,
  unitRateForTypology,
} from '../services/feeService';
import { apportionSchedule, schedulePresetShares } from '../services/scheduleService';
import type { SessionContext } from './session';

export interface ResolvedInputs {
  areas: AreaInputs;
  repetitionMode: RepetitionMode;
  r: number;
  q: number | null;
  ratio: number;
  unitRateMode: UnitRateMode;
  unitRate: number;
  computedUnitRate: number | null;
  costIndex: number | null;
  typologyKey: TypologyKey | null;
  factorMode: FactorMode;
  percentageFactor: number;
  calibration: CalibrationPair | null;
  surchargePct: number;
}

export interface ProposalSnapshot {
  identification: ProjectIdentification;
  inputs: ResolvedInputs;
  fee: FeeResult;
  schedule: ScheduleResult;
  adjustments: AdjustmentFactors;
  complexityIndex: number;
  advisories: Advisory[];
}

function collectInputAdvisories(form: ProposalForm, inputs: ResolvedInputs): Advisory[] {
  const out: Advisory[] = [];
  const { totalArea, nonRepeatedArea, repeatedArea } = inputs.areas;

  if (totalArea === 0) {
    out.push({ code: 'ZERO_TOTAL_AREA', severity: 'info', message: 'Total area is zero; the area ratio R falls back to 0.' });
  }
  if (Math.abs(nonRepeatedArea + repeatedArea - totalArea) > APP_CONFIG.areaSumTolerance) {
    out.push({
      code: 'AREA_MISMATCH',
      severity: 'info',
      message: `Non-repeated + repeated area (${nonRepeatedArea + repeatedArea}) differs from total area (${totalArea}).`,
    });
  }
  if (form.factor.mode === 'interpolated' && form.factor.calibration.first.area === form.factor.calibration.second.area) {
    out.push({
      code: 'DEGENERATE_CALIBRATION',
      severity: 'info',
      message: 'Both calibration points share the same area; fp falls back to the first point.',
    });
  }

  const nonNegative: Array<[string, number | null]> = [
    ['Total area', totalArea],
    ['Non-repeated area', nonRepeatedArea],
    ['Repeated area', repeatedArea],
    ['Cost index', inputs.costIndex],
    ['Unit rate (BH)', inputs.unitRate],
  ];
  nonNegative.forEach(([label, value]) => {
    if (value !== null && value < 0) {
      out.push({ code: 'NEGATIVE_INPUT', severity: 'warning', message: `${label} is negative (${value}).` });
    }
  });

  if (inputs.r < 0 || inputs.r > 1) {
    out.push({ code: 'FACTOR_OUT_OF_RANGE', severity: 'warning', message: `Repetition coefficient r = ${inputs.r} is outside [0, 1].` });
  }
  if (inputs.percentageFactor < 0 || inputs.percentageFactor > 1) {
    out.push({
      code: 'FACTOR_OUT_OF_RANGE',
      severity: 'warning',
      message: `Percentage factor fp = ${inputs.percentageFactor} is outside [0, 1].`,
    });
  }
  if (inputs.surchargePct < 0 || inputs.surchargePct > 100) {
    out.push({
      code: 'SURCHARGE_OUT_OF_RANGE',
      severity: 'warning',
      message: `Surcharge of ${inputs.surchargePct}% is outside [0, 100].`,
    });
  }
  return out;
}

function resolveInputs(form: ProposalForm, session?: SessionContext): ResolvedInputs {
  const r = resolveRepetitionCoefficient(form.repetition);
  const ratio = computeAreaRatio(form.areas, r);

  let unitRate: number;
  let computedUnitRate: number | null = null;
  let costIndex: number | null = null;
  let typologyKey: TypologyKey | null = null;
  if (form.unitRate.mode === 'computed') {
    costIndex = form.unitRate.costIndex;
    typologyKey = form.unitRate.typology;
    computedUnitRate = unitRateForTypology(costIndex, typologyKey);
    unitRate = computedUnitRate;
  } else {
    unitRate = form.unitRate.rate ?? session?.getNumber(SESSION_KEYS.lastUnitRate, DEFAULT_INPUTS.unitRate) ?? DEFAULT_INPUTS.unitRate;
  }

  const percentageFactor = form.factor.mode === 'manual'
    ? form.factor.factor
    : interpolatePercentageFactor(form.factor.calibration, form.areas.totalArea);

  return {
    areas: { ...form.areas },
    repetitionMode: form.repetition.mode,
    r,
    q: form.repetition.mode === 'estimated' ? form.repetition.repetitions : null,
    ratio,
    unitRateMode: form.unitRate.mode,
    unitRate,
    computedUnitRate,
    costIndex,
    typologyKey,
    factorMode: form.factor.mode,
    percentageFactor,
    calibration: form.factor.mode === 'interpolated' ? form.factor.calibration : null,
    surchargePct: form.surchargeEnabled ? form.surchargePct : 0,
  };
}

/**
 * Runs the full pipeline for one form state: resolves r, R, BH and fp, prices
 * the fee, apportions the schedule and gathers every advisory. A session, when
 * given, only supplies the carried-over BH for a blank manual rate.
 */
export function computeProposalSnapshot(form: ProposalForm, session?: SessionContext): ProposalSnapshot {
  const inputs = resolveInputs(form, session);
  const fee = computeFee(inputs.areas.totalArea, inputs.ratio, {
    unitRate: inputs.unitRate,
    percentageFactor: inputs.percentageFactor,
    surchargePct: inputs.surchargePct,
  });
  const schedule = apportionSchedule(fee.totalPrice, form.schedule);
  return {
    identification: { ...form.identification },
    inputs,
    fee,
    schedule,
    adjustments: computeAdjustmentFactors(form.adjustments),
    complexityIndex: aggregateComplexityIndex(complexityLevelsFromSelections(form.complexity)),
    advisories: [...collectInputAdvisories(form, inputs), ...schedule.advisories],
  };
}

/** Like computeProposalSnapshot, then writes the run's outputs back to the session. */
export function buildProposalSnapshot(form: ProposalForm, session?: SessionContext): ProposalSnapshot {
  const snapshot = computeProposalSnapshot(form, session);
  if (session) recordSnapshot(session, snapshot);
  return snapshot;
}

export function recordSnapshot(session: SessionContext, snapshot: ProposalSnapshot) {
  if (snapshot.inputs.computedUnitRate !== null) {
    session.set(SESSION_KEYS.lastUnitRate, snapshot.inputs.computedUnitRate);
  }
  session.set(SESSION_KEYS.lastRatio, snapshot.fee.ratio);
  session.set(SESSION_KEYS.lastPriceTotal, snapshot.fee.totalPrice);
}

export function resolveFormDefaults(session?: SessionContext): ProposalForm {
  const d = DEFAULT_INPUTS;
  return {
    identification: { project: d.project, client: d.client, region: d.region, typology: d.typology },
    areas: { totalArea: d.totalArea, nonRepeatedArea: d.nonRepeatedArea, repeatedArea: d.repeatedArea },
    repetition: { mode: 'manual', coefficient: d.repetitionCoefficient },
    factor: { mode: 'manual', factor: d.percentageFactor },
    unitRate: { mode: 'manual', rate: session?.getNumber(SESSION_KEYS.lastUnitRate, d.unitRate) ?? d.unitRate },
    surchargeEnabled: false,
    surchargePct: d.surchargePct,
    schedule: schedulePresetShares(d.schedulePreset),
  };
}

export interface PreviousRun {
  ratio: number;
  priceTotal: number;
}

/** Outputs a run earlier in this session left behind, or null on a fresh session. */
export function readPreviousRun(session: SessionContext): PreviousRun | null {
  if (!session.has(SESSION_KEYS.lastPriceTotal)) return null;
  return {
    ratio: session.getNumber(SESSION_KEYS.lastRatio),
    priceTotal: session.getNumber(SESSION_KEYS.lastPriceTotal),
  };
}

export function warningsOf(snapshot: ProposalSnapshot): Advisory[] {
  return snapshot.advisories.filter(a => a.severity === 'warning');
}
