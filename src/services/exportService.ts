import type { ScheduleEntry } from '../types';
import type { ProposalSnapshot } from '../utils/proposalSnapshot';
import { toCSV } from '../utils/export';
import { safeFileSegment } from '../utils/formatting';
import { isRecord } from '../utils/guards';
import type { JsonRecord } from '../utils/guards';

export interface ProposalDocument {
  identification: {
    project: string;
    client: string;
    region: string;
    typology: string;
    date: string;
  };
  inputs: {
    Sc: number;
    Snr: number;
    Sr: number;
    r: number;
    q: number | null;
    R: number;
    BH: number;
    fp: number;
    surcharge_percent: number;
    computed_BH?: number;
  };
  results: {
    price_excl_surcharge: number;
    price_total: number;
  };
  schedule: Record<string, number>;
  adjustments: {
    K1: number;
    K2: number;
    K3: number;
    K4: number;
    complexity_index: number;
  };
}

export class ProposalFormatError extends Error {
  readonly path: string;

  constructor(message: string, path: string) {
    super(message);
    this.name = 'ProposalFormatError';
    this.path = path;
  }
}

export const SCHEDULE_CSV_HEADERS = ['stage', 'percentage', 'value'];

/** Local calendar date as YYYY-MM-DD. */
export function formatIsoDate(date: Date): string {
  const mm = String(date.getMonth() + 1).padStart(2, '0');
  const dd = String(date.getDate()).padStart(2, '0');
  return `${date.getFullYear()}-${mm}-${dd}`;
}

export function buildProposalDocument(snapshot: ProposalSnapshot, date = new Date()): ProposalDocument {
  const { identification, inputs, fee, schedule, adjustments } = snapshot;
  const doc: ProposalDocument = {
    identification: {
      project: identification.project,
      client: identification.client,
      region: identification.region,
      typology: identification.typology,
      date: formatIsoDate(date),
    },
    inputs: {
      Sc: inputs.areas.totalArea,
      Snr: inputs.areas.nonRepeatedArea,
      Sr: inputs.areas.repeatedArea,
      r: inputs.r,
      q: inputs.q,
      R: fee.ratio,
      BH: inputs.unitRate,
      fp: inputs.percentageFactor,
      surcharge_percent: inputs.surchargePct,
    },
    results: {
      price_excl_surcharge: fee.basePrice,
      price_total: fee.totalPrice,
    },
    schedule: Object.fromEntries(schedule.entries.map(e => [e.stage, e.value])),
    adjustments: {
      K1: adjustments.k1,
      K2: adjustments.k2,
      K3: adjustments.k3,
      K4: adjustments.k4,
      complexity_index: snapshot.complexityIndex,
    },
  };
  if (inputs.computedUnitRate !== null) doc.inputs.computed_BH = inputs.computedUnitRate;
  return doc;
}

export function serializeProposalDocument(doc: ProposalDocument): string {
  return JSON.stringify(doc, null, 2);
}

function recordAt(parent: JsonRecord, key: string, path: string): JsonRecord {
  const value = parent[key];
  if (!isRecord(value)) throw new ProposalFormatError(`Expected an object at "${path}"`, path);
  return value;
}

function numberAt(parent: JsonRecord, key: string, path: string): number {
  const value = parent[key];
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ProposalFormatError(`Expected a number at "${path}"`, path);
  }
  return value;
}

function stringAt(parent: JsonRecord, key: string, path: string): string {
  const value = parent[key];
  if (typeof value !== 'string') throw new ProposalFormatError(`Expected a string at "${path}"`, path);
  return value;
}

export function parseProposalDocument(text: string): ProposalDocument {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    throw new ProposalFormatError(`Proposal is not valid JSON: ${e instanceof Error ? e.message : String(e)}`, '');
  }
  if (!isRecord(raw)) throw new ProposalFormatError('Expected a proposal object', '');

  const ident = recordAt(raw, 'identification', 'identification');
  const inputs = recordAt(raw, 'inputs', 'inputs');
  const results = recordAt(raw, 'results', 'results');
  const schedule = recordAt(raw, 'schedule', 'schedule');
  const adjustments = recordAt(raw, 'adjustments', 'adjustments');

  const q = inputs.q === null ? null : numberAt(inputs, 'q', 'inputs.q');

  const doc: ProposalDocument = {
    identification: {
      project: stringAt(ident, 'project', 'identification.project'),
      client: stringAt(ident, 'client', 'identification.client'),
      region: stringAt(ident, 'region', 'identification.region'),
      typology: stringAt(ident, 'typology', 'identification.typology'),
      date: stringAt(ident, 'date', 'identification.date'),
    },
    inputs: {
      Sc: numberAt(inputs, 'Sc', 'inputs.Sc'),
      Snr: numberAt(inputs, 'Snr', 'inputs.Snr'),
      Sr: numberAt(inputs, 'Sr', 'inputs.Sr'),
      r: numberAt(inputs, 'r', 'inputs.r'),
      q,
      R: numberAt(inputs, 'R', 'inputs.R'),
      BH: numberAt(inputs, 'BH', 'inputs.BH'),
      fp: numberAt(inputs, 'fp', 'inputs.fp'),
      surcharge_percent: numberAt(inputs, 'surcharge_percent', 'inputs.surcharge_percent'),
    },
    results: {
      price_excl_surcharge: numberAt(results, 'price_excl_surcharge', 'results.price_excl_surcharge'),
      price_total: numberAt(results, 'price_total', 'results.price_total'),
    },
    schedule: Object.fromEntries(
      Object.keys(schedule).map(stage => [stage, numberAt(schedule, stage, `schedule.${stage}`)]),
    ),
    adjustments: {
      K1: numberAt(adjustments, 'K1', 'adjustments.K1'),
      K2: numberAt(adjustments, 'K2', 'adjustments.K2'),
      K3: numberAt(adjustments, 'K3', 'adjustments.K3'),
      K4: numberAt(adjustments, 'K4', 'adjustments.K4'),
      complexity_index: numberAt(adjustments, 'complexity_index', 'adjustments.complexity_index'),
    },
  };
  if ('computed_BH' in inputs) doc.inputs.computed_BH = numberAt(inputs, 'computed_BH', 'inputs.computed_BH');
  return doc;
}

export function buildScheduleRows(entries: readonly ScheduleEntry[]): string[][] {
  return [SCHEDULE_CSV_HEADERS, ...entries.map(e => [e.stage, String(e.pct), String(e.value)])];
}

export function serializeScheduleCsv(entries: readonly ScheduleEntry[]): string {
  return toCSV(buildScheduleRows(entries));
}

export function proposalFileName(project: string, kind: 'json' | 'csv' | 'pdf'): string {
  const base = kind === 'csv' ? 'parcelamento' : 'proposta';
  return `${base}_${safeFileSegment(project)}.${kind}`;
}
