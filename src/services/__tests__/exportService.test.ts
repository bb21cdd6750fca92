import { describe, it, expect } from 'vitest';
import {
  ProposalFormatError,
  buildProposalDocument,
  buildScheduleRows,
  formatIsoDate,
  parseProposalDocument,
  proposalFileName,
  serializeProposalDocument,
  serializeScheduleCsv,
} from '../exportService';
import { apportionSchedule, schedulePresetShares } from '../scheduleService';
import { buildProposalSnapshot, resolveFormDefaults } from '../../utils/proposalSnapshot';
import type { ProposalForm } from '../../types';

const DATE = new Date(2024, 2, 5);

function sampleForm(overrides: Partial<ProposalForm> = {}): ProposalForm {
  return { ...resolveFormDefaults(), ...overrides };
}

describe('formatIsoDate', () => {
  it('pads month and day', () => {
    expect(formatIsoDate(DATE)).toBe('2024-03-05');
    expect(formatIsoDate(new Date(2023, 11, 31))).toBe('2023-12-31');
  });
});

describe('buildProposalDocument', () => {
  it('carries identification, inputs, results and the schedule', () => {
    const doc = buildProposalDocument(buildProposalSnapshot(sampleForm()), DATE);
    expect(doc.identification).toEqual({
      project: 'Edifício Residencial Exemplo',
      client: 'Cliente Exemplo',
      region: 'MG',
      typology: 'Residencial multifamiliar',
      date: '2024-03-05',
    });
    expect(doc.inputs.Sc).toBe(5000);
    expect(doc.inputs.Snr).toBe(1500);
    expect(doc.inputs.Sr).toBe(3500);
    expect(doc.inputs.r).toBe(0.6);
    expect(doc.inputs.q).toBeNull();
    expect(doc.inputs.R).toBeCloseTo(0.72, 12);
    expect(doc.inputs.BH).toBe(120);
    expect(doc.inputs.fp).toBe(0.18);
    expect(doc.inputs.surcharge_percent).toBe(0);
    expect(doc.results.price_excl_surcharge).toBeCloseTo(77760, 6);
    expect(doc.results.price_total).toBeCloseTo(77760, 6);
    expect(Object.keys(doc.schedule)).toEqual([
      'Assinatura',
      'Estudo Preliminar',
      'Anteprojeto',
      'Projeto Básico',
      'Projeto para Execução',
      'As Built / Encerramento',
    ]);
    expect(doc.schedule.Anteprojeto).toBeCloseTo(19440, 6);
    expect(doc.adjustments.complexity_index).toBe(1);
  });

  it('omits computed_BH for a manual rate and includes it otherwise', () => {
    const manual = buildProposalDocument(buildProposalSnapshot(sampleForm()), DATE);
    expect('computed_BH' in manual.inputs).toBe(false);

    const computed = buildProposalDocument(
      buildProposalSnapshot(sampleForm({ unitRate: { mode: 'computed', costIndex: 2000, typology: 'residential_multi' } })),
      DATE,
    );
    expect(computed.inputs.computed_BH).toBe(1800);
    expect(computed.inputs.BH).toBe(1800);
  });

  it('records q when r was estimated', () => {
    const doc = buildProposalDocument(
      buildProposalSnapshot(sampleForm({ repetition: { mode: 'estimated', repetitions: 8 } })),
      DATE,
    );
    expect(doc.inputs.q).toBe(8);
    expect(doc.inputs.r).toBe(0.6);
  });

  it('reports the effective surcharge', () => {
    const off = buildProposalDocument(buildProposalSnapshot(sampleForm({ surchargePct: 10 })), DATE);
    expect(off.inputs.surcharge_percent).toBe(0);
    const on = buildProposalDocument(buildProposalSnapshot(sampleForm({ surchargeEnabled: true, surchargePct: 10 })), DATE);
    expect(on.inputs.surcharge_percent).toBe(10);
    expect(on.results.price_total).toBeCloseTo(85536, 6);
  });
});

describe('JSON serialization', () => {
  it('round-trips, keeping non-ASCII text verbatim', () => {
    const form = sampleForm({
      identification: { project: 'Edifício Ação', client: 'José Conceição', region: 'SP', typology: 'Saúde' },
      unitRate: { mode: 'computed', costIndex: 2000, typology: 'healthcare' },
    });
    const doc = buildProposalDocument(buildProposalSnapshot(form), DATE);
    const text = serializeProposalDocument(doc);
    expect(text).toContain('"project": "Edifício Ação"');
    expect(parseProposalDocument(text)).toEqual(doc);
  });

  it('keeps q as null through a round trip', () => {
    const doc = buildProposalDocument(buildProposalSnapshot(sampleForm()), DATE);
    const parsed = parseProposalDocument(serializeProposalDocument(doc));
    expect(parsed.inputs.q).toBeNull();
    expect('computed_BH' in parsed.inputs).toBe(false);
  });

  it('rejects text that is not JSON', () => {
    expect(() => parseProposalDocument('not json')).toThrow(ProposalFormatError);
    try {
      parseProposalDocument('not json');
    } catch (e) {
      expect(e).toBeInstanceOf(ProposalFormatError);
      if (e instanceof ProposalFormatError) expect(e.path).toBe('');
    }
  });

  it('names the offending field', () => {
    const text = serializeProposalDocument(buildProposalDocument(buildProposalSnapshot(sampleForm()), DATE));
    const broken = text.replace('"Sc": 5000', '"Sc": "5000"');
    expect(() => parseProposalDocument(broken)).toThrow('Expected a number at "inputs.Sc"');
    expect(() => parseProposalDocument('{"identification": {}}')).toThrow('Expected an object at "inputs"');
    expect(() => parseProposalDocument('[]')).toThrow('Expected a proposal object');
  });
});

describe('schedule CSV', () => {
  it('writes a header and one row per stage', () => {
    const { entries } = apportionSchedule(1000, schedulePresetShares('standard'));
    expect(serializeScheduleCsv(entries).split('\n')).toEqual([
      'stage,percentage,value',
      'Assinatura,10,100',
      'Estudo Preliminar,20,200',
      'Anteprojeto,25,250',
      'Projeto Básico,10,100',
      'Projeto para Execução,30,300',
      'As Built / Encerramento,5,50',
    ]);
  });

  it('quotes stage names that contain commas or quotes', () => {
    const rows = buildScheduleRows([
      { stage: 'Design, phase 1', pct: 50, value: 10 },
      { stage: 'The "final" stage', pct: 50, value: 10 },
    ]);
    expect(rows[0]).toEqual(['stage', 'percentage', 'value']);
    expect(serializeScheduleCsv([
      { stage: 'Design, phase 1', pct: 50, value: 10 },
      { stage: 'The "final" stage', pct: 50, value: 10 },
    ])).toBe('stage,percentage,value\n"Design, phase 1",50,10\n"The ""final"" stage",50,10');
  });
});

describe('proposalFileName', () => {
  it('replaces spaces in the project name', () => {
    expect(proposalFileName('Edifício Residencial Exemplo', 'csv')).toBe('parcelamento_Edifício_Residencial_Exemplo.csv');
    expect(proposalFileName('Casa Nova', 'json')).toBe('proposta_Casa_Nova.json');
    expect(proposalFileName('Casa Nova', 'pdf')).toBe('proposta_Casa_Nova.pdf');
  });
});
