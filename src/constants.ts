import type {
  AdjustmentComponents,
  AdjustmentKey,
  ComplexityIndicatorDef,
  ComplexityLevel,
  RepetitionBand,
  SchedulePreset,
  SchedulePresetKey,
  TypologyDef,
} from './types';

type RgbTuple = readonly [number, number, number];

// Report palette, as pdf-lib rgb() components.
export const BRAND_COLORS: Record<'charcoal' | 'gold' | 'accent' | 'light' | 'alert', RgbTuple> = {
  charcoal: [0.07, 0.07, 0.08],
  gold: [0.96, 0.76, 0.27],
  accent: [0.83, 0.72, 0.45],
  light: [1, 1, 1],
  alert: [0.98, 0.45, 0.4],
};

export const REGIONS = [
  'AC', 'AL', 'AP', 'AM', 'BA', 'CE', 'DF', 'ES', 'GO', 'MA', 'MT', 'MS', 'MG', 'PA',
  'PB', 'PR', 'PE', 'PI', 'RJ', 'RN', 'RS', 'RO', 'RR', 'SC', 'SP', 'SE', 'TO',
] as const;

// Repetition reducer r by number of repeats q. Heuristic only; manual r always wins.
export const REPETITION_BANDS: readonly RepetitionBand[] = [
  { upTo: 1, coefficient: 1.0 },
  { upTo: 4, coefficient: 0.7 },
  { upTo: 8, coefficient: 0.6 },
  { upTo: 16, coefficient: 0.5 },
  { upTo: 32, coefficient: 0.4 },
  { upTo: Infinity, coefficient: 0.35 },
];

// Adequacy multipliers applied to the cost index to get BH.
export const TYPOLOGIES: readonly TypologyDef[] = [
  { key: 'residential_single', label: 'Single-family residential', multiplier: 1.0 },
  { key: 'residential_multi', label: 'Multi-family residential', multiplier: 0.9 },
  { key: 'commercial', label: 'Commercial / retail', multiplier: 1.1 },
  { key: 'corporate', label: 'Corporate offices', multiplier: 1.05 },
  { key: 'educational', label: 'Educational', multiplier: 1.15 },
  { key: 'healthcare', label: 'Healthcare', multiplier: 1.4 },
  { key: 'hospitality', label: 'Hotels & hospitality', multiplier: 1.25 },
  { key: 'industrial', label: 'Industrial / logistics', multiplier: 0.85 },
  { key: 'interiors', label: 'Interior design', multiplier: 1.3 },
  { key: 'landscape', label: 'Landscape', multiplier: 0.75 },
];

export const SCHEDULE_PRESETS: Record<SchedulePresetKey, SchedulePreset> = {
  standard: {
    key: 'standard',
    label: 'Standard (generic)',
    stages: [
      { stage: 'Assinatura', pct: 10 },
      { stage: 'Estudo Preliminar', pct: 20 },
      { stage: 'Anteprojeto', pct: 25 },
      { stage: 'Projeto Básico', pct: 10 },
      { stage: 'Projeto para Execução', pct: 30 },
      { stage: 'As Built / Encerramento', pct: 5 },
    ],
  },
  without_basic_design: {
    key: 'without_basic_design',
    label: 'Without basic design',
    stages: [
      { stage: 'Assinatura', pct: 10 },
      { stage: 'Estudo Preliminar', pct: 20 },
      { stage: 'Anteprojeto', pct: 30 },
      { stage: 'Projeto para Execução', pct: 35 },
      { stage: 'As Built / Encerramento', pct: 5 },
    ],
  },
};

export const COMPLEXITY_LEVEL_COEFFICIENT: Record<ComplexityLevel, number> = {
  low: 0.7,
  medium: 1.0,
  high: 1.3,
};

export const COMPLEXITY_LEVEL_LABEL: Record<ComplexityLevel, string> = {
  low: 'Low',
  medium: 'Medium',
  high: 'High',
};

export const COMPLEXITY_INDICATORS: readonly ComplexityIndicatorDef[] = [
  { key: 'site_conditions', label: 'Site conditions' },
  { key: 'program_scope', label: 'Programme scope' },
  { key: 'building_systems', label: 'Building systems' },
  { key: 'structural_solution', label: 'Structural solution' },
  { key: 'regulatory_approvals', label: 'Regulatory approvals' },
  { key: 'heritage_constraints', label: 'Heritage constraints' },
  { key: 'sustainability_targets', label: 'Sustainability targets' },
  { key: 'stakeholders', label: 'Stakeholders' },
  { key: 'schedule_pressure', label: 'Schedule pressure' },
  { key: 'discipline_coordination', label: 'Discipline coordination' },
];

export const ADJUSTMENT_LABEL: Record<AdjustmentKey, string> = {
  k1: 'K1 - In-house staff',
  k2: 'K2 - Associates',
  k3: 'K3 - Third-party services',
  k4: 'K4 - Direct expenses',
};

export const DEFAULT_ADJUSTMENT_COMPONENTS: Record<AdjustmentKey, AdjustmentComponents> = {
  k1: { es: 80, di: 20, l: 15, dl: 10 },
  k2: { es: 0, di: 20, l: 15, dl: 10 },
  k3: { es: 0, di: 10, l: 10, dl: 10 },
  k4: { es: 0, di: 0, l: 0, dl: 10 },
};

export const DEFAULT_INPUTS = {
  project: 'Edifício Residencial Exemplo',
  client: 'Cliente Exemplo',
  region: 'MG',
  typology: 'Residencial multifamiliar',
  totalArea: 5000,
  nonRepeatedArea: 1500,
  repeatedArea: 3500,
  repetitionCoefficient: 0.6,
  repetitions: 8,
  unitRate: 120,
  costIndex: 2000,
  typologyKey: 'residential_multi',
  percentageFactor: 0.18,
  calibration: {
    first: { area: 3000, factor: 0.22 },
    second: { area: 10000, factor: 0.15 },
  },
  surchargePct: 0,
  schedulePreset: 'standard',
} as const;
