// types.ts

// Area & repetition types
export interface AreaInputs {
  totalArea: number;
  nonRepeatedArea: number;
  repeatedArea: number;
}

export type RepetitionMode = 'manual' | 'estimated';

export type RepetitionInput =
  | { mode: 'manual'; coefficient: number }
  | { mode: 'estimated'; repetitions: number };

export interface RepetitionBand {
  upTo: number; // inclusive upper bound of q
  coefficient: number;
}

// Percentage factor types
export interface CalibrationPoint {
  area: number;
  factor: number;
}

export interface CalibrationPair {
  first: CalibrationPoint;
  second: CalibrationPoint;
}

export type FactorMode = 'manual' | 'interpolated';

export type PercentageFactorInput =
  | { mode: 'manual'; factor: number }
  | { mode: 'interpolated'; calibration: CalibrationPair };

// Unit rate (BH) types
export type TypologyKey =
  | 'residential_single'
  | 'residential_multi'
  | 'commercial'
  | 'corporate'
  | 'educational'
  | 'healthcare'
  | 'hospitality'
  | 'industrial'
  | 'interiors'
  | 'landscape';

export interface TypologyDef {
  key: TypologyKey;
  label: string;
  multiplier: number;
}

export type UnitRateMode = 'manual' | 'computed';

export type UnitRateInput =
  | { mode: 'manual'; rate?: number }
  | { mode: 'computed'; costIndex: number; typology: TypologyKey };

// Fee types
export interface FeeParameters {
  unitRate: number;
  percentageFactor: number;
  surchargePct?: number;
}

export interface FeeResult {
  basePrice: number;
  totalPrice: number;
  ratio: number;
}

// Adjustment (K1..K4) types
export type AdjustmentKey = 'k1' | 'k2' | 'k3' | 'k4';

export interface AdjustmentComponents {
  es: number; // social charges
  di: number; // indirect expenses
  l: number; // profit
  dl: number; // taxes
}

export type AdjustmentFactors = Record<AdjustmentKey, number>;

// Complexity index types
export type ComplexityLevel = 'low' | 'medium' | 'high';

export type ComplexityIndicatorKey =
  | 'site_conditions'
  | 'program_scope'
  | 'building_systems'
  | 'structural_solution'
  | 'regulatory_approvals'
  | 'heritage_constraints'
  | 'sustainability_targets'
  | 'stakeholders'
  | 'schedule_pressure'
  | 'discipline_coordination';

export interface ComplexityIndicatorDef {
  key: ComplexityIndicatorKey;
  label: string;
}

export type ComplexitySelections = Partial<Record<ComplexityIndicatorKey, ComplexityLevel>>;

// Schedule types
export type SchedulePresetKey = 'standard' | 'without_basic_design';

export interface StageShare {
  stage: string;
  pct: number;
}

export interface SchedulePreset {
  key: SchedulePresetKey;
  label: string;
  stages: readonly StageShare[];
}

export interface ScheduleEntry {
  stage: string;
  pct: number;
  value: number;
}

export interface ScheduleResult {
  entries: ScheduleEntry[];
  totalPct: number;
  advisories: Advisory[];
}

// Advisories
export type AdvisoryCode =
  | 'ZERO_TOTAL_AREA'
  | 'DEGENERATE_CALIBRATION'
  | 'AREA_MISMATCH'
  | 'NEGATIVE_INPUT'
  | 'FACTOR_OUT_OF_RANGE'
  | 'SURCHARGE_OUT_OF_RANGE'
  | 'SCHEDULE_SUM_MISMATCH';

export type AdvisorySeverity = 'info' | 'warning';

export interface Advisory {
  code: AdvisoryCode;
  severity: AdvisorySeverity;
  message: string;
}

// Proposal types
export interface ProjectIdentification {
  project: string;
  client: string;
  region: string;
  typology: string;
}

export interface ProposalForm {
  identification: ProjectIdentification;
  areas: AreaInputs;
  repetition: RepetitionInput;
  factor: PercentageFactorInput;
  unitRate: UnitRateInput;
  surchargeEnabled: boolean;
  surchargePct: number;
  schedule: StageShare[];
  complexity?: ComplexitySelections;
  adjustments?: Partial<Record<AdjustmentKey, AdjustmentComponents>>;
}
