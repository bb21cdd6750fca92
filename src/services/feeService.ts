import type {
  AdjustmentComponents,
  AdjustmentFactors,
  AdjustmentKey,
  AreaInputs,
  CalibrationPair,
  ComplexityLevel,
  ComplexitySelections,
  FeeParameters,
  FeeResult,
  RepetitionInput,
  TypologyDef,
  TypologyKey,
} from '../types';
import {
  COMPLEXITY_INDICATORS,
  COMPLEXITY_LEVEL_COEFFICIENT,
  DEFAULT_ADJUSTMENT_COMPONENTS,
  REPETITION_BANDS,
  TYPOLOGIES,
} from '../constants';

/** Productive-area ratio R = (Snr + Sr × r) / Sc. Zero total area gives 0. */
export function computeAreaRatio(areas: AreaInputs, r: number): number {
  const { totalArea, nonRepeatedArea, repeatedArea } = areas;
  if (totalArea === 0) return 0;
  const productiveArea = nonRepeatedArea + repeatedArea * r;
  return productiveArea / totalArea;
}

export function estimateRepetitionCoefficient(repetitions: number): number {
  for (const band of REPETITION_BANDS) {
    if (repetitions <= band.upTo) return band.coefficient;
  }
  return REPETITION_BANDS[REPETITION_BANDS.length - 1].coefficient;
}

export function resolveRepetitionCoefficient(input: RepetitionInput): number {
  return input.mode === 'manual' ? input.coefficient : estimateRepetitionCoefficient(input.repetitions);
}

/**
 * Linear interpolation of fp between (sc1, fp1) and (sc2, fp2):
 * fp = fp1 - (fp1 - fp2) * ((sc - sc1) / (sc2 - sc1)).
 *
 * Not clamped, so areas outside the bracket extrapolate. A degenerate pair
 * (sc1 === sc2) returns fp1.
 */
export function interpolatePercentageFactor(calibration: CalibrationPair, area: number): number {
  const { first, second } = calibration;
  if (first.area === second.area) return first.factor;
  return first.factor - (first.factor - second.factor) * ((area - first.area) / (second.area - first.area));
}

export function calculateUnitRate(costIndex: number, multiplier: number): number {
  return costIndex * multiplier;
}

export function findTypology(key: TypologyKey): TypologyDef {
  const typology = TYPOLOGIES.find(t => t.key === key);
  if (!typology) throw new RangeError(`Unknown typology "${key}"`);
  return typology;
}

export function unitRateForTypology(costIndex: number, key: TypologyKey): number {
  return calculateUnitRate(costIndex, findTypology(key).multiplier);
}

/** K = (1 + ES/100)(1 + DI/100)(1 + L/100)(1 + DL/100); loadings are whole percent. */
export function compositeAdjustmentFactor({ es, di, l, dl }: AdjustmentComponents): number {
  return (1 + es / 100) * (1 + di / 100) * (1 + l / 100) * (1 + dl / 100);
}

export function computeAdjustmentFactors(
  overrides: Partial<Record<AdjustmentKey, AdjustmentComponents>> = {},
): AdjustmentFactors {
  const factorFor = (key: AdjustmentKey) => compositeAdjustmentFactor(overrides[key] ?? DEFAULT_ADJUSTMENT_COMPONENTS[key]);
  return {
    k1: factorFor('k1'),
    k2: factorFor('k2'),
    k3: factorFor('k3'),
    k4: factorFor('k4'),
  };
}

export function aggregateComplexityIndex(levels: readonly ComplexityLevel[]): number {
  if (levels.length === 0) return 1.0;
  const sum = levels.reduce((acc, level) => acc + COMPLEXITY_LEVEL_COEFFICIENT[level], 0);
  return sum / levels.length;
}

// Unselected indicators count as medium.
export function complexityLevelsFromSelections(selections: ComplexitySelections = {}): ComplexityLevel[] {
  return COMPLEXITY_INDICATORS.map(indicator => selections[indicator.key] ?? 'medium');
}

export function computeFee(totalArea: number, ratio: number, params: FeeParameters): FeeResult {
  const { unitRate, percentageFactor, surchargePct = 0 } = params;
  const basePrice = totalArea * unitRate * (percentageFactor * ratio);
  const totalPrice = basePrice * (1 + surchargePct / 100);
  return { basePrice, totalPrice, ratio };
}
