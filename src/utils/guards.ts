import type { CalibrationPair, CalibrationPoint, ComplexityLevel, ComplexitySelections, StageShare } from '../types';
import { COMPLEXITY_INDICATORS } from '../constants';

export type JsonRecord = Record<string, unknown>;

export const isRecord = (v: unknown): v is JsonRecord => typeof v === 'object' && v !== null && !Array.isArray(v);

const isFiniteNumber = (v: unknown): v is number => typeof v === 'number' && Number.isFinite(v);

const LEVELS: readonly ComplexityLevel[] = ['low', 'medium', 'high'];

export function isStageShareList(v: unknown): v is StageShare[] {
  return Array.isArray(v) && v.every((s: unknown) => isRecord(s) && typeof s.stage === 'string' && isFiniteNumber(s.pct));
}

function isCalibrationPoint(v: unknown): v is CalibrationPoint {
  return isRecord(v) && isFiniteNumber(v.area) && isFiniteNumber(v.factor);
}

export function isCalibrationPair(v: unknown): v is CalibrationPair {
  return isRecord(v) && isCalibrationPoint(v.first) && isCalibrationPoint(v.second);
}

export function isComplexitySelections(v: unknown): v is ComplexitySelections {
  return isRecord(v) && Object.entries(v).every(
    ([key, level]) => COMPLEXITY_INDICATORS.some(i => i.key === key) && LEVELS.some(l => l === level),
  );
}
