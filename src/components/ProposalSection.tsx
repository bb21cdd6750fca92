import React, { useEffect, useMemo, useState } from 'react';
import type {
  CalibrationPair,
  ComplexityLevel,
  ComplexitySelections,
  FactorMode,
  ProposalForm,
  RepetitionMode,
  SchedulePresetKey,
  StageShare,
  TypologyKey,
  UnitRateMode,
} from '../types';
import type { SessionContext } from '../utils/session';
import { useSessionChoice, useSessionNumber, useSessionState, useSessionString } from '../hooks/useSessionState';
import { computeProposalSnapshot, readPreviousRun, recordSnapshot, warningsOf } from '../utils/proposalSnapshot';
import { isCalibrationPair, isComplexitySelections, isStageShareList } from '../utils/guards';
import { schedulePresetShares } from '../services/scheduleService';
import { buildProposalDocument, proposalFileName, serializeProposalDocument, serializeScheduleCsv } from '../services/exportService';
import { createProposalPdf } from '../services/reportService';
import { exportCsv, exportJson, exportPdf } from '../utils/export';
import { currency, pctFmt, ratioFmt } from '../utils/formatting';
import { SESSION_KEYS } from '../config';
import {
  COMPLEXITY_INDICATORS,
  COMPLEXITY_LEVEL_LABEL,
  DEFAULT_INPUTS,
  REGIONS,
  SCHEDULE_PRESETS,
  TYPOLOGIES,
} from '../constants';
import { Table, TableBody, TableCell, TableFooter, TableHead, TableHeader, TableRow } from './ui/table';
import { Input } from './ui/input';
import { Button } from './ui/button';
import { Card, CardContent, CardHeader, CardTitle } from './ui/card';
import { Label } from './ui/label';
import { Tooltip } from './Tooltip';
import { cn } from '../lib/utils';
import { AlertTriangle, Download } from 'lucide-react';

interface ProposalSectionProps {
  session: SessionContext;
  now?: () => Date;
}

const SELECT_CLASS = 'flex h-10 w-full rounded-md border border-input bg-background px-3 py-2 text-sm ring-offset-background focus-visible:outline-none focus-visible:ring-2 focus-visible:ring-ring';

const TYPOLOGY_KEYS = TYPOLOGIES.map(t => t.key);
const PRESET_KEYS: readonly SchedulePresetKey[] = ['standard', 'without_basic_design'];
const LEVELS: readonly ComplexityLevel[] = ['low', 'medium', 'high'];

type Region = (typeof REGIONS)[number];
type Toggle = 'off' | 'on';

function ModeToggle<T extends string>({ label, value, options, onChange }: { label: string; value: T; options: Array<{ key: T; label: string }>; onChange: (v: T) => void }) {
  return (
    <div role="group" aria-label={label} className="flex bg-muted rounded-md p-1">
      {options.map(o => (
        <button
          key={o.key}
          type="button"
          className={cn('px-3 py-1 text-sm rounded-sm transition-all', value === o.key ? 'bg-background shadow text-foreground' : 'text-muted-foreground hover:text-foreground')}
          onClick={() => onChange(o.key)}
        >
          {o.label}
        </button>
      ))}
    </div>
  );
}

function NumberField({ id, label, value, onChange, step, min, max }: { id: string; label: string; value: number; onChange: (v: number) => void; step?: number; min?: number; max?: number }) {
  return (
    <div className="space-y-2">
      <Label htmlFor={id}>{label}</Label>
      <Input id={id} type="number" value={value} step={step} min={min} max={max} onChange={(e) => onChange(Number(e.target.value))} />
    </div>
  );
}

export function ProposalSection({ session, now = () => new Date() }: ProposalSectionProps) {
  const [project, setProject] = useSessionString(session, 'project', DEFAULT_INPUTS.project);
  const [client, setClient] = useSessionString(session, 'client', DEFAULT_INPUTS.client);
  const [region, setRegion] = useSessionChoice<Region>(session, 'region', DEFAULT_INPUTS.region, REGIONS);
  const [typology, setTypology] = useSessionString(session, 'typology', DEFAULT_INPUTS.typology);

  const [totalArea, setTotalArea] = useSessionNumber(session, 'totalArea', DEFAULT_INPUTS.totalArea);
  const [nonRepeatedArea, setNonRepeatedArea] = useSessionNumber(session, 'nonRepeatedArea', DEFAULT_INPUTS.nonRepeatedArea);
  const [repeatedArea, setRepeatedArea] = useSessionNumber(session, 'repeatedArea', DEFAULT_INPUTS.repeatedArea);

  const [repetitionMode, setRepetitionMode] = useSessionChoice<RepetitionMode>(session, 'repetitionMode', 'manual', ['manual', 'estimated']);
  const [repetitionCoefficient, setRepetitionCoefficient] = useSessionNumber(session, 'repetitionCoefficient', DEFAULT_INPUTS.repetitionCoefficient);
  const [repetitions, setRepetitions] = useSessionNumber(session, 'repetitions', DEFAULT_INPUTS.repetitions);

  const [factorMode, setFactorMode] = useSessionChoice<FactorMode>(session, 'factorMode', 'manual', ['manual', 'interpolated']);
  const [percentageFactor, setPercentageFactor] = useSessionNumber(session, 'percentageFactor', DEFAULT_INPUTS.percentageFactor);
  const [calibration, setCalibration] = useSessionState<CalibrationPair>(session, 'calibration', {
    first: { ...DEFAULT_INPUTS.calibration.first },
    second: { ...DEFAULT_INPUTS.calibration.second },
  }, isCalibrationPair);

  const [unitRateMode, setUnitRateMode] = useSessionChoice<UnitRateMode>(session, 'unitRateMode', 'manual', ['manual', 'computed']);
  const [unitRate, setUnitRate] = useSessionNumber(session, 'unitRate', session.getNumber(SESSION_KEYS.lastUnitRate, DEFAULT_INPUTS.unitRate));
  const [costIndex, setCostIndex] = useSessionNumber(session, 'costIndex', DEFAULT_INPUTS.costIndex);
  const [typologyKey, setTypologyKey] = useSessionChoice<TypologyKey>(session, 'typologyKey', DEFAULT_INPUTS.typologyKey, TYPOLOGY_KEYS);

  const [surcharge, setSurcharge] = useSessionChoice<Toggle>(session, 'surcharge', 'off', ['off', 'on']);
  const [surchargePct, setSurchargePct] = useSessionNumber(session, 'surchargePct', DEFAULT_INPUTS.surchargePct);

  const [presetKey, setPresetKey] = useSessionChoice<SchedulePresetKey>(session, 'schedulePreset', DEFAULT_INPUTS.schedulePreset, PRESET_KEYS);
  const [shares, setShares] = useSessionState<StageShare[]>(session, 'scheduleShares', schedulePresetShares(DEFAULT_INPUTS.schedulePreset), isStageShareList);
  const [complexity, setComplexity] = useSessionState<ComplexitySelections>(session, 'complexity', {}, isComplexitySelections);

  const form = useMemo<ProposalForm>(() => ({
    identification: { project, client, region, typology },
    areas: { totalArea, nonRepeatedArea, repeatedArea },
    repetition: repetitionMode === 'manual'
      ? { mode: 'manual', coefficient: repetitionCoefficient }
      : { mode: 'estimated', repetitions },
    factor: factorMode === 'manual'
      ? { mode: 'manual', factor: percentageFactor }
      : { mode: 'interpolated', calibration },
    unitRate: unitRateMode === 'manual'
      ? { mode: 'manual', rate: unitRate }
      : { mode: 'computed', costIndex, typology: typologyKey },
    surchargeEnabled: surcharge === 'on',
    surchargePct,
    schedule: shares,
    complexity,
  }), [
    project, client, region, typology, totalArea, nonRepeatedArea, repeatedArea,
    repetitionMode, repetitionCoefficient, repetitions, factorMode, percentageFactor, calibration,
    unitRateMode, unitRate, costIndex, typologyKey, surcharge, surchargePct, shares, complexity,
  ]);

  const [previousRun] = useState(() => readPreviousRun(session));
  const snapshot = useMemo(() => computeProposalSnapshot(form, session), [form, session]);
  const { inputs, fee, schedule } = snapshot;
  const warnings = warningsOf(snapshot);

  useEffect(() => {
    recordSnapshot(session, snapshot);
  }, [session, snapshot]);

  // Going back to a manual rate starts from the last BH derived from the cost index.
  const selectUnitRateMode = (mode: UnitRateMode) => {
    if (mode === 'manual' && unitRateMode === 'computed') {
      setUnitRate(session.getNumber(SESSION_KEYS.lastUnitRate, unitRate));
    }
    setUnitRateMode(mode);
  };

  const selectPreset = (key: SchedulePresetKey) => {
    setPresetKey(key);
    setShares(schedulePresetShares(key));
  };

  const updateShare = (idx: number, pct: number) => {
    setShares(cur => cur.map((s, i) => (i === idx ? { ...s, pct } : s)));
  };

  const updateCalibration = (point: 'first' | 'second', field: 'area' | 'factor', value: number) => {
    setCalibration(cur => ({ ...cur, [point]: { ...cur[point], [field]: value } }));
  };

  const handleExportJson = () => {
    const doc = buildProposalDocument(snapshot, now());
    exportJson(proposalFileName(project, 'json'), serializeProposalDocument(doc));
  };

  const handleExportCsv = () => {
    exportCsv(proposalFileName(project, 'csv'), serializeScheduleCsv(schedule.entries));
  };

  const handleExportPdf = async () => {
    try {
      const bytes = await createProposalPdf(snapshot, now());
      exportPdf(proposalFileName(project, 'pdf'), bytes);
    } catch (e) {
      console.error('Failed to generate proposal PDF', e);
    }
  };

  return (
    <Card>
      <CardHeader className="flex flex-row items-center justify-between space-y-0 pb-4">
        <CardTitle>Fee Proposal</CardTitle>
        <div className="flex items-center gap-2">
          <Button variant="outline" size="sm" onClick={handleExportJson}>
            <Download className="mr-2 h-4 w-4" />
            JSON
          </Button>
          <Button variant="outline" size="sm" onClick={handleExportCsv}>
            <Download className="mr-2 h-4 w-4" />
            CSV
          </Button>
          <Button variant="default" size="sm" onClick={() => void handleExportPdf()}>
            <Download className="mr-2 h-4 w-4" />
            PDF
          </Button>
        </div>
      </CardHeader>
      <CardContent className="space-y-6">
        <div className="grid md:grid-cols-4 gap-6">
          <div className="space-y-2">
            <Label htmlFor="project">Project name</Label>
            <Input id="project" value={project} onChange={(e) => setProject(e.target.value)} />
          </div>
          <div className="space-y-2">
            <Label htmlFor="client">Client</Label>
            <Input id="client" value={client} onChange={(e) => setClient(e.target.value)} />
          </div>
          <div className="space-y-2">
            <Label htmlFor="region">Region (UF)</Label>
            <select id="region" className={SELECT_CLASS} value={region} onChange={(e) => setRegion(REGIONS.find(r => r === e.target.value) ?? region)}>
              {REGIONS.map(r => <option key={r} value={r}>{r}</option>)}
            </select>
          </div>
          <div className="space-y-2">
            <Label htmlFor="typology">Typology</Label>
            <Input id="typology" value={typology} onChange={(e) => setTypology(e.target.value)} />
          </div>
        </div>

        <div className="grid md:grid-cols-3 gap-6">
          <NumberField id="totalArea" label="Sc - Total built area (m²)" value={totalArea} min={0} step={10} onChange={setTotalArea} />
          <NumberField id="nonRepeatedArea" label="Snr - Non-repeated area (m²)" value={nonRepeatedArea} min={0} step={10} onChange={setNonRepeatedArea} />
          <NumberField id="repeatedArea" label="Sr - Repeated area (m²)" value={repeatedArea} min={0} step={10} onChange={setRepeatedArea} />
        </div>

        <div className="grid md:grid-cols-3 gap-6">
          <div className="space-y-3">
            <Label>Repetition coefficient (r)</Label>
            <ModeToggle label="Repetition coefficient mode" value={repetitionMode} onChange={setRepetitionMode} options={[{ key: 'manual', label: 'Manual' }, { key: 'estimated', label: 'Estimate from q' }]} />
            {repetitionMode === 'manual'
              ? <NumberField id="repetitionCoefficient" label="r (0 to 1)" value={repetitionCoefficient} min={0} max={1} step={0.01} onChange={setRepetitionCoefficient} />
              : <NumberField id="repetitions" label="q - Number of repetitions" value={repetitions} min={1} step={1} onChange={setRepetitions} />}
            <div className="text-xs text-muted-foreground">
              r = {ratioFmt(inputs.r, 2)}{inputs.q !== null && ' (heuristic; check the official tables)'}
            </div>
          </div>

          <div className="space-y-3">
            <Label>Percentage factor (fp)</Label>
            <ModeToggle label="Percentage factor mode" value={factorMode} onChange={setFactorMode} options={[{ key: 'manual', label: 'Manual' }, { key: 'interpolated', label: 'Interpolate' }]} />
            {factorMode === 'manual' ? (
              <NumberField id="percentageFactor" label="fp (e.g. 0.18 = 18%)" value={percentageFactor} min={0} max={1} step={0.005} onChange={setPercentageFactor} />
            ) : (
              <div className="grid grid-cols-2 gap-2">
                <NumberField id="sc1" label="Sc1 (m²)" value={calibration.first.area} min={0} step={10} onChange={(v) => updateCalibration('first', 'area', v)} />
                <NumberField id="fp1" label="fp1" value={calibration.first.factor} min={0} max={1} step={0.005} onChange={(v) => updateCalibration('first', 'factor', v)} />
                <NumberField id="sc2" label="Sc2 (m²)" value={calibration.second.area} min={0} step={10} onChange={(v) => updateCalibration('second', 'area', v)} />
                <NumberField id="fp2" label="fp2" value={calibration.second.factor} min={0} max={1} step={0.005} onChange={(v) => updateCalibration('second', 'factor', v)} />
              </div>
            )}
            <div className="text-xs text-muted-foreground">fp = {ratioFmt(inputs.percentageFactor)}</div>
          </div>

          <div className="space-y-3">
            <Label>Unit rate (BH)</Label>
            <ModeToggle label="Unit rate mode" value={unitRateMode} onChange={selectUnitRateMode} options={[{ key: 'manual', label: 'Manual' }, { key: 'computed', label: 'From cost index' }]} />
            {unitRateMode === 'manual' ? (
              <NumberField id="unitRate" label="BH (R$/m²)" value={unitRate} min={0} step={1} onChange={setUnitRate} />
            ) : (
              <>
                <NumberField id="costIndex" label="Cost index (R$/m²)" value={costIndex} min={0} step={10} onChange={setCostIndex} />
                <select className={SELECT_CLASS} value={typologyKey} onChange={(e) => setTypologyKey(TYPOLOGY_KEYS.find(k => k === e.target.value) ?? typologyKey)}>
                  {TYPOLOGIES.map(t => <option key={t.key} value={t.key}>{t.label} (x{t.multiplier})</option>)}
                </select>
                {inputs.computedUnitRate !== null && (
                  <Button
                    variant="secondary"
                    size="sm"
                    onClick={() => {
                      setUnitRate(inputs.unitRate);
                      setUnitRateMode('manual');
                    }}
                  >
                    Use {currency(inputs.unitRate)} as manual BH
                  </Button>
                )}
              </>
            )}
          </div>
        </div>

        <div className="grid md:grid-cols-3 gap-6 items-end">
          <label className="flex items-center gap-2 text-sm">
            <input type="checkbox" checked={surcharge === 'on'} onChange={(e) => setSurcharge(e.target.checked ? 'on' : 'off')} />
            Apply additional surcharge (BDI)
          </label>
          {surcharge === 'on' && (
            <NumberField id="surchargePct" label="Surcharge (% of PV)" value={surchargePct} min={0} max={100} step={0.5} onChange={setSurchargePct} />
          )}
        </div>

        <div className="grid md:grid-cols-3 gap-4 rounded-lg border bg-muted/50 p-4">
          <div>
            <div className="text-sm text-muted-foreground">R - Ratio Sp/Sc</div>
            <div className="text-xl font-bold" data-testid="ratio">{ratioFmt(fee.ratio)}</div>
          </div>
          <div>
            <div className="text-sm text-muted-foreground">PV (excl. surcharge)</div>
            <div className="text-xl font-bold" data-testid="price-base">{currency(fee.basePrice)}</div>
          </div>
          <div>
            <div className="text-sm text-muted-foreground">PV total</div>
            <div className="text-xl font-bold text-primary" data-testid="price-total">{currency(fee.totalPrice)}</div>
          </div>
        </div>
        {previousRun && (
          <div className="text-xs text-muted-foreground" data-testid="previous-run">
            Previous run in this session: R {ratioFmt(previousRun.ratio)}, PV total {currency(previousRun.priceTotal)}
          </div>
        )}

        <details className="rounded-lg border p-4">
          <summary className="cursor-pointer text-sm font-medium">
            Complexity index (IC = {ratioFmt(snapshot.complexityIndex, 2)}) and adjustment factors
          </summary>
          <div className="grid md:grid-cols-2 gap-3 mt-4">
            {COMPLEXITY_INDICATORS.map(ind => (
              <div key={ind.key} className="flex items-center justify-between gap-2">
                <span className="text-sm">{ind.label}</span>
                <select
                  className={cn(SELECT_CLASS, 'w-32')}
                  value={complexity[ind.key] ?? 'medium'}
                  onChange={(e) => {
                    const level = LEVELS.find(l => l === e.target.value);
                    if (level) setComplexity(cur => ({ ...cur, [ind.key]: level }));
                  }}
                >
                  {LEVELS.map(l => <option key={l} value={l}>{COMPLEXITY_LEVEL_LABEL[l]}</option>)}
                </select>
              </div>
            ))}
          </div>
          <div className="text-xs text-muted-foreground mt-3">
            K1 {ratioFmt(snapshot.adjustments.k1)} | K2 {ratioFmt(snapshot.adjustments.k2)} | K3 {ratioFmt(snapshot.adjustments.k3)} | K4 {ratioFmt(snapshot.adjustments.k4)}
          </div>
        </details>

        <div className="space-y-3">
          <div className="flex items-center justify-between gap-3">
            <Label htmlFor="schedulePreset">Payment schedule</Label>
            <select
              id="schedulePreset"
              className={cn(SELECT_CLASS, 'w-64')}
              value={presetKey}
              onChange={(e) => {
                const key = PRESET_KEYS.find(k => k === e.target.value);
                if (key) selectPreset(key);
              }}
            >
              {PRESET_KEYS.map(k => <option key={k} value={k}>{SCHEDULE_PRESETS[k].label}</option>)}
            </select>
          </div>
          <div className="rounded-md border">
            <Table>
              <TableHeader>
                <TableRow>
                  <TableHead>Stage</TableHead>
                  <TableHead>%</TableHead>
                  <TableHead className="text-right">Value</TableHead>
                </TableRow>
              </TableHeader>
              <TableBody>
                {schedule.entries.map((entry, idx) => (
                  <TableRow key={`${entry.stage}-${idx}`}>
                    <TableCell>{entry.stage}</TableCell>
                    <TableCell>
                      <Input
                        type="number"
                        min={0}
                        max={100}
                        className="h-8 w-20"
                        aria-label={`${entry.stage} percentage`}
                        value={entry.pct}
                        onChange={(e) => updateShare(idx, Number(e.target.value))}
                      />
                    </TableCell>
                    <TableCell className="text-right">{currency(entry.value)}</TableCell>
                  </TableRow>
                ))}
              </TableBody>
              <TableFooter>
                <TableRow>
                  <TableCell className="font-medium">TOTAL</TableCell>
                  <TableCell data-testid="schedule-total-pct">{pctFmt(schedule.totalPct)}</TableCell>
                  <TableCell className="text-right font-bold">{currency(schedule.entries.reduce((a, e) => a + e.value, 0))}</TableCell>
                </TableRow>
              </TableFooter>
            </Table>
          </div>
        </div>

        {warnings.length > 0 && (
          <div role="alert" className="rounded-md border border-destructive/50 p-4 text-sm text-destructive space-y-1">
            {warnings.map((w, i) => (
              <Tooltip key={`${w.code}-${i}`} text={w.code}>
                <div className="flex items-center gap-2">
                  <AlertTriangle className="h-4 w-4" />
                  <span>{w.message}</span>
                </div>
              </Tooltip>
            ))}
          </div>
        )}
      </CardContent>
    </Card>
  );
}
