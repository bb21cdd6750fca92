import { PDFDocument, StandardFonts, rgb } from 'pdf-lib';
import type { PDFFont, PDFPage, RGB } from 'pdf-lib';
import type { ProposalSnapshot } from '../utils/proposalSnapshot';
import { ADJUSTMENT_LABEL, BRAND_COLORS } from '../constants';
import { currency, pctFmt, ratioFmt } from '../utils/formatting';
import { formatIsoDate } from './exportService';

// A4 portrait in points (roughly 595 x 842)
const PAGE_WIDTH = 595.28;
const PAGE_HEIGHT = 841.89;

// Safe margins for all body content.
const MARGIN_LEFT = 40;
const MARGIN_RIGHT = 40;
const MARGIN_TOP = 80;
const MARGIN_BOTTOM = 60;
const CONTENT_WIDTH = PAGE_WIDTH - MARGIN_LEFT - MARGIN_RIGHT;

export const REPORT_COLORS = {
  background: rgb(...BRAND_COLORS.charcoal),
  heading: rgb(...BRAND_COLORS.gold),
  label: rgb(...BRAND_COLORS.accent),
  text: rgb(...BRAND_COLORS.light),
  warning: rgb(...BRAND_COLORS.alert),
};

interface PageContext {
  pdf: PDFDocument;
  page: PDFPage;
  fontRegular: PDFFont;
  fontBold: PDFFont;
  y: number;
}

const REPLACEMENTS: Record<string, string> = {
  '–': '-', '—': '-', '−': '-', '•': '*',
  '‘': "'", '’': "'", '“': '"', '”': '"',
  '…': '...', ' ': ' ', '→': '->',
};

// Standard fonts only encode WinAnsi; keep printable ASCII and Latin-1, map the rest.
export function sanitizeText(text: string): string {
  return Array.from(text.replace(/[\r\n\t]+/g, ' '))
    .map((char) => {
      const code = char.codePointAt(0) ?? 0;
      if ((code >= 32 && code <= 126) || (code >= 160 && code <= 255)) return char;
      return REPLACEMENTS[char] ?? '?';
    })
    .join('');
}

function drawBackground(ctx: PageContext) {
  ctx.page.drawRectangle({
    x: 0,
    y: 0,
    width: PAGE_WIDTH,
    height: PAGE_HEIGHT,
    color: REPORT_COLORS.background,
  });
}

function ensureSpace(ctx: PageContext, neededHeight: number): PageContext {
  if (ctx.y - neededHeight >= MARGIN_BOTTOM) return ctx;
  const nextCtx: PageContext = {
    ...ctx,
    page: ctx.pdf.addPage([PAGE_WIDTH, PAGE_HEIGHT]),
    y: PAGE_HEIGHT - MARGIN_TOP,
  };
  drawBackground(nextCtx);
  return nextCtx;
}

function wrapManual(text: string, font: PDFFont, size: number, maxWidth: number) {
  const words = text.split(' ');
  const lines: string[] = [];
  let current = '';
  words.forEach((word) => {
    const tentative = current ? `${current} ${word}` : word;
    if (font.widthOfTextAtSize(tentative, size) <= maxWidth) {
      current = tentative;
    } else {
      if (current) lines.push(current);
      current = word;
    }
  });
  if (current) lines.push(current);
  return lines;
}

function drawHeading(ctx: PageContext, text: string, size: number, color: RGB = REPORT_COLORS.heading) {
  ctx = ensureSpace(ctx, size + 6);
  ctx.page.drawText(sanitizeText(text), {
    x: MARGIN_LEFT,
    y: ctx.y - size,
    size,
    font: ctx.fontBold,
    color,
  });
  ctx.y -= size + 6;
  return ctx;
}

function drawLines(ctx: PageContext, items: string[], opts: { size?: number; lineHeight?: number; color?: RGB } = {}) {
  const size = opts.size ?? 10;
  const lineHeight = opts.lineHeight ?? 14;
  let ctxRef = ctx;
  items.forEach((item) => {
    wrapManual(sanitizeText(item), ctxRef.fontRegular, size, CONTENT_WIDTH).forEach((line) => {
      ctxRef = ensureSpace(ctxRef, lineHeight);
      ctxRef.page.drawText(line, {
        x: MARGIN_LEFT,
        y: ctxRef.y - lineHeight,
        size,
        font: ctxRef.fontRegular,
        color: opts.color ?? REPORT_COLORS.text,
      });
      ctxRef.y -= lineHeight;
    });
  });
  return ctxRef;
}

function drawKeyValueRows(
  ctx: PageContext,
  rows: Array<{ label: string; value: string }>,
  options: { labelWidth?: number; fontSize?: number; lineHeight?: number } = {},
) {
  const labelWidth = options.labelWidth ?? CONTENT_WIDTH * 0.45;
  const fontSize = options.fontSize ?? 11;
  const lineHeight = options.lineHeight ?? 16;
  const valueX = MARGIN_LEFT + labelWidth + 8;
  const maxValueWidth = CONTENT_WIDTH - labelWidth - 8;
  let ctxRef = ctx;
  rows.forEach((row) => {
    ctxRef = ensureSpace(ctxRef, lineHeight);
    ctxRef.page.drawText(sanitizeText(row.label), {
      x: MARGIN_LEFT,
      y: ctxRef.y - lineHeight,
      size: fontSize,
      font: ctxRef.fontBold,
      color: REPORT_COLORS.label,
    });
    const valueLines = wrapManual(sanitizeText(row.value), ctxRef.fontRegular, fontSize, maxValueWidth);
    valueLines.forEach((vLine, idx) => {
      if (idx > 0) ctxRef = ensureSpace(ctxRef, lineHeight);
      ctxRef.page.drawText(vLine, {
        x: valueX,
        y: ctxRef.y - lineHeight,
        size: fontSize,
        font: ctxRef.fontRegular,
        color: REPORT_COLORS.text,
      });
      ctxRef.y -= lineHeight;
    });
    if (valueLines.length === 0) ctxRef.y -= lineHeight;
  });
  return ctxRef;
}

/** Renders the proposal summary as an A4 PDF and returns its bytes. */
export async function createProposalPdf(snapshot: ProposalSnapshot, date = new Date()): Promise<Uint8Array> {
  const { identification, inputs, fee, schedule, adjustments } = snapshot;
  const pdf = await PDFDocument.create();
  pdf.setTitle(identification.project || 'Fee proposal');
  pdf.setSubject('Fee proposal');
  pdf.setCreationDate(date);
  const fontRegular = await pdf.embedFont(StandardFonts.Helvetica);
  const fontBold = await pdf.embedFont(StandardFonts.HelveticaBold);

  let ctx: PageContext = {
    pdf,
    page: pdf.addPage([PAGE_WIDTH, PAGE_HEIGHT]),
    fontRegular,
    fontBold,
    y: PAGE_HEIGHT - MARGIN_TOP,
  };
  drawBackground(ctx);

  ctx = drawHeading(ctx, 'Fee Proposal', 20);
  ctx = drawKeyValueRows(ctx, [
    { label: 'Project', value: identification.project || 'Not specified' },
    { label: 'Client', value: identification.client || 'Not specified' },
    { label: 'Region (UF)', value: identification.region || 'Not specified' },
    { label: 'Typology', value: identification.typology || 'Not specified' },
    { label: 'Date', value: formatIsoDate(date) },
  ]);
  ctx.y -= 10;

  ctx = drawHeading(ctx, 'Inputs', 14);
  const inputRows = [
    { label: 'Sc - Total area (m²)', value: String(inputs.areas.totalArea) },
    { label: 'Snr - Non-repeated area (m²)', value: String(inputs.areas.nonRepeatedArea) },
    { label: 'Sr - Repeated area (m²)', value: String(inputs.areas.repeatedArea) },
    {
      label: 'r - Repetition coefficient',
      value: inputs.q === null ? ratioFmt(inputs.r, 2) : `${ratioFmt(inputs.r, 2)} (estimated from q = ${inputs.q})`,
    },
    { label: 'R - Area ratio Sp/Sc', value: ratioFmt(fee.ratio) },
    { label: 'BH - Unit rate (per m²)', value: currency(inputs.unitRate) },
    { label: 'fp - Percentage factor', value: ratioFmt(inputs.percentageFactor) },
    { label: 'Surcharge (BDI)', value: pctFmt(inputs.surchargePct) },
  ];
  if (inputs.computedUnitRate !== null && inputs.costIndex !== null) {
    inputRows.push({ label: 'BH source', value: `Cost index ${currency(inputs.costIndex)} x typology multiplier` });
  }
  ctx = drawKeyValueRows(ctx, inputRows);
  ctx.y -= 10;

  ctx = drawHeading(ctx, 'Results', 14);
  ctx = drawKeyValueRows(ctx, [
    { label: 'PV (excl. surcharge)', value: currency(fee.basePrice) },
    { label: 'PV total', value: currency(fee.totalPrice) },
  ]);
  ctx.y -= 10;

  ctx = drawHeading(ctx, 'Adjustments', 14);
  ctx = drawKeyValueRows(ctx, [
    { label: ADJUSTMENT_LABEL.k1, value: ratioFmt(adjustments.k1) },
    { label: ADJUSTMENT_LABEL.k2, value: ratioFmt(adjustments.k2) },
    { label: ADJUSTMENT_LABEL.k3, value: ratioFmt(adjustments.k3) },
    { label: ADJUSTMENT_LABEL.k4, value: ratioFmt(adjustments.k4) },
    { label: 'IC - Complexity index', value: ratioFmt(snapshot.complexityIndex, 2) },
  ]);
  ctx.y -= 10;

  ctx = drawHeading(ctx, 'Payment Schedule', 14);
  ctx = drawKeyValueRows(
    ctx,
    schedule.entries.map((e) => ({ label: `${e.stage} (${e.pct}%)`, value: currency(e.value) })),
    { labelWidth: CONTENT_WIDTH * 0.6 },
  );
  ctx = drawLines(ctx, [`Total: ${schedule.totalPct}%`], { size: 11, lineHeight: 15 });

  const warnings = snapshot.advisories.filter((a) => a.severity === 'warning');
  if (warnings.length) {
    ctx.y -= 10;
    ctx = drawHeading(ctx, 'Warnings', 14, REPORT_COLORS.warning);
    ctx = drawLines(ctx, warnings.map((w) => `* ${w.message}`), { color: REPORT_COLORS.warning });
  }

  return pdf.save();
}
