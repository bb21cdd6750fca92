import { APP_CONFIG } from '../config';

const fmt = new Intl.NumberFormat(APP_CONFIG.locale, {
  style: 'currency',
  currency: APP_CONFIG.currency,
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

const normalizeCurrencySpaces = (s: string) => s.replace(/[\u00A0\u202F]/g, ' ');

export const currency = (n: number) => normalizeCurrencySpaces(fmt.format(Number.isFinite(n) ? n : 0));

export const pctFmt = (n: number) => `${(Number.isFinite(n) ? n : 0).toFixed(2)}%`;

export const ratioFmt = (n: number, digits = 4) => (Number.isFinite(n) ? n : 0).toFixed(digits);

export const safeFileSegment = (s: string) => s.replace(/ /g, '_');
