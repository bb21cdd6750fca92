export const APP_CONFIG = {
  locale: 'pt-BR',
  currency: 'BRL',
  sessionPrefix: 'feeProposal.',
  // Shares are entered in whole or decimal percent; anything within this of 100 counts as 100.
  scheduleSumTolerance: 1e-9,
  // Snr + Sr further than this from Sc raises AREA_MISMATCH.
  areaSumTolerance: 1e-9,
} as const;

export const SESSION_KEYS = {
  lastUnitRate: 'lastUnitRate',
  lastRatio: 'lastRatio',
  lastPriceTotal: 'lastPriceTotal',
} as const;
