/** Friendly aliases for commonly used FRED series. */
export const FRED_SERIES = {
  GDP: 'GDP',
  REAL_GDP: 'GDPC1',
  GDP_GROWTH: 'A191RL1Q225SBEA',
  UNEMPLOYMENT: 'UNRATE',
  NONFARM_PAYROLLS: 'PAYEMS',
  INITIAL_CLAIMS: 'ICSA',
  CPI: 'CPIAUCSL',
  CORE_CPI: 'CPILFESL',
  PCE: 'PCEPI',
  CORE_PCE: 'PCEPILFE',
  FED_FUNDS: 'FEDFUNDS',
  TREASURY_2Y: 'DGS2',
  TREASURY_10Y: 'DGS10',
  YIELD_CURVE: 'T10Y2Y',
  MORTGAGE_30Y: 'MORTGAGE30US',
  M2: 'M2SL',
  INDUSTRIAL_PRODUCTION: 'INDPRO',
  RETAIL_SALES: 'RSAFS',
  HOUSING_STARTS: 'HOUST',
  CONSUMER_SENTIMENT: 'UMCSENT',
  SP500: 'SP500',
  VIX: 'VIXCLS',
  USD_INDEX: 'DTWEXBGS',
  OIL_WTI: 'DCOILWTICO',
} as const satisfies Record<string, string>;

export type FredSeriesAlias = keyof typeof FRED_SERIES;

function isAlias(name: string): name is FredSeriesAlias {
  return Object.prototype.hasOwnProperty.call(FRED_SERIES, name);
}

/** Map an alias (case-insensitive) to its series id; anything else passes through. */
export function resolveSeriesId(name: string): string {
  const trimmed = name.trim();
  const key = trimmed.toUpperCase();
  return isAlias(key) ? FRED_SERIES[key] : trimmed;
}
