export { FredClient, parseObservationValue, SERIES_COLUMNS, SEARCH_COLUMNS, RELEASE_COLUMNS } from './FredClient.js';
export type { FredClientOptions, ReleaseObservationsOptions, ReleaseObservationsPage } from './FredClient.js';
export { FRED_SERIES, resolveSeriesId } from './series.js';
export type { FredSeriesAlias } from './series.js';
