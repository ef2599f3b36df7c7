export { AlternativeDataScraper, HOLDER_COLUMNS } from './AlternativeDataScraper.js';
