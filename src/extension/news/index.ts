export { NewsScraper, edgarPageSize, NEWS_COLUMNS, FILING_COLUMNS } from './NewsScraper.js';
export type { NewsScraperOptions } from './NewsScraper.js';
export { feedParser, parseFeed, htmlToText, textOf } from './xml.js';
