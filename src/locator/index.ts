export { Locator, type IndexedMeasurement, type LocatorOptions } from './locator.js';
export { parseIndexFromDirName } from './index-parser.js';
