export { cleanJsonOutput, cleanJsonOutputMethod, stripControlCharacters } from './jsonCleaning.js';
export type { JsonSanitizer } from './jsonCleaning.js';
