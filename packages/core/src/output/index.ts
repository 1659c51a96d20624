export {
  OUTPUT_FORMATS,
  encodeHeaderValue,
  fileNameFor,
  formatResult,
  isOutputFormat,
  outerBlock,
  toEml,
  toMailto,
} from './output-formatter.js';
export type { FormatOptions, OutputFormat } from './output-formatter.js';
