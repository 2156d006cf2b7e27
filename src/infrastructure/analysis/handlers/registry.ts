import type { HandlerRegistry } from './types.js';
import { pdfHandler } from './PdfHandler.js';
import { textHandler } from './TextHandler.js';
import { tabularHandler } from './TabularHandler.js';
import { spreadsheetHandler } from './SpreadsheetHandler.js';
import { wordHandler } from './WordHandler.js';
import { structuredRecordHandler } from './StructuredRecordHandler.js';

export const DEFAULT_HANDLERS: HandlerRegistry = {
  pdf: pdfHandler,
  text: textHandler,
  tabular: tabularHandler,
  spreadsheet: spreadsheetHandler,
  word: wordHandler,
  structured_record: structuredRecordHandler,
};

export type { FileHandler, HandlerContext, HandlerOutput, HandlerRegistry, RawChunk } from './types.js';
