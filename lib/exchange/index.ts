/**
 * Exchange format exports
 */

export {
  decodeCellValue,
  encodeCellValue,
  parseExchangeDocument,
  parseExchangeJson,
  serializeExtraction,
  toExtractionResult,
  toJson,
} from './serializer';

export { EXCHANGE_FORMAT_VERSION, exchangeDocumentSchema } from './schema';
export type {
  EncodedValue,
  ExchangeDocument,
  ExchangeFormula,
  ExchangeSheet,
  ExchangeTable,
  ExchangeWarning,
} from './schema';
