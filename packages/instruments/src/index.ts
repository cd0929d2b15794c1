export { classifyContractType, type ContractClassification, type DerivativeAssetType } from './contract-type.js';
export { simplifyFutureCode, MONTH_CODES } from './future-code.js';
export { buildDerivativeInstrumentId, buildSpotInstrumentId, type DerivativeIdInput } from './instrument-id.js';
export { extractFilterConstraints, parseFilter, type ParsedFilter } from './filters.js';
export { DiagnosticSink, type Diagnostic, type DiagnosticCode } from './diagnostics.js';
export { DocumentParseError, DocumentValidationError, FormatError, getErrorMessage } from './errors.js';
export { normalizeSpotSymbols } from './normalizers/spot.js';
export { normalizeDerivativeSymbols, resolveStatus } from './normalizers/derivatives.js';
export { discoverColumns, type CsvRecord, type CsvValue } from './csv/columns.js';
export { writeCsv, type CsvWriteOptions } from './csv/csv-writer.js';
export { INSTRUMENT_KEY_FIELD, ParseSession, parseDocumentText, type ParseSessionOptions } from './parse-session.js';
export {
  ASSETS_FILE_NAME,
  COIN_FUTURES_SEGMENT,
  SEGMENTS,
  SPOT_SEGMENT,
  USD_FUTURES_SEGMENT,
  type FilterFieldKeys,
  type SegmentConfig,
  type SegmentId,
  type SegmentKind,
} from './segments.js';
export * from './schemas.js';
export { VENUE_SUFFIX, type AssetType, type CanonicalInstrument, type FilterConstraints } from './types.js';
