// Stateful variant
export { RecordReader, withRecordReader } from './RecordReader.js';

// Suspension-based variant
export { openRows, withRows } from './scopedRows.js';

// Configuration
export type { ReaderConfig, ResolvedReaderConfig } from './application/ReaderConfig.js';
export { resolveReaderConfig } from './application/ReaderConfig.js';

// Domain model
export { Row } from './domain/model/Row.js';
export { RowShape } from './domain/model/RowShape.js';
export { ReaderState, canTransition } from './domain/model/ReaderState.js';

// Header normalization
export { normalizeHeader, normalizeFieldName, isValidFieldName } from './domain/services/HeaderNormalizer.js';

// Errors
export type { ReaderErrorCode, SchemaErrorReason } from './domain/errors/ReaderErrors.js';
export {
  ReaderError,
  ResourceError,
  SchemaError,
  RowShapeError,
  RecordFormatError,
  isReaderError,
} from './domain/errors/ReaderErrors.js';

// Row sequence and helpers
export { RowProducer } from './application/RowProducer.js';
export { previewRows } from './application/previewRows.js';
export type { PreviewResult, RejectedRecord } from './application/previewRows.js';
export { detectDelimiter, CANDIDATE_DELIMITERS } from './application/detectDelimiter.js';

// Events
export { EventBus } from './application/EventBus.js';
export type { HandlerErrorCallback } from './application/EventBus.js';
export type {
  DomainEvent,
  EventType,
  EventPayload,
  ReaderOpenedEvent,
  HeaderParsedEvent,
  ReaderOpenFailedEvent,
  RowRejectedEvent,
  ReaderExhaustedEvent,
  ReaderClosedEvent,
} from './domain/events/DomainEvents.js';

// Ports (for custom implementations)
export type { TextResource, ResourceOpener } from './domain/ports/TextResource.js';
export type { LineTokenizer, TokenizerOptions } from './domain/ports/LineTokenizer.js';

// Infrastructure adapters
export { FileResource } from './infrastructure/resources/FileResource.js';
export type { FileResourceOptions } from './infrastructure/resources/FileResource.js';
export { StringResource } from './infrastructure/resources/StringResource.js';
export type { StringResourceOptions } from './infrastructure/resources/StringResource.js';
export { PapaLineTokenizer } from './infrastructure/tokenizers/PapaLineTokenizer.js';
