/** Emitted once the resource is open, before the header is read. */
export interface ReaderOpenedEvent {
  readonly type: 'reader:opened';
  readonly locator: string;
  readonly delimiter: string;
  readonly timestamp: number;
}

/** Emitted when the header line has been normalized into a row shape. */
export interface HeaderParsedEvent {
  readonly type: 'reader:header-parsed';
  readonly locator: string;
  /** Raw header cells as tokenized. */
  readonly rawHeader: readonly string[];
  /** Normalized field names. */
  readonly fields: readonly string[];
  readonly timestamp: number;
}

/** Emitted when opening fails. The resource, if it was opened, has already been released. */
export interface ReaderOpenFailedEvent {
  readonly type: 'reader:open-failed';
  readonly locator: string;
  readonly error: string;
  readonly timestamp: number;
}

/** Emitted for each record that could not become a row (arity mismatch or malformed record). */
export interface RowRejectedEvent {
  readonly type: 'reader:row-rejected';
  readonly locator: string;
  /** One-based record number, the header being record 1. */
  readonly recordNumber: number;
  readonly error: string;
  readonly timestamp: number;
}

/** Emitted the first time the row sequence reports end of data. */
export interface ReaderExhaustedEvent {
  readonly type: 'reader:exhausted';
  readonly locator: string;
  readonly rowCount: number;
  readonly rejectedCount: number;
  readonly timestamp: number;
}

/** Emitted once when the resource is released, whatever the exit path. */
export interface ReaderClosedEvent {
  readonly type: 'reader:closed';
  readonly locator: string;
  readonly rowCount: number;
  readonly rejectedCount: number;
  /** `false` when the scope was left before the end of data. */
  readonly exhausted: boolean;
  readonly timestamp: number;
}

/** Discriminated union of all reader events. */
export type DomainEvent =
  | ReaderOpenedEvent
  | HeaderParsedEvent
  | ReaderOpenFailedEvent
  | RowRejectedEvent
  | ReaderExhaustedEvent
  | ReaderClosedEvent;

/** String literal union of all event type names. */
export type EventType = DomainEvent['type'];

/** Extract the payload type for a specific event type. */
export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;
