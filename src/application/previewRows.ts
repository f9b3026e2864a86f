import type { Row } from '../domain/model/Row.js';
import { RecordFormatError, RowShapeError } from '../domain/errors/ReaderErrors.js';
import type { ReaderConfig } from './ReaderConfig.js';
import { withRows } from '../scopedRows.js';

/** A record that could not become a row during a preview. */
export interface RejectedRecord {
  readonly recordNumber: number;
  readonly error: RowShapeError | RecordFormatError;
}

/** Result of `previewRows()`. */
export interface PreviewResult {
  readonly fields: readonly string[];
  readonly rows: readonly Row[];
  readonly rejected: readonly RejectedRecord[];
  /** `true` when the source ended before `maxRows` rows were read. */
  readonly complete: boolean;
}

/**
 * Read the header and up to `maxRows` rows, then release the source.
 *
 * Records that fail with `RowShapeError` or `RecordFormatError` are collected
 * in `rejected` and do not count towards `maxRows`. Other errors propagate.
 */
export function previewRows(locator: string, maxRows = 10, config?: ReaderConfig): PreviewResult {
  return withRows(
    locator,
    (producer, shape) => {
      const rows: Row[] = [];
      const rejected: RejectedRecord[] = [];
      let complete = false;

      while (rows.length < maxRows) {
        try {
          const result = producer.next();
          if (result.done) {
            complete = true;
            break;
          }
          rows.push(result.value);
        } catch (error) {
          if (error instanceof RowShapeError || error instanceof RecordFormatError) {
            rejected.push({ recordNumber: error.recordNumber, error });
            continue;
          }
          throw error;
        }
      }

      return { fields: shape.fields, rows, rejected, complete };
    },
    config,
  );
}
