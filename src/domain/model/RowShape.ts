import { RowShapeError } from '../errors/ReaderErrors.js';
import { Row } from './Row.js';

/**
 * Ordered, validated field names derived once from a source's header line.
 *
 * Immutable; shared by every `Row` read within the same scope.
 */
export class RowShape<F extends string = string> {
  readonly fields: readonly F[];
  private readonly positions: ReadonlyMap<string, number>;

  /** @internal Use `normalizeHeader()` to build a validated shape from raw header cells. */
  constructor(fields: readonly F[]) {
    this.fields = Object.freeze([...fields]);
    this.positions = new Map(this.fields.map((field, i) => [field, i]));
    Object.freeze(this);
  }

  get arity(): number {
    return this.fields.length;
  }

  /** Position of a field, or `-1` when the shape has no such field. */
  indexOf(field: string): number {
    return this.positions.get(field) ?? -1;
  }

  has(field: string): field is F {
    return this.positions.has(field);
  }

  /**
   * Bind positional values to this shape.
   *
   * @param recordNumber - Source position reported by the error on an arity mismatch.
   * @throws {RowShapeError} When `values.length !== arity`.
   */
  createRow(values: readonly string[], recordNumber?: number): Row<F> {
    if (values.length !== this.fields.length) {
      throw new RowShapeError(this.fields.length, values.length, recordNumber);
    }
    return new Row(this, values);
  }
}
