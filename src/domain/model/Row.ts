import type { RowShape } from './RowShape.js';

/**
 * One data record: a fixed-arity tuple of string values aligned with a `RowShape`,
 * addressable by position and by field name.
 *
 * Rows are frozen and carry no identity beyond their values. Construct them
 * through `RowShape.createRow()`, which enforces the arity.
 */
export class Row<F extends string = string> implements Iterable<string> {
  readonly shape: RowShape<F>;
  private readonly values: readonly string[];

  /** @internal */
  constructor(shape: RowShape<F>, values: readonly string[]) {
    this.shape = shape;
    this.values = Object.freeze([...values]);
    Object.freeze(this);
  }

  get length(): number {
    return this.values.length;
  }

  get fields(): readonly F[] {
    return this.shape.fields;
  }

  /** Value at a position. Negative indices count from the end. */
  at(index: number): string | undefined {
    return this.values.at(index);
  }

  /** Value of a named field. Throws on a name the shape does not define. */
  get(field: F): string {
    const index = this.shape.indexOf(field);
    const value = this.values[index];
    if (index < 0 || value === undefined) {
      throw new RangeError(`Unknown field "${field}". Known fields: ${this.shape.fields.join(', ')}`);
    }
    return value;
  }

  toArray(): string[] {
    return [...this.values];
  }

  /** Field-name keyed copy of the values, in shape order. */
  toObject(): Readonly<Record<string, string>> {
    const entries = this.shape.fields.map((field, i) => [field, this.values[i] ?? ''] as const);
    return Object.freeze(Object.fromEntries(entries));
  }

  [Symbol.iterator](): Iterator<string> {
    return this.values[Symbol.iterator]();
  }
}
