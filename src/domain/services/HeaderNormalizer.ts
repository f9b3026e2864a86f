import { SchemaError } from '../errors/ReaderErrors.js';
import { RowShape } from '../model/RowShape.js';

const IDENTIFIER = /^[\p{ID_Start}$_][\p{ID_Continue}$\u200C\u200D]*$/u;

// ECMAScript reserved words, including the strict-mode and literal ones.
const RESERVED_WORDS: ReadonlySet<string> = new Set([
  'await', 'break', 'case', 'catch', 'class', 'const', 'continue', 'debugger', 'default',
  'delete', 'do', 'else', 'enum', 'export', 'extends', 'false', 'finally', 'for',
  'function', 'if', 'implements', 'import', 'in', 'instanceof', 'interface', 'let', 'new',
  'null', 'package', 'private', 'protected', 'public', 'return', 'static', 'super',
  'switch', 'this', 'throw', 'true', 'try', 'typeof', 'var', 'void', 'while', 'with',
  'yield',
]);

/** Strip a BOM, trim, and turn interior whitespace and hyphens into underscores. */
export function normalizeFieldName(raw: string): string {
  return raw
    .replace(/^\uFEFF/, '')
    .trim()
    .replace(/[\s-]/g, '_');
}

/** Whether a name can be used as a field name. */
export function isValidFieldName(name: string): boolean {
  return IDENTIFIER.test(name) && !RESERVED_WORDS.has(name);
}

/**
 * Derive a row shape from the raw cells of a header line.
 *
 * @param header - Tokenized first record, or `undefined` when the source had none.
 * @throws {SchemaError} When the header is missing, or a name is empty, not an identifier, or duplicated.
 *
 * @example
 * ```typescript
 * normalizeHeader(['First Name', 'Last-Name', ' ID ']).fields; // ['First_Name', 'Last_Name', 'ID']
 * ```
 */
export function normalizeHeader(header: readonly string[] | undefined): RowShape {
  if (header === undefined || header.length === 0) {
    throw new SchemaError('MISSING_HEADER', 'Source is empty: no header line to derive field names from');
  }

  const fields: string[] = [];
  const seen = new Map<string, number>();

  header.forEach((raw, column) => {
    const field = normalizeFieldName(raw);

    if (field === '') {
      throw new SchemaError('EMPTY_FIELD', `Header column ${column} has an empty name`, { column });
    }
    if (!isValidFieldName(field)) {
      throw new SchemaError('INVALID_IDENTIFIER', `Header column ${column} ("${raw}") is not a valid identifier`, {
        field,
        column,
      });
    }

    const previous = seen.get(field);
    if (previous !== undefined) {
      throw new SchemaError(
        'DUPLICATE_FIELD',
        `Header columns ${previous} and ${column} both normalize to "${field}"`,
        { field, column },
      );
    }

    seen.set(field, column);
    fields.push(field);
  });

  return new RowShape(fields);
}
