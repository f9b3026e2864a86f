import Papa from 'papaparse';

/** Delimiters tried by `detectDelimiter()`, in order of preference on a tie. */
export const CANDIDATE_DELIMITERS: readonly string[] = [',', ';', '\t', '|'];

/**
 * Guess the delimiter of a text sample: the candidate that splits the first
 * line into the most columns. Falls back to `','`.
 */
export function detectDelimiter(sample: string | Buffer, candidates: readonly string[] = CANDIDATE_DELIMITERS): string {
  const content = typeof sample === 'string' ? sample : sample.toString('utf-8');
  const firstLines = content.split('\n').slice(0, 5).join('\n');

  let bestDelimiter = ',';
  let maxColumns = 1;

  for (const delimiter of candidates) {
    const result = Papa.parse<string[]>(firstLines, { delimiter, header: false });
    const firstRow = result.data[0];
    if (firstRow && firstRow.length > maxColumns) {
      maxColumns = firstRow.length;
      bestDelimiter = delimiter;
    }
  }

  return bestDelimiter;
}
