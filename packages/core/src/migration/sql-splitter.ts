/**
 * @module migration/sql-splitter
 * Splits a T-SQL script into the batches `sqlcmd` would send.
 *
 * `GO` is a client-side separator, so a script containing it cannot be
 * sent to the server as one request. A line is a separator when it holds
 * only `GO` (any case), optionally followed by a repeat count. Lines
 * inside a `/* ... *\/` block comment or a multi-line string literal are
 * never separators.
 */

/**
 * One batch of a split script.
 */
export interface SqlBatch {
  Text: string;

  /** How many times `GO n` asked for the batch to run */
  Repeat: number;

  /** 1-based line of the script the batch starts on */
  Line: number;
}

/** Where a line ends: in plain code, inside a block comment, or inside a string literal */
type LineState = 'code' | 'block-comment' | 'string';

const SEPARATOR = /^\s*GO(?:\s+(\d+))?\s*(?:--.*)?$/i;

/**
 * Splits a script on `GO` lines. Batches holding only whitespace are dropped.
 *
 * @example
 * ```typescript
 * SplitSqlBatches('CREATE TABLE [T] ([Id] INT);\nGO\nINSERT INTO [T] VALUES (1);');
 * // [
 * //   { Text: 'CREATE TABLE [T] ([Id] INT);', Repeat: 1, Line: 1 },
 * //   { Text: 'INSERT INTO [T] VALUES (1);', Repeat: 1, Line: 3 },
 * // ]
 * ```
 */
export function SplitSqlBatches(script: string): SqlBatch[] {
  const lines = script.split(/\r?\n/);
  const batches: SqlBatch[] = [];

  let pending: string[] = [];
  let startLine = 1;
  let state: LineState = 'code';

  const flush = (repeat: number, nextLine: number): void => {
    const text = pending.join('\n').trim();
    if (text.length > 0) {
      batches.push({ Text: text, Repeat: repeat, Line: startLine });
    }
    pending = [];
    startLine = nextLine;
  };

  lines.forEach((line, index) => {
    const separator = state === 'code' ? SEPARATOR.exec(line) : null;

    if (separator) {
      flush(separator[1] ? Number(separator[1]) : 1, index + 2);
      return;
    }

    if (pending.length === 0 && line.trim().length === 0) {
      startLine = index + 2;
      return;
    }

    pending.push(line);
    state = scanLine(line, state);
  });

  flush(1, lines.length + 1);
  return batches;
}

/**
 * Tracks block comments and string literals through one line. Markers
 * inside a string or after a `--` comment are ignored; `''` inside a
 * string is an escaped quote.
 */
function scanLine(line: string, startState: LineState): LineState {
  let state = startState;

  for (let i = 0; i < line.length; i++) {
    const pair = line.slice(i, i + 2);

    if (state === 'block-comment') {
      if (pair === '*/') {
        state = 'code';
        i++;
      }
    } else if (state === 'string') {
      if (line[i] === "'") state = 'code';
    } else if (line[i] === "'") {
      state = 'string';
    } else if (pair === '--') {
      break;
    } else if (pair === '/*') {
      state = 'block-comment';
      i++;
    }
  }

  return state;
}
