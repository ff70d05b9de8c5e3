/**
 * Severity level for a diagnostic.
 */
export type DiagnosticSeverity = 'error' | 'warning' | 'info';

/**
 * A toolchain diagnostic (error/warning/info) with an optional source location.
 *
 * Diagnostics have stable IDs so downstream tooling can rely on them.
 */
export interface Diagnostic {
  /** Stable diagnostic identifier (e.g., `TPC100`). */
  id: DiagnosticId;
  severity: DiagnosticSeverity;
  message: string;
  file: string;
  /** 1-based line number, when known. */
  line?: number;
  /** 1-based column number, when known. */
  column?: number;
  /** 0-based instruction index in the token sequence, when the diagnostic is tied to one. */
  index?: number;
}

/**
 * Known diagnostic IDs.
 */
export const DiagnosticIds = {
  /** Unknown/unclassified diagnostic. */
  Unknown: 'TPC000',

  /** Failed to read a source file from disk. */
  IoReadFailed: 'TPC001',

  /** Internal error in the front end (unexpected exception). */
  InternalParseError: 'TPC002',

  /** A `]` with no open `[` before it. */
  UnmatchedLoopEnd: 'TPC100',

  /** A `[` still open at end of input. */
  UnmatchedLoopStart: 'TPC101',

  /** An option value outside its accepted range. */
  InvalidOption: 'TPC200',

  /** Internal error during lowering. */
  EmitError: 'TPC300',

  /** The tape pointer moved outside the tape. */
  TapeBoundsExceeded: 'TPC400',

  /** A read was attempted at end of input under the `error` EOF policy. */
  InputExhausted: 'TPC401',

  /** Writing a byte to the output stream failed. */
  IoWriteFailed: 'TPC402',

  /** Reading a byte from the program's input stream failed. */
  InputReadFailed: 'TPC403',
} as const;

/**
 * Union type of all defined diagnostic IDs.
 */
export type DiagnosticId = (typeof DiagnosticIds)[keyof typeof DiagnosticIds];

/**
 * True when any diagnostic in the list is an error.
 */
export function hasErrors(diagnostics: Diagnostic[]): boolean {
  return diagnostics.some((d) => d.severity === 'error');
}
