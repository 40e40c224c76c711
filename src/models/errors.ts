// ── Fatal errors ─────────────────────────────────────────────────────

export type GeneratorErrorCode =
  | 'MISSING_INPUT_DOCUMENT'
  | 'MALFORMED_INPUT_DOCUMENT'
  | 'INVALID_CONFIG'
  | 'INVALID_COLLECTION';

export class GeneratorError extends Error {
  constructor(
    readonly code: GeneratorErrorCode,
    message: string,
    readonly details: string[] = [],
  ) {
    super(message);
    this.name = 'GeneratorError';
  }
}

export function isGeneratorError(e: unknown): e is GeneratorError {
  return e instanceof GeneratorError;
}

// ── Degradations ─────────────────────────────────────────────────────
// Recorded while generating and never thrown: output is always produced.

export type DiagnosticCode =
  | 'unresolvable-reference'
  | 'unsupported-reference-kind'
  | 'unsupported-schema-shape'
  | 'depth-limit-reached'
  | 'malformed-operation';

export interface Diagnostic {
  code: DiagnosticCode;
  /** The reference, type name or operation the diagnostic is about. */
  subject: string;
  message: string;
}

export type DiagnosticSink = (diagnostic: Diagnostic) => void;

/** Collects diagnostics, keeping the first of each (code, subject) pair. */
export class DiagnosticCollector {
  private readonly _seen = new Set<string>();
  private readonly _items: Diagnostic[] = [];

  readonly report: DiagnosticSink = (diagnostic) => {
    const key = `${diagnostic.code}\u0000${diagnostic.subject}`;
    if (this._seen.has(key)) return;
    this._seen.add(key);
    this._items.push(diagnostic);
  };

  get diagnostics(): readonly Diagnostic[] {
    return this._items;
  }
}
