import { logger as defaultLogger, type Logger, type LogMeta } from './logger.js';

export type DiagnosticSeverity = 'warning' | 'error';

export type DiagnosticCode =
  | 'UNKNOWN_QUALITY'
  | 'UNKNOWN_LOCATION'
  | 'DUPLICATE_LOCATION'
  | 'DUPLICATE_QUALITY'
  | 'DUPLICATE_QUALITY_REF'
  | 'UNKNOWN_OPERATOR'
  | 'UNPARSEABLE_OPERATOR_VALUE'
  | 'EXCLUSIVE_EFFECT_OPERATORS'
  | 'MISSING_DEFAULT_OUTCOME'
  | 'ORPHAN_RARE_OUTCOME'
  | 'INVALID_CHANCE'
  | 'MISSING_FIELDS'
  | 'UNKNOWN_FIELDS'
  | 'PARENT_MISMATCH';

export interface Diagnostic {
  severity: DiagnosticSeverity;
  code: DiagnosticCode;
  message: string;
  path?: string;
  context?: LogMeta;
}

/** Receives data-integrity findings. Findings never interrupt loading or resolution. */
export interface DiagnosticSink {
  report(diagnostic: Diagnostic): void;
}

export class LoggerDiagnosticSink implements DiagnosticSink {
  constructor(private readonly logger: Logger = defaultLogger) {}

  report(diagnostic: Diagnostic): void {
    const meta: LogMeta = { code: diagnostic.code, path: diagnostic.path, ...diagnostic.context };
    if (diagnostic.severity === 'error') {
      this.logger.error(diagnostic.message, meta);
    } else {
      this.logger.warn(diagnostic.message, meta);
    }
  }
}

export class CollectingDiagnosticSink implements DiagnosticSink {
  readonly diagnostics: Diagnostic[] = [];

  report(diagnostic: Diagnostic): void {
    this.diagnostics.push(diagnostic);
  }

  codes(): DiagnosticCode[] {
    return this.diagnostics.map((d) => d.code);
  }

  clear() {
    this.diagnostics.length = 0;
  }
}

export const logDiagnostics: DiagnosticSink = new LoggerDiagnosticSink();
