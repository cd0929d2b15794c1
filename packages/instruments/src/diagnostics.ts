import { getLogger, type Logger } from '@refdata/logger';

export type DiagnosticCode = 'UNHANDLED_CONTRACT_TYPE' | 'UNRECOGNIZED_FILTER' | 'DUPLICATE_KEY';

export interface Diagnostic {
  code: DiagnosticCode;
  level: 'info' | 'warn';
  message: string;
  context?: Record<string, unknown> | undefined;
}

/**
 * Collects recoverable conditions raised while normalizing and serializing.
 *
 * Every accepted diagnostic is logged and kept for inspection. `reportOnce`
 * suppresses a diagnostic whose exact message text was already emitted,
 * for as long as the sink lives (one parse run).
 */
export class DiagnosticSink {
  private readonly emittedOnce = new Set<string>();
  private readonly recorded: Diagnostic[] = [];

  constructor(private readonly logger: Logger = getLogger('diagnostics')) {}

  get diagnostics(): readonly Diagnostic[] {
    return this.recorded;
  }

  report(diagnostic: Diagnostic): void {
    this.recorded.push(diagnostic);
    const context = diagnostic.context ?? {};
    if (diagnostic.level === 'warn') {
      this.logger.warn(context, diagnostic.message);
    } else {
      this.logger.info(context, diagnostic.message);
    }
  }

  /**
   * @returns false when the message was suppressed
   */
  reportOnce(diagnostic: Diagnostic): boolean {
    if (this.emittedOnce.has(diagnostic.message)) {
      return false;
    }
    this.emittedOnce.add(diagnostic.message);
    this.report(diagnostic);
    return true;
  }

  count(code?: DiagnosticCode): number {
    return code ? this.recorded.filter((d) => d.code === code).length : this.recorded.length;
  }

  reset(): void {
    this.emittedOnce.clear();
    this.recorded.length = 0;
  }
}
