/**
 * Pluggable report backends
 * The bot only sees text; how the report is produced stays behind this interface
 */

export type ReportKind = 'latest' | 'weekly_expense';

export interface ReportGenerator {
  readonly kind: ReportKind;

  /** Produce the report text; rejects with ReportError */
  generate(): Promise<string>;

  /** Short name for logs */
  describe(): string;
}
