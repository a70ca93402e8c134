import { ReportError } from '../domain/errors.js';
import type { ReportGenerators, ReportKind } from '../infra/reports/index.js';
import { logger } from '../infra/logger.js';

export const REPORT_FAILED_MESSAGE = 'Failed to execute the report.';
export const REPORT_EMPTY_MESSAGE = 'Report finished with no output.';

/**
 * ReportService - runs the generator registered for a report kind
 */
export class ReportService {
  constructor(private generators: ReportGenerators) {}

  /**
   * Returns the report text verbatim, or a fixed note when the generator printed nothing.
   * Throws ReportError on failure.
   */
  async run(kind: ReportKind): Promise<string> {
    const generator = this.generators[kind];
    logger.info('Running report', { kind, generator: generator.describe() });

    let output: string;
    try {
      output = await generator.generate();
    } catch (error) {
      logger.error('Report failed', { kind, error });
      throw error instanceof ReportError
        ? error
        : new ReportError('Report generator failed', kind, { error });
    }

    return output.trim().length > 0 ? output : REPORT_EMPTY_MESSAGE;
  }
}
