import { describe, expect, it, vi } from 'vitest';
import {
  REPORT_EMPTY_MESSAGE,
  ReportService,
} from '../../../src/services/ReportService.js';
import { ReportError } from '../../../src/domain/errors.js';
import { createFakeReport } from '../../helpers/fakes.js';

const loggerMock = vi.hoisted(() => ({
  logger: {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  },
}));

vi.mock('../../../src/infra/logger.js', () => loggerMock);

describe('ReportService', () => {
  it('should run the generator registered for the kind', async () => {
    const latest = createFakeReport('latest', 'latest body');
    const weekly = createFakeReport('weekly_expense', 'weekly body');
    const service = new ReportService({ latest, weekly_expense: weekly });

    await expect(service.run('weekly_expense')).resolves.toBe('weekly body');
    expect(weekly.generate).toHaveBeenCalledTimes(1);
    expect(latest.generate).not.toHaveBeenCalled();
  });

  it('should keep output exactly as produced', async () => {
    const service = new ReportService({
      latest: createFakeReport('latest', '  Month | Income\n  202610 | 10.00\n'),
      weekly_expense: createFakeReport('weekly_expense', ''),
    });

    await expect(service.run('latest')).resolves.toBe('  Month | Income\n  202610 | 10.00\n');
  });

  it('should replace blank output with a note', async () => {
    const service = new ReportService({
      latest: createFakeReport('latest', ' \n\t'),
      weekly_expense: createFakeReport('weekly_expense', ''),
    });

    await expect(service.run('latest')).resolves.toBe(REPORT_EMPTY_MESSAGE);
  });

  it('should wrap unexpected failures in ReportError', async () => {
    const service = new ReportService({
      latest: createFakeReport('latest', new Error('boom')),
      weekly_expense: createFakeReport('weekly_expense', ''),
    });

    await expect(service.run('latest')).rejects.toMatchObject({
      code: 'REPORT_ERROR',
      kind: 'latest',
      message: 'Report generator failed',
    });
  });

  it('should pass ReportError through unchanged', async () => {
    const failure = new ReportError('Report script exited with code 1', 'weekly_expense');
    const service = new ReportService({
      latest: createFakeReport('latest', ''),
      weekly_expense: createFakeReport('weekly_expense', failure),
    });

    await expect(service.run('weekly_expense')).rejects.toBe(failure);
  });
});
