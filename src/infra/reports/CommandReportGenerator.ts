import { spawn } from 'node:child_process';
import { ReportError } from '../../domain/errors.js';
import { logger } from '../logger.js';
import type { ReportGenerator, ReportKind } from './ReportGenerator.js';

export type CommandLine = {
  file: string;
  args: string[];
};

/**
 * Splits a configured command line on whitespace, honoring single and double quotes.
 * No shell is involved, so no expansion happens.
 */
export function parseCommandLine(commandLine: string): CommandLine | null {
  const parts: string[] = [];
  for (const match of commandLine.matchAll(/"([^"]*)"|'([^']*)'|(\S+)/g)) {
    parts.push(match[1] ?? match[2] ?? match[3] ?? '');
  }
  const [file, ...args] = parts;
  if (!file) return null;
  return { file, args };
}

/**
 * Runs an external script and returns its combined stdout/stderr.
 * Exit code 0 resolves; a non-zero exit, a spawn failure or the timeout rejects.
 */
export class CommandReportGenerator implements ReportGenerator {
  private command: CommandLine;

  constructor(
    readonly kind: ReportKind,
    private commandLine: string,
    private timeoutMs: number
  ) {
    const parsed = parseCommandLine(commandLine);
    if (!parsed) {
      throw new ReportError('Report command is empty', kind, { commandLine });
    }
    this.command = parsed;
  }

  describe(): string {
    return `command:${this.commandLine}`;
  }

  generate(): Promise<string> {
    const { file, args } = this.command;

    return new Promise((resolve, reject) => {
      let output = '';
      const child = spawn(file, args, {
        stdio: ['ignore', 'pipe', 'pipe'],
        timeout: this.timeoutMs,
      });

      child.stdout.setEncoding('utf8');
      child.stderr.setEncoding('utf8');
      child.stdout.on('data', (chunk: string) => {
        output += chunk;
      });
      child.stderr.on('data', (chunk: string) => {
        output += chunk;
      });

      child.on('error', (error) => {
        reject(new ReportError('Failed to start report script', this.kind, { file, error }));
      });

      child.on('close', (code, signal) => {
        if (code === 0) {
          logger.debug('Report script finished', { kind: this.kind, bytes: output.length });
          resolve(output);
          return;
        }
        reject(
          new ReportError(
            signal
              ? `Report script terminated by ${signal}`
              : `Report script exited with code ${String(code)}`,
            this.kind,
            { file, code, signal, output }
          )
        );
      });
    });
  }
}
