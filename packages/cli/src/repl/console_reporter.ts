import type { ExecutionCoordinator } from '@watchrun/core';

/**
 * Operator-facing rendering of one execution:
 *
 *   $ <command line>
 *   <stdout>
 *   <stderr>
 *   terminated with error
 *
 * Every run after the first is preceded by a blank line.
 */
export function formatResult(report: ExecutionCoordinator.ExecutionReport): string {
  const { result } = report;
  const lines: string[] = [];

  if (!report.firstRun) lines.push('');
  lines.push(`$ ${result.commandLine}`);
  if (result.stdout) lines.push(result.stdout);
  if (result.stderr) lines.push(result.stderr);
  if (result.error) lines.push(result.error);
  if (result.signal) lines.push(`stopped by ${result.signal}`);
  if (result.failed) lines.push('terminated with error');

  return `${lines.join('\n')}\n`;
}

export function formatStatus(status: ExecutionCoordinator.CoordinatorStatus): string {
  const processState = status.running ? `running (pid ${status.pid ?? '?'})` : 'idle';
  const lines = [
    `phase: ${status.phase}`,
    `command: ${status.commandLine ?? '(none)'}`,
    `monitoring: ${status.monitoredDirs.join(', ')} (${status.watching ? 'watching' : 'stopped'})`,
    `latency: ${status.latencyMs}ms`,
    `process: ${processState}`,
    `pending change: ${status.debouncePending ? 'yes' : 'no'}`,
    `executions: ${status.executionCount}`,
  ];
  return `${lines.join('\n')}\n`;
}

/**
 * Writes results and notices to the REPL's output stream.
 */
export class ConsoleReporter implements ExecutionCoordinator.ExecutionReporter {
  private readonly output: NodeJS.WritableStream;

  constructor(output: NodeJS.WritableStream) {
    this.output = output;
  }

  onResult(report: ExecutionCoordinator.ExecutionReport): void {
    this.output.write(formatResult(report));
  }

  onChangeNotice(path: string | null): void {
    this.output.write(`file changed: ${path ?? '(unknown)'}\n`);
  }

  onNotice(message: string): void {
    this.output.write(`${message}\n`);
  }
}
