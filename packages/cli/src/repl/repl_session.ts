/**
 * ReplSession - the operator prompt
 *
 * Reads one line at a time and dispatches it to the coordinator. Each command
 * is awaited until its launch, never until the child exits, so `kill`,
 * `restart` and `quit` stay available while a command hangs. Results arrive
 * asynchronously through the reporter.
 */

import { createInterface } from 'readline';
import type { Interface } from 'readline';
import { Logger } from '@watchrun/core';
import type { ExecutionCoordinator } from '@watchrun/core';
import { formatStatus } from './console_reporter';
import { HELP_TEXT, PROMPT, parseReplLine } from './repl_parser';

export interface ReplSessionOptions {
  coordinator: ExecutionCoordinator.ExecutionCoordinator;
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
  /** Defaults to whether output is a TTY */
  terminal?: boolean;
}

type DispatchOutcome = 'continue' | 'quit';

export class ReplSession {
  private readonly coordinator: ExecutionCoordinator.ExecutionCoordinator;
  private readonly input: NodeJS.ReadableStream;
  private readonly output: NodeJS.WritableStream;
  private readonly terminal: boolean | undefined;
  private readonly logger = Logger.createLogger('[ReplSession] ');
  private rl: Interface | null = null;
  private closed = false;

  constructor(options: ReplSessionOptions) {
    this.coordinator = options.coordinator;
    this.input = options.input;
    this.output = options.output;
    this.terminal = options.terminal;
  }

  /**
   * Runs until `quit`/`exit`, end of input or close(). The coordinator is shut
   * down before this resolves.
   *
   * @returns the process exit code
   */
  async run(): Promise<number> {
    const rl = createInterface({
      input: this.input,
      output: this.output,
      prompt: PROMPT,
      terminal: this.terminal,
    });
    this.rl = rl;
    this.closed = false;
    rl.on('close', () => {
      this.closed = true;
    });
    // Ctrl-C at the prompt leaves like quit
    rl.on('SIGINT', () => this.close());

    this.showPrompt();
    try {
      for await (const line of rl) {
        const outcome = await this.dispatch(line);
        if (outcome === 'quit') break;
        this.showPrompt();
      }
    } finally {
      this.close();
      this.rl = null;
    }

    await this.coordinator.shutdown();
    return 0;
  }

  /** Ends the read loop; run() then shuts the coordinator down */
  close(): void {
    if (this.rl && !this.closed) {
      this.rl.close();
    }
  }

  /**
   * Executes one line. Errors are reported to the operator and never end the
   * session.
   */
  async dispatch(line: string): Promise<DispatchOutcome> {
    const command = parseReplLine(line);

    try {
      switch (command.kind) {
        case 'empty':
          break;
        case 'start':
          await this.coordinator.startCommand(command.command);
          break;
        case 'apply':
          await this.coordinator.applyArguments(command.args);
          break;
        case 'kill':
          await this.coordinator.terminateProcess();
          break;
        case 'restart':
          await this.coordinator.restart();
          break;
        case 'status':
          this.output.write(formatStatus(this.coordinator.getStatus()));
          break;
        case 'help':
          this.output.write(`${HELP_TEXT}\n`);
          break;
        case 'quit':
          return 'quit';
        case 'invalid':
          this.output.write(`invalid option: ${command.token}\n`);
          break;
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.debug(`"${line}" failed:`, error);
      this.output.write(`${message}\n`);
    }

    return 'continue';
  }

  private showPrompt(): void {
    this.coordinator.enterPrompt();
    this.rl?.prompt();
  }
}
