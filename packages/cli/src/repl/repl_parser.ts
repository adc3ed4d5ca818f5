/**
 * One operator line, classified by its first whitespace-delimited token
 * (case-sensitive). The rest of the line is the command's value.
 */
export type ReplCommand =
  | { kind: 'start'; command: string }
  | { kind: 'apply'; args: string }
  | { kind: 'kill' }
  | { kind: 'restart' }
  | { kind: 'status' }
  | { kind: 'help' }
  | { kind: 'quit' }
  | { kind: 'empty' }
  | { kind: 'invalid'; token: string };

export const PROMPT = 'watchrun> ';

export const HELP_TEXT = [
  'commands:',
  '  start <command...>  set the command, start monitoring and run it',
  '  apply <args...>     replace the arguments and run now',
  '  kill                stop the running process and monitoring',
  '  restart             kill, then monitor and run the current command',
  '  status              show the session state',
  '  help                show this list',
  '  quit | exit         stop everything and leave',
].join('\n');

export function parseReplLine(line: string): ReplCommand {
  const trimmed = line.trim();
  if (trimmed.length === 0) {
    return { kind: 'empty' };
  }

  const match = /^(\S+)\s*([\s\S]*)$/.exec(trimmed);
  const token = match?.[1] ?? trimmed;
  const value = (match?.[2] ?? '').trim();

  switch (token) {
    case 'start':
      return { kind: 'start', command: value };
    case 'apply':
      return { kind: 'apply', args: value };
    case 'kill':
      return { kind: 'kill' };
    case 'restart':
      return { kind: 'restart' };
    case 'status':
      return { kind: 'status' };
    case 'help':
      return { kind: 'help' };
    case 'quit':
    case 'exit':
      return { kind: 'quit' };
    default:
      return { kind: 'invalid', token };
  }
}
