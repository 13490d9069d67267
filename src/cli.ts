export interface CommandInfo {
  id: number;
  name: string;
  command: string;
}

export type CliAction =
  | { kind: 'run'; commands: CommandInfo[] }
  | { kind: 'page'; name: string; end?: number; size?: number }
  | { kind: 'search'; name: string; pattern: string }
  | { kind: 'count'; name: string }
  | { kind: 'clear'; name: string }
  | { kind: 'help' }
  | { kind: 'invalid'; message: string };

export const USAGE = `Usage:
  proclog run [name=]<command> ...   capture command output into <name>.log
  proclog page <name> [end] [size]   print history lines [end - size, end)
  proclog search <name> <pattern>    print history lines containing <pattern>
  proclog count <name>               print the number of history lines
  proclog clear <name>               truncate the history of <name>`;

export function parseArgs(args: string[] = process.argv.slice(2)): CliAction {
  const [subcommand, ...rest] = args;

  switch (subcommand) {
    case undefined:
    case '-h':
    case '--help':
    case 'help':
      return { kind: 'help' };
    case 'run':
      return { kind: 'run', commands: rest.map(parseCommand) };
    case 'page': {
      const [name, endArg, sizeArg] = rest;
      if (!name) {
        return { kind: 'invalid', message: 'page: missing stream name' };
      }
      const end = endArg === undefined ? undefined : parseIndex(endArg);
      const size = sizeArg === undefined ? undefined : parseIndex(sizeArg);
      if (end === null || size === null) {
        return { kind: 'invalid', message: 'page: end and size must be non-negative integers' };
      }
      return { kind: 'page', name, end, size };
    }
    case 'search': {
      const [name, pattern] = rest;
      if (!name || pattern === undefined) {
        return { kind: 'invalid', message: 'search: expected <name> <pattern>' };
      }
      return { kind: 'search', name, pattern };
    }
    case 'count':
    case 'clear': {
      const [name] = rest;
      if (!name) {
        return { kind: 'invalid', message: `${subcommand}: missing stream name` };
      }
      return { kind: subcommand, name };
    }
    default:
      return { kind: 'invalid', message: `unknown command: ${subcommand}` };
  }
}

function parseIndex(value: string): number | null {
  return /^\d+$/.test(value) ? Number(value) : null;
}

export function parseCommand(arg: string, index: number): CommandInfo {
  const equalsIndex = arg.indexOf('=');
  let command: string;
  let name: string;

  if (equalsIndex > 0 && equalsIndex < arg.length - 1) {
    name = unquote(arg.substring(0, equalsIndex).trim());
    command = unquote(arg.substring(equalsIndex + 1).trim());

    if (name.length === 0) {
      name = extractCommandName(command, index);
    }
  } else {
    command = arg;
    name = extractCommandName(command, index);
  }

  return {
    id: index,
    name,
    command
  };
}

function unquote(value: string): string {
  if (value.startsWith("'") && value.endsWith("'")) {
    return value.slice(1, -1);
  }
  if (value.startsWith('"') && value.endsWith('"')) {
    return value.slice(1, -1);
  }
  return value;
}

export function extractCommandName(command: string, index: number): string {
  const firstWord = command.trim().split(/\s+/)[0];
  const basename = firstWord.split('/').pop();
  return basename || `cmd${index}`;
}
