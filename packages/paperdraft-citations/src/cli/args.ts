import type { TransportMode } from '../config.js';

export interface CliArgs {
  showHelp: boolean;
  showVersion: boolean;
  transport?: TransportMode;
  stateDir?: string;
}

const TRANSPORT_OPTIONS: TransportMode[] = ['stdio', 'http', 'both'];
const TRANSPORT_SET = new Set<string>(TRANSPORT_OPTIONS);

const isTransportMode = (value: string): value is TransportMode => TRANSPORT_SET.has(value);

const parseTransport = (value: string): TransportMode => {
  const normalized = value.trim().toLowerCase();

  if (!isTransportMode(normalized)) {
    throw new Error(
      `Invalid transport "${value}". Expected one of: ${TRANSPORT_OPTIONS.join(', ')}.`
    );
  }

  return normalized;
};

export const CLI_USAGE = `paperdraft-citations: citation store and bibliography service

Usage:
  paperdraft-citations [--transport <stdio|http|both>] [--state-dir <path>]
  paperdraft-citations --help
  paperdraft-citations --version

Options:
  --transport <mode>  Override PAPERDRAFT_TRANSPORT for this run
                      (stdio: MCP tools, http: REST API, both: MCP and REST)
  --state-dir <path>  Override PAPERDRAFT_STATE_DIR, where relative save/load paths resolve
  -h, --help          Show help
  -v, --version       Print package version`;

type ValueOption = 'transport' | 'state-dir';

const VALUE_OPTIONS: ValueOption[] = ['transport', 'state-dir'];

const applyOption = (args: CliArgs, option: ValueOption, value: string): void => {
  switch (option) {
    case 'transport':
      args.transport = parseTransport(value);
      return;
    case 'state-dir': {
      const trimmed = value.trim();
      if (!trimmed) {
        throw new Error('Empty value for --state-dir.');
      }
      args.stateDir = trimmed;
      return;
    }
  }
};

export const parseCliArgs = (argv: string[]): CliArgs => {
  const args: CliArgs = {
    showHelp: false,
    showVersion: false
  };

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index]?.trim();

    if (!arg) {
      continue;
    }

    if (arg === '-h' || arg === '--help') {
      args.showHelp = true;
      continue;
    }

    if (arg === '-v' || arg === '--version') {
      args.showVersion = true;
      continue;
    }

    const option = VALUE_OPTIONS.find((name) => arg === `--${name}` || arg.startsWith(`--${name}=`));
    if (option) {
      if (arg === `--${option}`) {
        const nextValue = argv[index + 1];
        if (!nextValue) {
          throw new Error(`Missing value after --${option}.`);
        }
        applyOption(args, option, nextValue);
        index += 1;
      } else {
        applyOption(args, option, arg.slice(`--${option}=`.length));
      }
      continue;
    }

    throw new Error(`Unknown argument "${arg}".`);
  }

  return args;
};
