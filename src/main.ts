import { readFileSync } from 'node:fs';
import * as url from 'node:url';
import { analyzeTiles, type SolverOptions } from './puzzle';
import { parseTiles } from './tiles';

export interface CliIo {
  readFile(path: string): string;
  log(...args: unknown[]): void;
  error(...args: unknown[]): void;
  debug(...args: unknown[]): void;
}

const USAGE = 'usage: mosaic <tiles-file> [--no-backjump] [--trace] [--debug]';

const defaultIo: CliIo = {
  readFile: path => readFileSync(path, 'utf8'),
  log: (...args) => console.log(...args),
  error: (...args) => console.error(...args),
  debug: (...args) => console.debug(...args)
};

interface CliArgs {
  file: string;
  options: SolverOptions;
}

function parseArgs(argv: readonly string[]): CliArgs | string {
  const options: SolverOptions = {};
  const files: string[] = [];

  for (const arg of argv) {
    switch (arg) {
      case '--no-backjump': options.backjumping = false; break;
      case '--trace':       options.trace = true; break;
      case '--debug':       options.debug = true; break;
      default:
        if (arg.startsWith('--')) return `unknown option ${arg}`;
        files.push(arg);
    }
  }

  if (files.length !== 1) return USAGE;
  return { file: files[0], options };
}

// Returns the process exit code
export function runCli(argv: readonly string[], io: CliIo = defaultIo): number {
  const args = parseArgs(argv);
  if (typeof args === 'string') {
    io.error(args);
    return 1;
  }

  try {
    const tiles = parseTiles(io.readFile(args.file));
    const result = analyzeTiles(tiles, { ...args.options, logger: io });
    if (!result) {
      io.error(`no arrangement of the ${tiles.length} tiles fits together`);
      return 1;
    }

    io.log(`corner product ${result.cornerProduct}`);
    io.log(`monsters ${result.monsters}`);
    io.log(`roughness ${result.roughness}`);
    if (result.trace) {
      io.log(`trace ${JSON.stringify(result.trace)}`);
    }
    return 0;
  } catch (err) {
    io.error(err instanceof Error ? err.message : String(err));
    return 1;
  }
}

if (import.meta.url.startsWith('file:')) {
  const modulePath = url.fileURLToPath(import.meta.url);
  if (process.argv[1] === modulePath) {
    process.exitCode = runCli(process.argv.slice(2));
  }
}
