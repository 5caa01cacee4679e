export interface CliArgs {
  prompt: string;
  outDir: string;
  saveState?: string;
  help: boolean;
}

export const USAGE = `Usage: forgeloop <prompt> [--out <dir>] [--save-state <file>]

Options:
  --out <dir>          Directory the generated project is written to (default: ./generated)
  --save-state <file>  Also write the final pipeline state as JSON
  -h, --help           Show this help`;

export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { prompt: '', outDir: 'generated', help: false };
  const words: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '-h':
      case '--help':
        args.help = true;
        break;
      case '--out':
      case '--save-state': {
        const value = argv[i + 1];
        if (value === undefined || value.startsWith('--')) {
          throw new Error(`Missing value for ${arg}`);
        }
        if (arg === '--out') {
          args.outDir = value;
        } else {
          args.saveState = value;
        }
        i++;
        break;
      }
      default:
        if (arg.startsWith('--')) {
          throw new Error(`Unknown option: ${arg}`);
        }
        words.push(arg);
    }
  }

  args.prompt = words.join(' ').trim();
  return args;
}
