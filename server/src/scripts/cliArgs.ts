export const USAGE = 'Usage: scrape-eater <url...> [--concurrency N] [--dry-run] [--tsv FILE]';

export interface CliArgs {
  urls: string[];
  concurrency?: number;
  dryRun: boolean;
  tsv?: string;
}

function valueOf(argv: string[], i: number, name: string): string {
  const v = argv[i + 1];
  if (v === undefined || v.startsWith('--')) throw new Error(`--${name} needs a value`);
  return v;
}

export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { urls: [], dryRun: false };
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (a === '--dry-run') {
      args.dryRun = true;
    } else if (a === '--concurrency' || a === '-c') {
      args.concurrency = Number(valueOf(argv, i, 'concurrency'));
      i++;
    } else if (a.startsWith('--concurrency=')) {
      args.concurrency = Number(a.split('=')[1]);
    } else if (a === '--tsv') {
      args.tsv = valueOf(argv, i, 'tsv');
      i++;
    } else if (a.startsWith('--tsv=')) {
      args.tsv = a.slice('--tsv='.length);
    } else if (a.startsWith('--')) {
      throw new Error(`Unknown flag ${a}`);
    } else {
      args.urls.push(a);
    }
  }
  if (args.concurrency !== undefined && (!Number.isInteger(args.concurrency) || args.concurrency < 1)) {
    throw new Error('--concurrency must be a positive integer');
  }
  return args;
}
