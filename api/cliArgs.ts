import { ConfigurationError } from './services/errors';

export type CliArgs = {
  file?: string;
  threshold?: number;
  topK?: number;
  status: boolean;
}

function numericFlag(name: string, raw: string): number {
  const value = Number(raw);
  if (raw.trim() === '' || !Number.isFinite(value)) {
    throw new ConfigurationError(`--${name} expects a number, got "${raw}"`);
  }
  return value;
}

export function parseCliArgs(argv: string[]): CliArgs {
  const args: CliArgs = { status: false };

  for (const arg of argv) {
    if (arg === '--status') {
      args.status = true;
    } else if (arg.startsWith('--threshold=')) {
      args.threshold = numericFlag('threshold', arg.slice('--threshold='.length));
    } else if (arg.startsWith('--top-k=')) {
      args.topK = numericFlag('top-k', arg.slice('--top-k='.length));
    } else if (arg.startsWith('--')) {
      throw new ConfigurationError(`Unknown option ${arg}`);
    } else {
      args.file = arg;
    }
  }

  return args;
}
