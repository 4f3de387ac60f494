/**
 * Usage:
 *   npm run match -- [transcript.txt] [--threshold=0.8] [--top-k=5]
 *   npm run match -- --status
 *
 * Reads the transcript from the file, or from stdin when no file is given,
 * and prints the match report as JSON.
 */
import fs from 'fs/promises';
import { loadConfig } from './config';
import { loadEnv } from './env';
import { parseCliArgs } from './cliArgs';
import { errorMessage, isPipelineStageError } from './services/errors';
import { createMatcherRuntime } from './services/runtime';
import { catalogStatus, isCatalogNotReady, matchTranscript } from './services/testMatcher';
import type { Logger } from './types/matching';

// stdout carries the JSON report only
const progressLogger: Logger = { log: console.error, warn: console.warn, error: console.error };

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8');
}

async function main(argv: string[]): Promise<number> {
  loadEnv();
  const config = loadConfig();
  const args = parseCliArgs(argv);
  const runtime = createMatcherRuntime(config);

  if (args.status) {
    const tests = await runtime.catalog.listTestsWithEmbeddings();
    console.log(JSON.stringify(catalogStatus(tests, runtime.encoder.model), null, 2));
    return 0;
  }

  const transcript = args.file ? await fs.readFile(args.file, 'utf-8') : await readStdin();
  const result = await matchTranscript(transcript, { ...runtime, logger: progressLogger }, {
    threshold: args.threshold ?? config.threshold,
    topK: args.topK ?? config.topK,
  });

  console.log(JSON.stringify(result, null, 2));
  return isCatalogNotReady(result) ? 2 : 0;
}

main(process.argv.slice(2))
  .then(code => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error(`match-transcript failed: ${isPipelineStageError(err) ? `[${err.code}] ` : ''}${errorMessage(err)}`);
    process.exit(1);
  });
