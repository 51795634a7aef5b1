#!/usr/bin/env node
import { Command } from 'commander';
import { run_check, run_normalize, type CliIo, type CliOptions } from './commands';
import { logger } from '../utils/logger.util';

async function read_stdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk), 'utf8'));
  }
  return Buffer.concat(chunks).toString('utf8');
}

const io: CliIo = {
  logger,
  write: (text) => {
    process.stdout.write(text);
  },
  read_stdin,
};

const program = new Command();

program
  .name('descjson')
  .description('Convert schema-described messages to and from JSON')
  .version('0.1.0');

program
  .command('check')
  .description('compile a schema document and report issues')
  .argument('<schema>', 'path to a *.schema.json document')
  .action(async (schema: string) => {
    process.exitCode = await run_check(schema, io);
  });

program
  .command('normalize')
  .description('decode JSON as <type> and print it re-encoded (defaults filled, schema key order)')
  .argument('<schema>', 'path to a *.schema.json document')
  .argument('<type>', 'message type name (short or full)')
  .argument('[input]', 'JSON file to read (default: stdin)')
  .option('--pretty [n]', 'pretty-print JSON with n spaces (default: 2)', false)
  .option('--minify', 'minify JSON (overrides --pretty)', false)
  .option('-o, --out <file>', 'write the output to a file instead of stdout')
  .action(async (schema: string, type: string, input: string | undefined, opts: CliOptions) => {
    process.exitCode = await run_normalize(schema, type, input, opts, io);
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
    const path = 'path' in err && typeof err.path === 'string' ? err.path : 'input file';
    logger.error(`Not found: ${path}`);
  } else {
    logger.error(`Unexpected error: ${err instanceof Error ? err.message : String(err)}`);
  }
  process.exitCode = 1;
});
