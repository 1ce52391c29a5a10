#!/usr/bin/env node

import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { config } from '../lib/config.js';
import { logger } from '../lib/logger.js';
import { loadDocumentFile, renderReport } from '../lib/report.js';

async function main() {
  const argv = await yargs(hideBin(process.argv))
    .usage('Usage: $0 <file> [options]')
    .command('$0 <file>', 'Summarize an annotated document stored as JSON', (y) => {
      return y.positional('file', {
        describe: 'JSON file of the form { "text"?: string, "sentences": FieldRecord[][] }',
        type: 'string',
        demandOption: true,
      });
    })
    .option('entities', {
      alias: 'e',
      type: 'boolean',
      default: false,
      description: 'Decode BIOES tags and list the entities',
    })
    .option('dependencies', {
      alias: 'd',
      type: 'boolean',
      default: false,
      description: 'Print dependency edges per sentence',
    })
    .option('tokens', {
      alias: 't',
      type: 'boolean',
      default: false,
      description: 'Print tokens with their words per sentence',
    })
    .option('type-drift', {
      choices: ['tolerate', 'reject'] as const,
      default: config.entityTypeDrift,
      description: 'How a tag that changes an open entity\'s type is treated',
    })
    .example('$0 doc.json -e', 'List entities')
    .example('$0 doc.json -d -t', 'Show tokens and dependency edges')
    .help('h')
    .alias('h', 'help')
    .strict()
    .parse();

  const file = argv.file;
  if (typeof file !== 'string') throw new Error('Missing <file> argument');

  const doc = await loadDocumentFile(file);
  console.log(renderReport(doc, {
    entities: argv.entities,
    dependencies: argv.dependencies,
    tokens: argv.tokens,
    typeDrift: argv.typeDrift,
  }));
}

main().catch((err: unknown) => {
  logger.error({ err }, 'inspect failed');
  process.exitCode = 1;
});
