#!/usr/bin/env node
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { NAMING_CONVENTIONS } from '../domain/schema/naming.js';
import { loadSerializeConfig } from '../infrastructure/config.js';
import { createLogger } from '../infrastructure/logger.js';
import { runSchemaCommand } from './schema-command.js';

/**
 * Prints the JSON Schema of the BO4E catalog, or of one type, in either
 * naming convention.
 *
 *   bo4e-schema --convention english --type Meter
 */
const logger = createLogger('bo4e-schema');

async function main(): Promise<void> {
  const defaults = loadSerializeConfig(process.env, logger);

  const argv = await yargs(hideBin(process.argv))
    .scriptName('bo4e-schema')
    .usage('Usage: $0 [options]')
    .option('convention', {
      alias: 'c',
      choices: NAMING_CONVENTIONS,
      default: defaults.convention,
      describe: 'Naming convention of the property names',
    })
    .option('type', {
      alias: 't',
      type: 'string',
      describe: 'Only describe this type (English or German name)',
    })
    .option('compact', {
      type: 'boolean',
      default: false,
      describe: 'Print without indentation',
    })
    .strict()
    .help()
    .parse();

  const result = runSchemaCommand({
    convention: argv.convention,
    typeName: argv.type,
    pretty: !argv.compact,
  });

  if (!result.ok) {
    logger.error(result.message);
    process.exitCode = 1;
    return;
  }
  process.stdout.write(`${result.output}\n`);
}

main().catch((err: unknown) => {
  logger.fatal({ err }, 'Schema generation failed');
  process.exit(1);
});
