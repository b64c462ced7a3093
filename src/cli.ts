#!/usr/bin/env node
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import fs from 'fs-extra';
import { queryFromConfig } from './persistence/config.js';
import { FileTemplateStore } from './persistence/template-store.js';
import { sampleConfig } from './persistence/sample.js';
import { buildReport, type QueryReport } from './report.js';
import { validateSQL } from './validator/validate.js';
import { DefaultSqlTokenizer } from './validator/tokenizer.js';
import { startServer } from './server/app.js';
import { settings } from './utils/settings.js';

function printReport(report: QueryReport, opts: { formatted?: boolean; requirements?: boolean }) {
  console.log('--- SQL ---');
  console.log(opts.formatted && report.validation.formatted ? report.validation.formatted : report.sql);
  console.log('\n--- Validation ---');
  console.log(report.validation.valid ? 'valid' : 'INVALID');
  for (const e of report.validation.errors) console.log(`error: ${e}`);
  for (const w of report.validation.warnings) console.log(`warning: ${w}`);
  for (const p of report.problems) console.log(`${p.severity}: [${p.code}] ${p.path}: ${p.message}`);
  console.log('\n--- Explanation ---');
  console.log(report.description);
  if (opts.requirements) {
    console.log('\n--- Requirements ---');
    console.log(report.requirements);
  }
}

async function main() {
  await yargs(hideBin(process.argv))
    .scriptName('query-assembler')
    .option('dir', { type: 'string', default: settings.templatesDir, desc: 'Template directory' })
    .command(
      'render <file>',
      'Render a query configuration (JSON) to SQL',
      (y) =>
        y
          .positional('file', { type: 'string', demandOption: true, desc: 'Path to the configuration JSON' })
          .option('formatted', { type: 'boolean', default: false, desc: 'Print the reformatted SQL' })
          .option('requirements', { type: 'boolean', default: false, desc: 'Also print the requirements transcript' }),
      async (argv) => {
        const query = queryFromConfig(await fs.readJson(argv.file));
        printReport(buildReport(query), argv);
      },
    )
    .command(
      'example',
      'Render the built-in example query',
      (y) => y.option('requirements', { type: 'boolean', default: false }),
      (argv) => {
        printReport(buildReport(queryFromConfig(sampleConfig)), argv);
      },
    )
    .command(
      'validate <file>',
      'Validate a SQL file',
      (y) => y.positional('file', { type: 'string', demandOption: true }),
      async (argv) => {
        const result = validateSQL(await fs.readFile(argv.file, 'utf8'), new DefaultSqlTokenizer());
        console.log(JSON.stringify(result, null, 2));
        if (!result.valid) process.exitCode = 1;
      },
    )
    .command('templates', 'Manage saved query templates', (y) =>
      y
        .command('list', 'List templates', (yy) => yy, (argv) => {
          for (const t of new FileTemplateStore(argv.dir).listAll()) console.log(t.name);
        })
        .command(
          'show <name>',
          'Print a template as JSON',
          (yy) => yy.positional('name', { type: 'string', demandOption: true }),
          (argv) => {
            const config = new FileTemplateStore(argv.dir).get(argv.name);
            if (!config) {
              console.error(`Template '${argv.name}' not found`);
              process.exitCode = 1;
              return;
            }
            console.log(JSON.stringify(config, null, 2));
          },
        )
        .command(
          'save <name> <file>',
          'Save a configuration file as a template',
          (yy) =>
            yy
              .positional('name', { type: 'string', demandOption: true })
              .positional('file', { type: 'string', demandOption: true }),
          async (argv) => {
            new FileTemplateStore(argv.dir).put(argv.name, await fs.readJson(argv.file));
            console.log(`Saved template '${argv.name}'`);
          },
        )
        .command(
          'delete <name>',
          'Delete a template',
          (yy) => yy.positional('name', { type: 'string', demandOption: true }),
          (argv) => {
            const deleted = new FileTemplateStore(argv.dir).delete(argv.name);
            console.log(deleted ? `Deleted template '${argv.name}'` : `Template '${argv.name}' not found`);
            if (!deleted) process.exitCode = 1;
          },
        )
        .demandCommand(1),
    )
    .command(
      'serve',
      'Start the HTTP API',
      (y) => y.option('port', { type: 'number', default: settings.port }),
      (argv) => {
        startServer({ settings: { ...settings, port: argv.port, templatesDir: argv.dir } });
      },
    )
    .demandCommand(1)
    .strict()
    .help()
    .parse();
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
