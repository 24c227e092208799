#!/usr/bin/env node
import { Command } from 'commander';
import { findSourceDir, listArchive, programSourceDir } from './archive.js';
import { completionScript } from './completions.js';
import { resolveRuntimeConfig } from './config.js';
import { CliError, errorEnvelope } from './errors.js';
import { generateRecipes } from './generator.js';
import { readManifest } from './manifest.js';
import { renderOutput, type CommandOutput, type OutputMode } from './output.js';

interface GlobalOptions {
  json?: boolean;
  human?: boolean;
  markdown?: boolean;
}

interface GenerateOptions {
  ucscVersion?: string;
  workDir?: string;
  recipesDir?: string;
  templatesDir?: string;
  exceptions?: string;
  offline?: boolean;
}

function pickOutputMode(options: GlobalOptions): OutputMode {
  if (options.markdown) {
    return 'markdown';
  }
  if (options.human) {
    return 'human';
  }
  if (options.json) {
    return 'json';
  }
  if (!process.stdout.isTTY) {
    return 'json';
  }
  return 'human';
}

function printData(output: CommandOutput, command: Command) {
  const global = command.parent?.opts<GlobalOptions>() ?? {};
  console.log(renderOutput(output, pickOutputMode(global)));
}

function resolveCompletionShell(input?: string) {
  const normalized = (input ?? 'bash').toLowerCase();
  if (normalized === 'bash' || normalized === 'zsh' || normalized === 'fish') {
    return normalized;
  }
  throw new CliError('CONFIG_ERROR', `Unsupported shell '${input}'. Use bash, zsh or fish.`, 1);
}

function completionCommands(program: Command) {
  return program.commands.flatMap((registered) => [registered.name(), ...registered.aliases()]);
}

async function run() {
  const program = new Command();

  program
    .name('ucsc-recipes')
    .description('Generate conda recipes for the UCSC kent command-line utilities')
    .version('1.0.0')
    .option('--json', 'Render machine-parseable JSON output')
    .option('--human', 'Render human-readable output')
    .option('--markdown', 'Render markdown output');

  program
    .command('generate', { isDefault: true })
    .description('Fetch FOOTER and the userApps tarball, then write one recipe per program')
    .option('--ucsc-version <version>', 'userApps release to package')
    .option('--work-dir <dir>', 'Directory holding the downloaded tarball and FOOTER')
    .option('--recipes-dir <dir>', 'Directory receiving ucsc-* recipe directories')
    .option('--templates-dir <dir>', 'Directory holding the recipe templates and include.patch')
    .option('--exceptions <file>', 'JSON file with the name exception tables')
    .option('--offline', 'Reuse the local FOOTER instead of downloading it again')
    .action(async (options: GenerateOptions, command: Command) => {
      const config = resolveRuntimeConfig({
        version: options.ucscVersion,
        workDir: options.workDir,
        recipesDir: options.recipesDir,
        templatesDir: options.templatesDir,
        exceptionsPath: options.exceptions,
      });
      const report = await generateRecipes(config, { offline: options.offline });
      printData({ command: 'generate', data: report }, command);
    });

  program
    .command('parse <footer>')
    .description('Print the program blocks found in a FOOTER file')
    .action((footer: string, _options: unknown, command: Command) => {
      printData({ command: 'parse', data: [...readManifest(footer)] }, command);
    });

  program
    .command('locate <program> <tarball>')
    .description('Show which source directory a program would be built from')
    .action(async (name: string, tarball: string, _options: unknown, command: Command) => {
      const sourcePath = findSourceDir(name, await listArchive(tarball));
      printData(
        {
          command: 'locate',
          data: {
            program: name,
            source_path: sourcePath,
            program_source_dir: sourcePath === undefined ? undefined : programSourceDir(sourcePath),
          },
        },
        command,
      );
    });

  program
    .command('completion [shell]')
    .alias('completions')
    .description('Print shell completion script')
    .action((shellArg: string | undefined) => {
      console.log(completionScript(resolveCompletionShell(shellArg), completionCommands(program)));
    });

  await program.parseAsync(process.argv);
}

run().catch((error: unknown) => {
  if (error instanceof CliError) {
    console.error(JSON.stringify(errorEnvelope(error.code, error.message, error.details), null, 2));
    process.exit(error.exitCode);
  }

  const message = error instanceof Error ? error.message : 'Unknown CLI error';
  console.error(JSON.stringify(errorEnvelope('UNEXPECTED_ERROR', message), null, 2));
  process.exit(1);
});
