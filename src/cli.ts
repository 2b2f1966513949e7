#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { initConfig } from './config';
import { errorMessage } from './errors';
import { VendorPackager } from './vendor-packager';

type GlobalOptions = {
  config?: string;
};

interface CreateCommandOptions {
  suffixFromCmake?: boolean;
  yes?: boolean;
}

interface UpdateCommandOptions {
  suffixFromCmake?: boolean;
  overwriteCmakeConfigs?: boolean;
}

function fail(error: unknown): never {
  console.error(chalk.red('Error:'), errorMessage(error));
  process.exit(1);
}

export function createProgram(): Command {
  const program = new Command();

  const packager = () => VendorPackager.load(program.opts<GlobalOptions>().config);

  program
    .name('vendor-package')
    .description('Scaffold and update vendor packages from upstream package.xml manifests')
    .version('1.0.0')
    .option('-c, --config <path>', 'configuration file (defaults to ./vendor-config.json when present)');

  program
    .command('create <manifest> [outputDir]')
    .description('Create a new vendor package from an upstream package.xml')
    .option('--suffix-from-cmake', 'read the version suffix from the CMakeLists.txt next to the manifest')
    .option('-y, --yes', 'overwrite an earlier generation without asking')
    .action(async (manifest: string, outputDir: string | undefined, options: CreateCommandOptions) => {
      try {
        const vendor = await packager();
        await vendor.create(manifest, {
          outputDir,
          suffixFromCmake: options.suffixFromCmake,
          assumeYes: options.yes,
        });
      } catch (error) {
        fail(error);
      }
    });

  program
    .command('update <manifest> <outputDir>')
    .description('Refresh the generated files of an existing vendor package')
    .option('--suffix-from-cmake', 'read the version suffix from the CMakeLists.txt next to the manifest')
    .option('--overwrite-cmake-configs', 'also rewrite the CMake config (.in) files')
    .action(async (manifest: string, outputDir: string, options: UpdateCommandOptions) => {
      try {
        const vendor = await packager();
        await vendor.update(manifest, outputDir, options);
      } catch (error) {
        fail(error);
      }
    });

  program
    .command('preview <manifest>')
    .description('Print the generated package.xml and CMakeLists.txt without writing them')
    .option('--suffix-from-cmake', 'read the version suffix from the CMakeLists.txt next to the manifest')
    .action(async (manifest: string, options: UpdateCommandOptions) => {
      try {
        const vendor = await packager();
        const files = await vendor.preview(manifest, options);
        for (const file of files) {
          console.log(chalk.cyan(`--- ${file.relativePath}`));
          console.log(file.content);
        }
      } catch (error) {
        fail(error);
      }
    });

  program
    .command('update-all <sourcesDir> <outputDir>')
    .description('Create or update a vendor package for every <sourcesDir>/*/package.xml')
    .option('--suffix-from-cmake', 'read version suffixes from the upstream CMakeLists.txt files')
    .option('--overwrite-cmake-configs', 'also rewrite the CMake config (.in) files')
    .action(async (sourcesDir: string, outputDir: string, options: UpdateCommandOptions) => {
      let failed = false;
      try {
        const vendor = await packager();
        const results = await vendor.updateAll(sourcesDir, outputDir, options);
        failed = results.some(result => result.error !== undefined);
      } catch (error) {
        fail(error);
      }
      if (failed) {
        process.exit(1);
      }
    });

  program
    .command('init')
    .description('Write a default vendor-config.json in the current directory')
    .action(async () => {
      try {
        await initConfig();
      } catch (error) {
        fail(error);
      }
    });

  return program;
}

export const program = createProgram();

if (require.main === module) {
  void program.parseAsync(process.argv);
}
