import * as path from 'path';
import chalk from 'chalk';
import { glob } from 'glob';
import inquirer from 'inquirer';
import { BUILD_DESCRIPTOR_FILE, MANIFEST_FILE } from './constants';
import { loadConfig } from './config';
import { errorMessage } from './errors';
import { ManifestReader } from './manifest-reader';
import { vendorNameFor } from './naming';
import { PackageGenerator } from './package-generator';
import {
  BatchResult,
  GenerateOptions,
  GeneratedFileSet,
  GenerationMode,
  GeneratorConfig,
  RenderedFile,
  UpstreamManifest,
  VendorPackageSpec,
} from './types';

export class VendorPackager {
  private readonly reader = new ManifestReader();
  private readonly generator: PackageGenerator;

  constructor(private readonly config: GeneratorConfig, generator?: PackageGenerator) {
    this.generator = generator ?? new PackageGenerator(config);
  }

  static async load(configPath?: string): Promise<VendorPackager> {
    return new VendorPackager(await loadConfig(configPath));
  }

  async readManifest(manifestPath: string, suffixFromCmake = false): Promise<UpstreamManifest> {
    const manifest = suffixFromCmake
      ? await this.reader.readWithSuffix(manifestPath, path.join(path.dirname(manifestPath), BUILD_DESCRIPTOR_FILE))
      : await this.reader.read(manifestPath);
    console.log(chalk.green('✓'), `Read ${manifest.name} ${manifest.version}${manifest.versionSuffix}`);
    return manifest;
  }

  vendorName(manifest: UpstreamManifest): string {
    return vendorNameFor(manifest, this.config);
  }

  // The vendor package keeps its own version across regenerations.
  private buildSpec(
    manifest: UpstreamManifest,
    outputDir: string,
    mode: GenerationMode,
    options: GenerateOptions,
    existing: UpstreamManifest | null
  ): VendorPackageSpec {
    return {
      vendorName: this.vendorName(manifest),
      outputDir,
      mode,
      vendorVersion: existing?.version ?? this.config.initialVendorVersion,
      overwriteCmakeConfigs: options.overwriteCmakeConfigs ?? false,
    };
  }

  /**
   * Returns null when the target holds an earlier generation and the user
   * declines to overwrite it.
   */
  async create(manifestPath: string, options: GenerateOptions = {}): Promise<GeneratedFileSet | null> {
    const manifest = await this.readManifest(manifestPath, options.suffixFromCmake);
    const outputDir = path.resolve(options.outputDir ?? this.vendorName(manifest));
    const existing = await this.generator.previousGeneration(outputDir, this.vendorName(manifest));
    const spec = this.buildSpec(manifest, outputDir, 'create', options, existing);

    if (existing !== null && !options.assumeYes) {
      const { confirm } = await inquirer.prompt<{ confirm: boolean }>([
        {
          type: 'confirm',
          name: 'confirm',
          message: `'${outputDir}' already holds ${spec.vendorName}. Overwrite it?`,
          default: false
        }
      ]);
      if (!confirm) {
        console.log(chalk.yellow('Aborted, nothing was written'));
        return null;
      }
    }

    console.log(chalk.blue('→'), `Creating ${spec.vendorName} in ${outputDir}`);
    const fileSet = await this.generator.generate(manifest, spec);
    console.log(chalk.green('✓'), chalk.bold(`Created ${spec.vendorName} (${fileSet.files.length} files)`));
    return fileSet;
  }

  async update(manifestPath: string, outputDir: string, options: GenerateOptions = {}): Promise<GeneratedFileSet> {
    const manifest = await this.readManifest(manifestPath, options.suffixFromCmake);
    const resolved = path.resolve(outputDir);
    const existing = await this.generator.previousGeneration(resolved, this.vendorName(manifest));
    const spec = this.buildSpec(manifest, resolved, 'update', options, existing);

    console.log(chalk.blue('→'), `Updating ${spec.vendorName} in ${resolved}`);
    const fileSet = await this.generator.generate(manifest, spec);
    console.log(chalk.green('✓'), chalk.bold(`Updated ${spec.vendorName} to ${manifest.version}${manifest.versionSuffix}`));
    return fileSet;
  }

  // Renders what `update` would write to the owned files.
  async preview(manifestPath: string, options: GenerateOptions = {}): Promise<RenderedFile[]> {
    const manifest = await this.readManifest(manifestPath, options.suffixFromCmake);
    const outputDir = path.resolve(options.outputDir ?? this.vendorName(manifest));
    const existing = await this.generator.previousGeneration(outputDir, this.vendorName(manifest));
    const spec = this.buildSpec(manifest, outputDir, 'update', options, existing);
    return this.generator.render(this.generator.plan(manifest, spec));
  }

  /**
   * Creates or updates one vendor package per `<sourcesDir>/<repo>/package.xml`,
   * under `<outputDir>/<vendor name>`. Failures are reported and skipped.
   */
  async updateAll(sourcesDir: string, outputDir: string, options: GenerateOptions = {}): Promise<BatchResult[]> {
    const manifests = (await glob(`*/${MANIFEST_FILE}`, { cwd: sourcesDir, absolute: true })).sort();
    const results: BatchResult[] = [];

    if (manifests.length === 0) {
      console.log(chalk.yellow(`No ${MANIFEST_FILE} found under ${sourcesDir}`));
      return results;
    }

    for (const manifestPath of manifests) {
      console.log(chalk.bold(`\n${manifestPath}`));
      try {
        const manifest = await this.readManifest(manifestPath, options.suffixFromCmake);
        const vendorName = this.vendorName(manifest);
        const target = path.resolve(outputDir, vendorName);
        const existing = await this.generator.previousGeneration(target, vendorName);
        const mode: GenerationMode = existing === null ? 'create' : 'update';

        const spec = this.buildSpec(manifest, target, mode, options, existing);
        await this.generator.generate(manifest, spec);
        console.log(chalk.green('✓'), `${mode === 'create' ? 'Created' : 'Updated'} ${vendorName}`);
        results.push({ manifestPath, vendorName, mode });
      } catch (error) {
        console.error(chalk.red('Error:'), errorMessage(error));
        results.push({ manifestPath, error: errorMessage(error) });
      }
    }

    const failed = results.filter(result => result.error !== undefined).length;
    const summary = `${results.length - failed} of ${results.length} vendor packages generated`;
    console.log(failed === 0 ? chalk.green(`\n✓ ${summary}`) : chalk.red(`\n✗ ${summary}`));
    return results;
  }
}
