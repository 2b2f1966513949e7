import * as fs from 'fs-extra';
import * as path from 'path';
import chalk from 'chalk';
import {
  BUILD_DESCRIPTOR_FILE,
  BUILD_DESCRIPTOR_TEMPLATE,
  MANIFEST_FILE,
  MANIFEST_TEMPLATE,
  VENDORED_DEPENDENCY_TYPES,
} from './constants';
import {
  ParseError,
  TargetExistsError,
  TargetMissingError,
  WriteError,
  errorMessage,
} from './errors';
import { ManifestReader } from './manifest-reader';
import {
  cmakeArgs,
  cmakePkgName,
  githubPkgName,
  hasPatches,
  hasTrait,
  isVendoredLibrary,
  removeVersion,
  splitVersion,
  stableUnique,
  vendorizeDependency,
} from './naming';
import { TemplateRenderer } from './template-renderer';
import {
  Dependency,
  GeneratedFile,
  GeneratedFileSet,
  GeneratorConfig,
  RenderedFile,
  TemplateBindings,
  UpstreamManifest,
  VendorPackageSpec,
} from './types';

export class PackageGenerator {
  private readonly renderer: TemplateRenderer;
  private readonly reader = new ManifestReader();

  constructor(private readonly config: GeneratorConfig, renderer?: TemplateRenderer) {
    this.renderer = renderer ?? new TemplateRenderer(config.templatesDir);
  }

  bindings(manifest: UpstreamManifest, spec: VendorPackageSpec): TemplateBindings {
    const [nameNoVersion, pkgMajor] = removeVersion(manifest.name);
    const version = splitVersion(manifest.version);

    const candidates = manifest.dependencies.filter(
      dep => VENDORED_DEPENDENCY_TYPES.includes(dep.type)
        && !this.config.dependencyDisallowList.includes(dep.name)
    );
    // Vendored libraries are declared with <depend> regardless of their upstream type.
    const dependencies: Dependency[] = [];
    const vendored: string[] = [];
    for (const dep of candidates) {
      if (isVendoredLibrary(dep, this.config)) {
        vendored.push(vendorizeDependency(dep, this.config));
      } else {
        dependencies.push(dep);
      }
    }

    const cmakePkg = cmakePkgName(nameNoVersion, this.config);
    const cmakeName = `${cmakePkg}${version.major}`;
    const githubName = githubPkgName(nameNoVersion, this.config);

    return {
      pkg: manifest,
      vendorName: spec.vendorName,
      vendorVersion: spec.vendorVersion,
      fullVersion: `${manifest.version}${manifest.versionSuffix}`,
      licenseList: manifest.licenses.join(', '),
      dependencies,
      vendorDependencies: stableUnique(vendored),
      version,
      cmakePkgName: cmakePkg,
      cmakeName,
      githubName,
      vcsUrl: `${this.config.vcsUrlBase}/${githubName}.git`,
      vcsVersion: `${githubName}${version.major}_${manifest.version}${manifest.versionSuffix}`,
      satisfiedCondition: `\${${cmakeName}_FOUND}`,
      cmakeArgs: cmakeArgs(manifest, this.config),
      hasPatches: hasPatches(nameNoVersion, pkgMajor, this.config),
      hasExtraCmake: hasTrait(nameNoVersion, 'extraCmake', this.config),
      hasDsv: hasTrait(nameNoVersion, 'dsv', this.config),
    };
  }

  // Update mode plans the owned files, plus the CMake config files when asked to.
  plan(manifest: UpstreamManifest, spec: VendorPackageSpec): GeneratedFileSet {
    const bindings = this.bindings(manifest, spec);
    const [nameNoVersion] = removeVersion(manifest.name);

    const files: GeneratedFile[] = [
      { relativePath: MANIFEST_FILE, rule: { template: MANIFEST_TEMPLATE, bindings }, role: 'owned' },
      { relativePath: BUILD_DESCRIPTOR_FILE, rule: { template: BUILD_DESCRIPTOR_TEMPLATE, bindings }, role: 'owned' },
    ];

    for (const auxiliary of this.config.auxiliaryFiles) {
      if (auxiliary.requires && !hasTrait(nameNoVersion, auxiliary.requires, this.config)) {
        continue;
      }
      const wanted = spec.mode === 'create'
        || (auxiliary.role === 'cmake-config' && spec.overwriteCmakeConfigs);
      if (!wanted) continue;

      files.push({
        relativePath: this.renderer.renderString(auxiliary.target, bindings),
        rule: { template: auxiliary.template, bindings },
        role: auxiliary.role,
      });
    }

    return { outputDir: spec.outputDir, mode: spec.mode, files };
  }

  async render(fileSet: GeneratedFileSet): Promise<RenderedFile[]> {
    const rendered: RenderedFile[] = [];
    for (const file of fileSet.files) {
      rendered.push({
        relativePath: file.relativePath,
        role: file.role,
        content: await this.renderer.render(file.rule.template, file.rule.bindings),
      });
    }
    return rendered;
  }

  async readExistingPackage(outputDir: string): Promise<UpstreamManifest | null> {
    const manifestPath = path.join(outputDir, MANIFEST_FILE);
    if (!await fs.pathExists(manifestPath)) {
      return null;
    }
    return this.reader.read(manifestPath);
  }

  /**
   * Returns the manifest of `outputDir` when it holds an earlier generation of
   * `vendorName`, or null. An unparseable package.xml counts as foreign.
   */
  async previousGeneration(outputDir: string, vendorName: string): Promise<UpstreamManifest | null> {
    try {
      const existing = await this.readExistingPackage(outputDir);
      return existing !== null && existing.name === vendorName ? existing : null;
    } catch (error) {
      if (error instanceof ParseError) {
        return null;
      }
      throw error;
    }
  }

  async checkTarget(spec: VendorPackageSpec): Promise<void> {
    const exists = await fs.pathExists(spec.outputDir);

    if (spec.mode === 'update') {
      if (!exists || !(await fs.stat(spec.outputDir)).isDirectory()) {
        throw new TargetMissingError(spec.outputDir);
      }
      const existing = await this.readExistingPackage(spec.outputDir);
      if (existing === null) {
        throw new TargetMissingError(spec.outputDir, `does not contain a vendor package ${MANIFEST_FILE}`);
      }
      if (existing.name !== spec.vendorName) {
        throw new TargetMissingError(spec.outputDir, `holds ${existing.name}, not ${spec.vendorName}`);
      }
      return;
    }

    if (!exists) return;
    if (!(await fs.stat(spec.outputDir)).isDirectory()) {
      throw new TargetExistsError(spec.outputDir);
    }
    const entries = await fs.readdir(spec.outputDir);
    if (entries.length === 0) return;
    if (await this.previousGeneration(spec.outputDir, spec.vendorName) === null) {
      throw new TargetExistsError(spec.outputDir);
    }
  }

  // Everything is rendered before the first write.
  async generate(manifest: UpstreamManifest, spec: VendorPackageSpec): Promise<GeneratedFileSet> {
    await this.checkTarget(spec);

    const fileSet = this.plan(manifest, spec);
    const rendered = await this.render(fileSet);

    try {
      await fs.ensureDir(spec.outputDir);
    } catch (error) {
      throw new WriteError(spec.outputDir, errorMessage(error), []);
    }

    const written: string[] = [];
    for (const file of rendered) {
      const target = path.join(spec.outputDir, file.relativePath);
      try {
        await fs.ensureDir(path.dirname(target));
        await fs.writeFile(target, file.content);
      } catch (error) {
        throw new WriteError(target, errorMessage(error), written);
      }
      written.push(file.relativePath);
      console.log(chalk.gray(`  Wrote: ${file.relativePath}`));
    }

    return fileSet;
  }
}
