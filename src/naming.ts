import { VERSION_PATTERN } from './constants';
import { Dependency, GeneratorConfig, NamingConfig, PackageTrait, UpstreamManifest } from './types';

export interface SplitVersion {
  major: number;
  minor: number;
  patch: number;
}

/**
 * Splits an upstream package name such as `gz-math7` into its versionless
 * name and trailing major version (`['gz-math', '7']`).
 */
export function removeVersion(pkgName: string): [string, string] {
  const match = /^([-_a-z]*)(\d*)/.exec(pkgName);
  if (!match || match[1] === '') {
    throw new Error(`Could not parse package name: "${pkgName}"`);
  }
  return [match[1], match[2]];
}

export function createVendorName(pkgNameNoVersion: string, naming: NamingConfig): string {
  return `${naming.prefix}${pkgNameNoVersion.replace(/-/g, naming.separator)}${naming.suffix}`;
}

export function vendorNameFor(manifest: Pick<UpstreamManifest, 'name'>, config: GeneratorConfig): string {
  const [nameNoVersion] = removeVersion(manifest.name);
  return createVendorName(nameNoVersion, config.naming);
}

export function splitVersion(version: string): SplitVersion {
  const match = VERSION_PATTERN.exec(version);
  if (!match) {
    throw new Error(`Invalid version string, must be int.int.int: "${version}"`);
  }
  return {
    major: Number(match[1]),
    minor: Number(match[2]),
    patch: Number(match[3]),
  };
}

export function isVendoredLibrary(dep: Dependency, config: GeneratorConfig): boolean {
  if (dep.name in config.extraVendoredPackages) {
    return true;
  }
  const match = /^([-_a-z]*)/.exec(dep.name);
  return match !== null && config.libraries.includes(match[1]);
}

export function vendorizeDependency(dep: Dependency, config: GeneratorConfig): string {
  const extra = config.extraVendoredPackages[dep.name];
  if (extra !== undefined) {
    return extra;
  }
  const [nameNoVersion] = removeVersion(dep.name);
  return createVendorName(nameNoVersion, config.naming);
}

export function stableUnique<T>(items: readonly T[]): T[] {
  const seen = new Set<T>();
  const unique: T[] = [];
  for (const item of items) {
    if (!seen.has(item)) {
      seen.add(item);
      unique.push(item);
    }
  }
  return unique;
}

export function cmakePkgName(pkgNameNoVersion: string, config: GeneratorConfig): string {
  return config.traits.cmakeNames[pkgNameNoVersion] ?? pkgNameNoVersion;
}

export function githubPkgName(pkgNameNoVersion: string, config: GeneratorConfig): string {
  return config.traits.githubNames[pkgNameNoVersion] ?? pkgNameNoVersion;
}

export function hasTrait(pkgNameNoVersion: string, trait: PackageTrait, config: GeneratorConfig): boolean {
  switch (trait) {
    case 'extraCmake':
      return !config.traits.noExtraCmake.includes(pkgNameNoVersion);
    case 'dsv':
      return !config.traits.noDsv.includes(pkgNameNoVersion);
  }
}

export function hasPatches(pkgNameNoVersion: string, pkgMajor: string, config: GeneratorConfig): boolean {
  // gz-cmake dropped its vendor patches in gz-cmake4
  if (pkgNameNoVersion === 'gz-cmake' && pkgMajor !== '' && Number(pkgMajor) < 4) {
    return true;
  }
  return config.traits.patches.includes(pkgNameNoVersion);
}

function isGzCmake4(pkgName: string): boolean {
  const match = /^([-_a-z]*)(\d*)/.exec(pkgName);
  if (!match || match[1] !== 'gz-cmake' || match[2] === '') {
    return false;
  }
  return Number(match[2]) >= 4;
}

/**
 * `-DBUILD_DOCS` was removed in gz-cmake4, so it is only passed to libraries
 * that neither are gz-cmake4+ nor build against it.
 */
export function buildDocsDeprecated(manifest: Pick<UpstreamManifest, 'name' | 'dependencies'>): boolean {
  if (isGzCmake4(manifest.name)) {
    return true;
  }
  return manifest.dependencies.some(
    dep => (dep.type === 'build_depend' || dep.type === 'depend') && isGzCmake4(dep.name)
  );
}

export function cmakeArgs(manifest: Pick<UpstreamManifest, 'name' | 'dependencies'>, config: GeneratorConfig): string[] {
  const [nameNoVersion] = removeVersion(manifest.name);
  const args: string[] = [];
  if (!config.traits.noDocs.includes(nameNoVersion) && !buildDocsDeprecated(manifest)) {
    args.push('-DBUILD_DOCS:BOOL=OFF');
  }
  if (config.traits.pybind11.includes(nameNoVersion)) {
    args.push('-DSKIP_PYBIND11:BOOL=ON');
  }
  if (config.traits.swig.includes(nameNoVersion)) {
    args.push('-DSKIP_SWIG:BOOL=ON');
  }
  return args;
}
