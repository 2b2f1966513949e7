export type DependencyType =
  | 'depend'
  | 'build_depend'
  | 'buildtool_depend'
  | 'build_export_depend'
  | 'buildtool_export_depend'
  | 'exec_depend'
  | 'test_depend'
  | 'doc_depend';

export interface Dependency {
  name: string;
  type: DependencyType;
  // condition, version_gte and friends, as written upstream
  attributes?: Record<string, string>;
}

export interface Person {
  name: string;
  email?: string;
}

export interface Maintainer extends Person {
  email: string;
}

export interface PackageUrl {
  url: string;
  type?: string;
}

export interface UpstreamManifest {
  readonly name: string;
  readonly version: string;
  readonly versionSuffix: string;
  readonly format: number;
  readonly description: string;
  readonly dependencies: readonly Dependency[];
  readonly maintainers: readonly Maintainer[];
  readonly authors: readonly Person[];
  readonly licenses: readonly string[];
  readonly urls: readonly PackageUrl[];
}

export type GenerationMode = 'create' | 'update';

export interface VendorPackageSpec {
  vendorName: string;
  outputDir: string;
  mode: GenerationMode;
  vendorVersion: string;
  overwriteCmakeConfigs: boolean;
}

export type FileRole = 'owned' | 'auxiliary' | 'cmake-config';

export type TemplateBindings = Record<string, unknown>;

export interface RenderingRule {
  template: string;
  bindings: TemplateBindings;
}

export interface GeneratedFile {
  relativePath: string;
  rule: RenderingRule;
  role: FileRole;
}

export interface GeneratedFileSet {
  outputDir: string;
  mode: GenerationMode;
  files: GeneratedFile[];
}

export interface RenderedFile {
  relativePath: string;
  role: FileRole;
  content: string;
}

export type PackageTrait = 'extraCmake' | 'dsv';

export interface AuxiliaryTemplate {
  template: string;
  target: string;
  role: Exclude<FileRole, 'owned'>;
  requires?: PackageTrait;
  description?: string;
}

export interface NamingConfig {
  prefix: string;
  separator: string;
  suffix: string;
}

export interface LibraryTraits {
  noExtraCmake: string[];
  noDsv: string[];
  patches: string[];
  swig: string[];
  pybind11: string[];
  noDocs: string[];
  cmakeNames: Record<string, string>;
  githubNames: Record<string, string>;
}

export interface GeneratorConfig {
  naming: NamingConfig;
  initialVendorVersion: string;
  templatesDir: string;
  libraries: string[];
  extraVendoredPackages: Record<string, string>;
  dependencyDisallowList: string[];
  traits: LibraryTraits;
  vcsUrlBase: string;
  auxiliaryFiles: AuxiliaryTemplate[];
}

export interface GenerateOptions {
  outputDir?: string;
  suffixFromCmake?: boolean;
  overwriteCmakeConfigs?: boolean;
  assumeYes?: boolean;
}

export interface BatchResult {
  manifestPath: string;
  vendorName?: string;
  mode?: GenerationMode;
  error?: string;
}
