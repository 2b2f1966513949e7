import * as path from 'path';
import Joi from 'joi';
import {
  AuxiliaryTemplate,
  DependencyType,
  GeneratorConfig,
  LibraryTraits,
  NamingConfig,
} from './types';

export const CONFIG_FILE = 'vendor-config.json';
export const MANIFEST_FILE = 'package.xml';
export const BUILD_DESCRIPTOR_FILE = 'CMakeLists.txt';
export const MANIFEST_TEMPLATE = 'package.xml.hbs';
export const BUILD_DESCRIPTOR_TEMPLATE = 'CMakeLists.txt.hbs';
export const DEFAULT_TEMPLATES_DIR = path.resolve(__dirname, '..', 'templates');

export const DEPENDENCY_TYPES: readonly DependencyType[] = [
  'depend',
  'build_depend',
  'buildtool_depend',
  'build_export_depend',
  'buildtool_export_depend',
  'exec_depend',
  'test_depend',
  'doc_depend',
];

// Format 1 <run_depend> stands for both of these.
export const RUN_DEPEND_TYPES: readonly DependencyType[] = ['build_export_depend', 'exec_depend'];

// Upstream dependencies of these types are carried into the vendor manifest.
// Build tools come from the vendor template itself.
export const VENDORED_DEPENDENCY_TYPES: readonly DependencyType[] = [
  'depend',
  'build_depend',
  'build_export_depend',
  'exec_depend',
  'test_depend',
  'doc_depend',
];

// Library names as they appear in upstream package.xml files, without the major version.
export const DEFAULT_LIBRARIES = [
  'gz-cmake',
  'gz-common',
  'gz-fuel_tools',
  'gz-gui',
  'gz-launch',
  'gz-math',
  'gz-msgs',
  'gz-physics',
  'gz-plugin',
  'gz-rendering',
  'gz-sensors',
  'gz-sim',
  'gz-tools',
  'gz-transport',
  'gz-utils',
  'sdformat',
];

export const DEFAULT_EXTRA_VENDORED_PACKAGES: Record<string, string> = {
  dartsim: 'gz_dartsim_vendor',
  DART: 'gz_dartsim_vendor',
  'libogre-next-2.3-dev': 'gz_ogre_next_vendor',
  'libogre-next-2.3': 'gz_ogre_next_vendor',
  spdlog: 'spdlog_vendor',
};

// python3-distutils is not needed for CMake > 3.12
export const DEFAULT_DEPENDENCY_DISALLOW_LIST = ['python3-distutils'];

export const DEFAULT_NAMING: NamingConfig = {
  prefix: '',
  separator: '_',
  suffix: '_vendor',
};

export const DEFAULT_TRAITS: LibraryTraits = {
  noExtraCmake: ['gz-tools', 'gz-cmake'],
  noDsv: ['gz-tools', 'gz-cmake'],
  patches: ['gz-rendering'],
  swig: ['gz-math'],
  pybind11: ['gz-math', 'sdformat', 'gz-transport', 'gz-sim'],
  noDocs: ['sdformat'],
  cmakeNames: { 'gz-fuel-tools': 'gz-fuel_tools' },
  githubNames: { 'gz-fuel_tools': 'gz-fuel-tools' },
};

export const DEFAULT_AUXILIARY_FILES: AuxiliaryTemplate[] = [
  { template: 'LICENSE', target: 'LICENSE', role: 'auxiliary' },
  { template: 'CONTRIBUTING.md', target: 'CONTRIBUTING.md', role: 'auxiliary' },
  {
    template: 'extras.cmake.in',
    target: '{{vendorName}}-extras.cmake.in',
    role: 'cmake-config',
    requires: 'extraCmake',
    description: 'CMake extras exported by the vendor package',
  },
  {
    template: 'config.cmake.in',
    target: '{{cmakePkgName}}-config.cmake.in',
    role: 'cmake-config',
    requires: 'extraCmake',
    description: 'Config file forwarding to the vendored library',
  },
  {
    template: 'vendor.dsv.in',
    target: '{{vendorName}}.dsv.in',
    role: 'cmake-config',
    requires: 'dsv',
    description: 'Environment hook (dsv)',
  },
  {
    template: 'vendor.sh.in',
    target: '{{vendorName}}.sh.in',
    role: 'cmake-config',
    requires: 'dsv',
    description: 'Environment hook (sh)',
  },
];

export const DEFAULT_CONFIG: GeneratorConfig = {
  naming: DEFAULT_NAMING,
  initialVendorVersion: '0.0.1',
  templatesDir: DEFAULT_TEMPLATES_DIR,
  libraries: DEFAULT_LIBRARIES,
  extraVendoredPackages: DEFAULT_EXTRA_VENDORED_PACKAGES,
  dependencyDisallowList: DEFAULT_DEPENDENCY_DISALLOW_LIST,
  traits: DEFAULT_TRAITS,
  vcsUrlBase: 'https://github.com/gazebosim',
  auxiliaryFiles: DEFAULT_AUXILIARY_FILES,
};

export const VERSION_PATTERN = /^(\d+)\.(\d+)\.(\d+)$/;

const stringList = Joi.array().items(Joi.string());
const stringMap = Joi.object().pattern(Joi.string(), Joi.string());

export const configSchema = Joi.object<GeneratorConfig>({
  naming: Joi.object({
    prefix: Joi.string().allow('').default(DEFAULT_NAMING.prefix),
    separator: Joi.string().allow('').default(DEFAULT_NAMING.separator),
    suffix: Joi.string().allow('').default(DEFAULT_NAMING.suffix),
  }).default(() => ({ ...DEFAULT_NAMING })),
  initialVendorVersion: Joi.string().pattern(VERSION_PATTERN).default(DEFAULT_CONFIG.initialVendorVersion),
  templatesDir: Joi.string().default(DEFAULT_TEMPLATES_DIR),
  libraries: stringList.default(() => [...DEFAULT_LIBRARIES]),
  extraVendoredPackages: stringMap.default(() => ({ ...DEFAULT_EXTRA_VENDORED_PACKAGES })),
  dependencyDisallowList: stringList.default(() => [...DEFAULT_DEPENDENCY_DISALLOW_LIST]),
  traits: Joi.object({
    noExtraCmake: stringList.default(() => [...DEFAULT_TRAITS.noExtraCmake]),
    noDsv: stringList.default(() => [...DEFAULT_TRAITS.noDsv]),
    patches: stringList.default(() => [...DEFAULT_TRAITS.patches]),
    swig: stringList.default(() => [...DEFAULT_TRAITS.swig]),
    pybind11: stringList.default(() => [...DEFAULT_TRAITS.pybind11]),
    noDocs: stringList.default(() => [...DEFAULT_TRAITS.noDocs]),
    cmakeNames: stringMap.default(() => ({ ...DEFAULT_TRAITS.cmakeNames })),
    githubNames: stringMap.default(() => ({ ...DEFAULT_TRAITS.githubNames })),
  }).default(() => ({ ...DEFAULT_TRAITS })),
  vcsUrlBase: Joi.string().uri().default(DEFAULT_CONFIG.vcsUrlBase),
  auxiliaryFiles: Joi.array().items(
    Joi.object({
      template: Joi.string().required(),
      target: Joi.string().required(),
      role: Joi.string().valid('auxiliary', 'cmake-config').default('auxiliary'),
      requires: Joi.string().valid('extraCmake', 'dsv').optional(),
      description: Joi.string().optional()
    })
  ).default(() => DEFAULT_AUXILIARY_FILES.map(file => ({ ...file })))
}).required();

export interface ManifestFields {
  name: string;
  version: string;
  format: number;
  description: string;
  maintainers: { name: string; email: string }[];
  authors: { name: string; email?: string }[];
  licenses: string[];
  urls: { url: string; type?: string }[];
}

export const manifestSchema = Joi.object<ManifestFields>({
  name: Joi.string().trim().min(1).required(),
  version: Joi.string().trim().pattern(VERSION_PATTERN).required()
    .messages({ 'string.pattern.base': '{{#label}} must be int.int.int, got "{#value}"' }),
  format: Joi.number().integer().valid(1, 2, 3).default(1),
  description: Joi.string().allow('').default(''),
  maintainers: Joi.array().items(
    Joi.object({
      name: Joi.string().min(1).required(),
      email: Joi.string().min(1).required()
    })
  ).min(1).required(),
  authors: Joi.array().items(
    Joi.object({
      name: Joi.string().min(1).required(),
      email: Joi.string().optional()
    })
  ).default([]),
  licenses: Joi.array().items(Joi.string().min(1)).min(1).required(),
  urls: Joi.array().items(
    Joi.object({
      url: Joi.string().min(1).required(),
      type: Joi.string().optional()
    })
  ).default([])
}).required();
