// __tests__/naming.test.ts

import { DEFAULT_CONFIG } from '../src/constants';
import {
  buildDocsDeprecated,
  cmakeArgs,
  cmakePkgName,
  createVendorName,
  githubPkgName,
  hasPatches,
  hasTrait,
  isVendoredLibrary,
  removeVersion,
  splitVersion,
  stableUnique,
  vendorNameFor,
  vendorizeDependency,
} from '../src/naming';
import { GeneratorConfig } from '../src/types';

const config = DEFAULT_CONFIG;

describe('vendor naming', () => {
  describe('removeVersion', () => {
    it('should split the major version off the package name', () => {
      expect(removeVersion('gz-math7')).toEqual(['gz-math', '7']);
      expect(removeVersion('sdformat14')).toEqual(['sdformat', '14']);
      expect(removeVersion('gz-fuel_tools10')).toEqual(['gz-fuel_tools', '10']);
    });

    it('should accept names without a version', () => {
      expect(removeVersion('gz-math')).toEqual(['gz-math', '']);
    });

    it('should reject names it cannot parse', () => {
      expect(() => removeVersion('7up')).toThrow('Could not parse package name');
    });
  });

  describe('createVendorName', () => {
    it('should use underscores and a _vendor suffix by default', () => {
      expect(createVendorName('gz-math', config.naming)).toBe('gz_math_vendor');
    });

    it('should follow the configured naming', () => {
      expect(createVendorName('gz-math', { prefix: '', separator: '-', suffix: '-vendor' })).toBe('gz-math-vendor');
      expect(createVendorName('gz-math', { prefix: 'ros-', separator: '_', suffix: '' })).toBe('ros-gz_math');
    });

    it('should derive the vendor name from a manifest', () => {
      expect(vendorNameFor({ name: 'sdformat14' }, config)).toBe('sdformat_vendor');
    });
  });

  describe('dependencies', () => {
    it('should recognise vendored libraries regardless of their major version', () => {
      expect(isVendoredLibrary({ name: 'gz-utils2', type: 'depend' }, config)).toBe(true);
      expect(isVendoredLibrary({ name: 'dartsim', type: 'build_depend' }, config)).toBe(true);
      expect(isVendoredLibrary({ name: 'eigen', type: 'depend' }, config)).toBe(false);
      expect(isVendoredLibrary({ name: 'python3-numpy', type: 'exec_depend' }, config)).toBe(false);
    });

    it('should map dependencies to their vendor packages', () => {
      expect(vendorizeDependency({ name: 'gz-utils2', type: 'depend' }, config)).toBe('gz_utils_vendor');
      expect(vendorizeDependency({ name: 'libogre-next-2.3-dev', type: 'depend' }, config)).toBe('gz_ogre_next_vendor');
      expect(vendorizeDependency({ name: 'DART', type: 'depend' }, config)).toBe('gz_dartsim_vendor');
    });

    it('should keep the first occurrence of repeated items', () => {
      expect(stableUnique(['b', 'a', 'b', 'c', 'a'])).toEqual(['b', 'a', 'c']);
    });
  });

  describe('splitVersion', () => {
    it('should split int.int.int versions', () => {
      expect(splitVersion('7.2.0')).toEqual({ major: 7, minor: 2, patch: 0 });
    });

    it('should reject other version formats', () => {
      expect(() => splitVersion('7.2.0~pre1')).toThrow('Invalid version string, must be int.int.int: "7.2.0~pre1"');
    });
  });

  describe('library traits', () => {
    it('should override CMake and GitHub names for gz-fuel-tools', () => {
      expect(cmakePkgName('gz-fuel-tools', config)).toBe('gz-fuel_tools');
      expect(githubPkgName('gz-fuel_tools', config)).toBe('gz-fuel-tools');
      expect(cmakePkgName('gz-math', config)).toBe('gz-math');
    });

    it('should skip extras and dsv hooks for gz-cmake and gz-tools', () => {
      expect(hasTrait('gz-cmake', 'extraCmake', config)).toBe(false);
      expect(hasTrait('gz-tools', 'dsv', config)).toBe(false);
      expect(hasTrait('gz-math', 'extraCmake', config)).toBe(true);
      expect(hasTrait('gz-math', 'dsv', config)).toBe(true);
    });

    it('should only patch gz-cmake before version 4 and gz-rendering', () => {
      expect(hasPatches('gz-cmake', '3', config)).toBe(true);
      expect(hasPatches('gz-cmake', '4', config)).toBe(false);
      expect(hasPatches('gz-rendering', '8', config)).toBe(true);
      expect(hasPatches('gz-math', '7', config)).toBe(false);
    });

    it('should treat gz-cmake4 and its dependents as having no BUILD_DOCS option', () => {
      expect(buildDocsDeprecated({ name: 'gz-cmake4', dependencies: [] })).toBe(true);
      expect(buildDocsDeprecated({ name: 'gz-math8', dependencies: [{ name: 'gz-cmake4', type: 'build_depend' }] })).toBe(true);
      expect(buildDocsDeprecated({ name: 'gz-math7', dependencies: [{ name: 'gz-cmake3', type: 'build_depend' }] })).toBe(false);
      expect(buildDocsDeprecated({ name: 'gz-math8', dependencies: [{ name: 'gz-cmake4', type: 'test_depend' }] })).toBe(false);
    });

    it('should build the CMake arguments for each library', () => {
      const gzCmake3 = [{ name: 'gz-cmake3', type: 'build_depend' as const }];

      expect(cmakeArgs({ name: 'gz-math7', dependencies: gzCmake3 }, config)).toEqual([
        '-DBUILD_DOCS:BOOL=OFF',
        '-DSKIP_PYBIND11:BOOL=ON',
        '-DSKIP_SWIG:BOOL=ON',
      ]);
      expect(cmakeArgs({ name: 'sdformat14', dependencies: gzCmake3 }, config)).toEqual(['-DSKIP_PYBIND11:BOOL=ON']);
      expect(cmakeArgs({ name: 'gz-utils3', dependencies: [{ name: 'gz-cmake4', type: 'build_depend' }] }, config)).toEqual([]);
    });

    it('should read traits from the given configuration', () => {
      const custom: GeneratorConfig = {
        ...config,
        traits: { ...config.traits, swig: [], pybind11: [], noDocs: ['gz-math'] },
      };

      expect(cmakeArgs({ name: 'gz-math7', dependencies: [] }, custom)).toEqual([]);
    });
  });
});
