// __tests__/cli.test.ts

import * as fs from 'fs-extra';
import * as path from 'path';
import { createProgram } from '../src/cli';
import { GZ_MATH_MANIFEST, makeTempDir } from './helpers';

describe('vendor-package CLI', () => {
  let testDir: string;
  let originalCwd: string;
  let consoleLogSpy: jest.SpyInstance;
  let consoleErrorSpy: jest.SpyInstance;
  let exitSpy: jest.SpyInstance;

  const run = (...args: string[]) => createProgram().parseAsync(['node', 'vendor-package', ...args]);

  beforeEach(async () => {
    originalCwd = process.cwd();
    testDir = await makeTempDir('vendor-cli-');
    process.chdir(testDir);
    consoleLogSpy = jest.spyOn(console, 'log').mockImplementation();
    consoleErrorSpy = jest.spyOn(console, 'error').mockImplementation();
    exitSpy = jest.spyOn(process, 'exit').mockImplementation((code?: string | number | null) => {
      throw new Error(`process.exit(${code})`);
    });
  });

  afterEach(async () => {
    process.chdir(originalCwd);
    consoleLogSpy.mockRestore();
    consoleErrorSpy.mockRestore();
    exitSpy.mockRestore();
    await fs.remove(testDir);
  });

  it('should register the commands', () => {
    const names = createProgram().commands.map(command => command.name());

    expect(names).toEqual(['create', 'update', 'preview', 'update-all', 'init']);
  });

  it('should create a vendor package named after the upstream package', async () => {
    await run('create', GZ_MATH_MANIFEST, '-y');

    expect(await fs.pathExists(path.join(testDir, 'gz_math_vendor', 'package.xml'))).toBe(true);
  });

  it('should apply the naming from the config file', async () => {
    await fs.writeJson(path.join(testDir, 'naming.json'), { naming: { separator: '-', suffix: '-vendor' } });

    await run('--config', 'naming.json', 'create', GZ_MATH_MANIFEST, 'out');
    const manifest = await fs.readFile(path.join(testDir, 'out', 'package.xml'), 'utf8');

    expect(manifest).toContain('  <name>gz-math-vendor</name>\n');
  });

  it('should print the preview without writing files', async () => {
    await run('preview', GZ_MATH_MANIFEST);

    expect(consoleLogSpy).toHaveBeenCalledWith(expect.stringContaining('--- package.xml'));
    expect(consoleLogSpy).toHaveBeenCalledWith(expect.stringContaining('--- CMakeLists.txt'));
    expect(await fs.readdir(testDir)).toEqual([]);
  });

  it('should exit with an error when updating a missing package', async () => {
    await expect(run('update', GZ_MATH_MANIFEST, 'missing')).rejects.toThrow('process.exit(1)');

    expect(consoleErrorSpy).toHaveBeenCalledWith(
      expect.stringContaining('Error:'),
      expect.stringContaining('missing')
    );
  });

  it('should exit with an error when a batch entry fails', async () => {
    await fs.outputFile(path.join(testDir, 'src', 'broken', 'package.xml'), '<package format="3">');

    await expect(run('update-all', 'src', 'vendor')).rejects.toThrow('process.exit(1)');
  });

  it('should write the default configuration on init', async () => {
    await run('init');

    expect(await fs.pathExists(path.join(testDir, 'vendor-config.json'))).toBe(true);
  });
});
