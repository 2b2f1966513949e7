import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';

export const FIXTURES_DIR = path.join(__dirname, 'fixtures');
export const GZ_MATH_MANIFEST = path.join(FIXTURES_DIR, 'gz-math7', 'package.xml');

export interface ManifestFields {
  name?: string;
  version?: string;
  description?: string;
  licenses?: string[];
  maintainers?: boolean;
  dependencies?: [string, string][];
}

export function manifestXml(fields: ManifestFields = {}): string {
  const lines = ['<?xml version="1.0"?>', '<package format="3">'];
  if (fields.name !== undefined) lines.push(`  <name>${fields.name}</name>`);
  if (fields.version !== undefined) lines.push(`  <version>${fields.version}</version>`);
  lines.push(`  <description>${fields.description ?? 'Test library'}</description>`);
  if (fields.maintainers !== false) {
    lines.push('  <maintainer email="maintainer@example.com">Test Maintainer</maintainer>');
  }
  for (const license of fields.licenses ?? ['Apache-2.0']) {
    lines.push(`  <license>${license}</license>`);
  }
  for (const [type, name] of fields.dependencies ?? []) {
    lines.push(`  <${type}>${name}</${type}>`);
  }
  lines.push('</package>', '');
  return lines.join('\n');
}

export async function writeManifest(dir: string, fields: ManifestFields): Promise<string> {
  const manifestPath = path.join(dir, 'package.xml');
  await fs.ensureDir(dir);
  await fs.writeFile(manifestPath, manifestXml(fields));
  return manifestPath;
}

export async function makeTempDir(prefix = 'vendor-package-test-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function readTree(dir: string): Promise<Record<string, string>> {
  const tree: Record<string, string> = {};
  for (const entry of (await fs.readdir(dir)).sort()) {
    tree[entry] = await fs.readFile(path.join(dir, entry), 'utf8');
  }
  return tree;
}
