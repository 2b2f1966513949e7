import * as fs from 'fs-extra';
import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { DEPENDENCY_TYPES, RUN_DEPEND_TYPES, manifestSchema } from './constants';
import { NotFoundError, ParseError } from './errors';
import { Dependency, DependencyType, PackageUrl, Person, UpstreamManifest } from './types';

type XmlNode = Record<string, unknown>;

interface RawFields {
  name?: string;
  version?: string;
  format?: number;
  description: string;
  maintainers: Person[];
  authors: Person[];
  licenses: string[];
  urls: PackageUrl[];
}

const ATTRIBUTES_KEY = ':@';
const TEXT_KEY = '#text';

function isNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isDependencyType(name: string): name is DependencyType {
  return DEPENDENCY_TYPES.some(type => type === name);
}

function tagOf(node: XmlNode): string | undefined {
  return Object.keys(node).find(key => key !== ATTRIBUTES_KEY && key !== TEXT_KEY);
}

function childrenOf(node: XmlNode, tag: string): XmlNode[] {
  const children = node[tag];
  return Array.isArray(children) ? children.filter(isNode) : [];
}

function collectText(nodes: XmlNode[]): string[] {
  return nodes.flatMap(node => {
    const text = node[TEXT_KEY];
    if (typeof text === 'string') return [text];
    const tag = tagOf(node);
    return tag === undefined ? [] : collectText(childrenOf(node, tag));
  });
}

// Text of an element, including text nested in inline markup.
function textOf(node: XmlNode, tag: string): string {
  return collectText(childrenOf(node, tag)).join(' ').trim();
}

function attributeOf(node: XmlNode, name: string): string | undefined {
  const attributes = node[ATTRIBUTES_KEY];
  if (!isNode(attributes)) return undefined;
  const value = attributes[`@_${name}`];
  return typeof value === 'string' ? value : undefined;
}

function attributesOf(node: XmlNode): Record<string, string> {
  const attributes = node[ATTRIBUTES_KEY];
  const result: Record<string, string> = {};
  if (!isNode(attributes)) return result;
  for (const [key, value] of Object.entries(attributes)) {
    if (typeof value === 'string') {
      result[key.replace(/^@_/, '')] = value;
    }
  }
  return result;
}

function dependency(name: string, type: DependencyType, attributes: Record<string, string>): Dependency {
  return Object.keys(attributes).length === 0 ? { name, type } : { name, type, attributes };
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Reads upstream ROS `package.xml` manifests (formats 1 to 3) into
 * {@link UpstreamManifest} records. Dependencies keep their document order.
 */
export class ManifestReader {
  private readonly parser = new XMLParser({
    preserveOrder: true,
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    parseTagValue: false,
    parseAttributeValue: false,
    trimValues: true,
  });

  async read(manifestPath: string): Promise<UpstreamManifest> {
    if (!await fs.pathExists(manifestPath)) {
      throw new NotFoundError(manifestPath, 'Manifest');
    }
    const xml = await fs.readFile(manifestPath, 'utf8');
    return this.parse(xml, manifestPath);
  }

  parse(xml: string, source = '<string>'): UpstreamManifest {
    const validation = XMLValidator.validate(xml);
    if (validation !== true) {
      throw new ParseError(source, `${validation.err.msg} (line ${validation.err.line})`);
    }

    const document: unknown = this.parser.parse(xml);
    const root = (Array.isArray(document) ? document : [])
      .filter(isNode)
      .find(node => tagOf(node) === 'package');
    if (!root) {
      throw new ParseError(source, 'missing <package> root element', 'package');
    }

    const formatAttribute = attributeOf(root, 'format');
    const format = formatAttribute === undefined ? 1 : Number(formatAttribute);
    const raw: RawFields = {
      format: formatAttribute === undefined ? undefined : format,
      description: '',
      maintainers: [],
      authors: [],
      licenses: [],
      urls: [],
    };
    const dependencies: Dependency[] = [];

    for (const element of childrenOf(root, 'package')) {
      const tag = tagOf(element);
      if (tag === undefined) continue;
      const text = textOf(element, tag);

      if (tag === 'name' || tag === 'version' || tag === 'description') {
        raw[tag] = text;
      } else if (tag === 'maintainer' || tag === 'author') {
        const person = { name: text, email: attributeOf(element, 'email') };
        (tag === 'maintainer' ? raw.maintainers : raw.authors).push(person);
      } else if (tag === 'license') {
        raw.licenses.push(text);
      } else if (tag === 'url') {
        raw.urls.push({ url: text, type: attributeOf(element, 'type') });
      } else if (tag === 'run_depend') {
        if (format !== 1) {
          throw new ParseError(source, `<run_depend> is not allowed in format ${format}`, 'dependencies');
        }
        if (text === '') {
          throw new ParseError(source, 'empty <run_depend> element', 'dependencies');
        }
        for (const type of RUN_DEPEND_TYPES) {
          dependencies.push(dependency(text, type, attributesOf(element)));
        }
      } else if (isDependencyType(tag)) {
        if (text === '') {
          throw new ParseError(source, `empty <${tag}> element`, 'dependencies');
        }
        dependencies.push(dependency(text, tag, attributesOf(element)));
      }
    }

    const result = manifestSchema.validate(raw);
    if (result.error) {
      const detail = result.error.details[0];
      throw new ParseError(source, detail.message, detail.path.join('.'));
    }
    const value = result.value;

    const manifest: UpstreamManifest = {
      name: value.name,
      version: value.version,
      versionSuffix: '',
      format: value.format,
      description: value.description,
      dependencies,
      maintainers: value.maintainers,
      authors: value.authors,
      licenses: value.licenses,
      urls: value.urls,
    };
    return deepFreeze(manifest);
  }

  // `VERSION_SUFFIX pre2` in the upstream CMakeLists.txt becomes `-pre2`.
  async readVersionSuffix(cmakePath: string): Promise<string> {
    if (!await fs.pathExists(cmakePath)) {
      throw new NotFoundError(cmakePath, 'CMake file');
    }
    const content = await fs.readFile(cmakePath, 'utf8');
    const match = /VERSION_SUFFIX.* (pre\d*)/.exec(content);
    return match ? `-${match[1]}` : '';
  }

  async readWithSuffix(manifestPath: string, cmakePath: string): Promise<UpstreamManifest> {
    const manifest = await this.read(manifestPath);
    const versionSuffix = await this.readVersionSuffix(cmakePath);
    return deepFreeze({ ...manifest, versionSuffix });
  }
}
