export { VendorPackager } from './vendor-packager';
export { ManifestReader } from './manifest-reader';
export { PackageGenerator } from './package-generator';
export { TemplateRenderer } from './template-renderer';
export { loadConfig, initConfig } from './config';
export * from './naming';
export * from './errors';
export * from './types';
export * from './constants';
