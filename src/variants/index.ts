export { getDefaultCatalogPath, loadCatalog, parseCatalog } from './catalog.js';
export { CatalogError } from './errors.js';
export { type BuildDescriptorsOptions, buildDescriptors } from './factory.js';
export type { FamilyRecord, ToolCatalog, ToolRecord } from './schema.js';
