export { bindCatalog, loadCatalogFile, parseCatalog } from './catalog.js';
export type { CatalogEntry } from './catalog.js';
export { CATEGORY_PARAMETERS, QUERY_CATEGORIES, categoryHandler } from './categories.js';
export type { QueryCategory } from './categories.js';
export { DEFAULT_CATALOG } from './default-catalog.js';
