export { buildCatalog, checkTarget, isAllowed, listCatalog, checkAllowList } from './catalog.js';
export type { AllowListCheck } from './catalog.js';
