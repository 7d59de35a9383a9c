export { parseCompanyRow } from './company-row.js';
export { RowCollector, collectCompaniesWithReset } from './row-collector.js';
export type { CollectStats, RowCollectorOptions } from './row-collector.js';
export { NavigationSession, PathDiscoveryNavigator, discoverProcessoLinks } from './navigator.js';
export type { NavigatorOptions } from './navigator.js';
export { canTransition, NAVIGATION_TRANSITIONS } from './types.js';
export type { PortalAdapter, RawLink, ScrollDirection } from './types.js';
