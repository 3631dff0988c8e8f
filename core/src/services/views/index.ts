export { TagCountsService, TAG_COUNTS_VIEW } from './tag-counts-service.js';
export type { RefreshMode, RefreshResult, TagCountsServiceOptions } from './tag-counts-service.js';
