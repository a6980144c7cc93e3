export { compareArticles, filterAndExport, filterArticles, matchesCriteria, sortArticles } from "./filter.js";
export type { FilterCriteria, FilterExportResult } from "./filter.js";
