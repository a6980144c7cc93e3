// Path layout: every checkpoint and export file lives under dataDir

import { join } from "node:path";


/** Optional config file: ./config.json, overridable with CONFIG_PATH */
export function configFilePath(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): string {
  const override = env.CONFIG_PATH?.trim();
  return override ? override : join(cwd, "config.json");
}


function safeSegment(s: string): string {
  return s.replace(/[^a-zA-Z0-9._-]/g, "_");
}


export interface DataPaths {
  rawLinks(tag: string): string;
  rawArticles(year: number): string;
  extractionReport(year: number): string;
  filteredJson(year: number): string;
  filteredCsv(year: number): string;
}


export function dataPaths(dataDir: string): DataPaths {
  return {
    rawLinks: (tag) => join(dataDir, `raw_links_${safeSegment(tag)}.json`),
    rawArticles: (year) => join(dataDir, `articles_raw_${year}.json`),
    extractionReport: (year) => join(dataDir, `extraction_report_${year}.json`),
    filteredJson: (year) => join(dataDir, `articles_filtered_${year}.json`),
    filteredCsv: (year) => join(dataDir, `articles_filtered_${year}.csv`),
  };
}
