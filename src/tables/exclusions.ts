import { z } from 'zod';

import { deepFreeze, loadDataFile } from './dataFile.js';

const hostList = z.array(z.string().min(3));

const exclusionFileSchema = z.object({
  marketplaces: hostList,
  socialMedia: hostList,
  informationSites: hostList,
  reviewSites: hostList,
  searchEngines: hostList,
  newsMedia: hostList,
  b2bDirectories: hostList
});

type ExclusionTable = z.output<typeof exclusionFileSchema>;

let table: ExclusionTable | null = null;

function getTable(): ExclusionTable {
  if (!table) {
    table = deepFreeze(loadDataFile('exclusions.json', exclusionFileSchema));
  }
  return table;
}

export interface ExclusionOptions {
  includeB2bDirectories?: boolean;
}

export function getExclusionList(options: ExclusionOptions = {}): string[] {
  const exclusions = getTable();
  const hosts = [
    ...exclusions.marketplaces,
    ...exclusions.socialMedia,
    ...exclusions.informationSites,
    ...exclusions.reviewSites,
    ...exclusions.searchEngines,
    ...exclusions.newsMedia
  ];
  if (options.includeB2bDirectories ?? true) {
    hosts.push(...exclusions.b2bDirectories);
  }
  return hosts;
}

export function buildExclusionSuffix(hosts: readonly string[]): string {
  return hosts.map((host) => `-site:${host}`).join(' ');
}

export function isExcludedDomain(domain: string, hosts: readonly string[]): boolean {
  if (!domain) {
    return false;
  }
  return hosts.some((host) => domain === host || domain.endsWith(`.${host}`));
}
