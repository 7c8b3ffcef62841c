import { parseStatusRanges, type StatusRange } from './ranges';
import type { SiteConfig, SitesConfig } from './schema';

export type Target = {
  url: string;
  expectedStatus: number | null;
  keyword: string | null;
  disabled: boolean;
  timeoutSeconds: number | null;
  retries: number | null;
};

export type CheckDefaults = {
  timeoutSeconds: number | null;
  retries: number | null;
};

export type NormalizedSitesConfig = {
  targets: Target[];
  defaults: CheckDefaults;
  okRanges: StatusRange[];
};

export function toTarget(site: SiteConfig): Target {
  const keyword = site.keyword ?? null;
  return {
    url: site.url,
    expectedStatus: site.expected_status ?? null,
    // An empty keyword would match every body.
    keyword: keyword && keyword.length > 0 ? keyword : null,
    disabled: site.disabled ?? false,
    timeoutSeconds: site.timeout ?? null,
    retries: site.retries ?? null,
  };
}

export function normalizeSitesConfig(config: SitesConfig): NormalizedSitesConfig {
  return {
    targets: config.sites.map(toTarget),
    defaults: {
      timeoutSeconds: config.defaults.timeout ?? null,
      retries: config.defaults.retries ?? null,
    },
    okRanges: parseStatusRanges(config.defaults.allow_status_ranges),
  };
}
