export { ConfigDocumentError, parseDocument, parseSitesDocument } from './json';
export {
  normalizeSitesConfig,
  toTarget,
  type CheckDefaults,
  type NormalizedSitesConfig,
  type Target,
} from './normalize';
export {
  DEFAULT_OK_STATUS_RANGES,
  parseStatusRange,
  parseStatusRanges,
  type StatusRange,
} from './ranges';
export {
  MAX_TIMEOUT_SECONDS,
  defaultsConfigSchema,
  siteConfigSchema,
  sitesConfigSchema,
  slackWebhookUrlSchema,
  type DefaultsConfig,
  type SiteConfig,
  type SitesConfig,
} from './schema';
