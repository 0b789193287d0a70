export {
  WebFetchTool,
  type WebFetchOptions,
  type WebFetchPayload,
  type WebFetchSuccess,
  type WebFetchFailure,
} from "./web-fetch-tool";
export {
  fetchWithRedirectValidation,
  isRedirectStatus,
  FetchError,
  MAX_REDIRECTS,
  DEFAULT_TIMEOUT_MS,
  type FetchChainOptions,
  type FetchChainResult,
} from "./fetcher";
export {
  validateUrl,
  isPrivateAddress,
  resolveHost,
  BLOCKED_HOSTNAMES,
  type ValidationResult,
  type HostResolver,
  type UrlGuardOptions,
} from "./url-guard";
export {
  extractContent,
  htmlToReadable,
  isHtml,
  stripBoilerplate,
  collapseWhitespace,
  type ExtractMode,
  type Extractor,
  type ExtractInput,
  type ExtractedContent,
} from "./extract";
