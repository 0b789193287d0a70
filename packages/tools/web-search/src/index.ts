export {
  WebSearchTool,
  clampCount,
  formatResults,
  BRAVE_BASE_URL,
  type WebSearchOptions,
  type SearchResult,
  type Freshness,
} from "./web-search-tool";
