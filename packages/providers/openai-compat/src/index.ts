export {
  OpenAICompatibleProvider,
  type OpenAICompatibleConfig,
  normalizeBaseUrl,
  toWireMessages,
  extractThinking,
  parseToolArgs,
} from "./provider";
export { classifyError, buildErrorHint, HttpStatusError } from "./errors";
export { WireResponseSchema } from "./wire";
export type { WireMessage, WireToolDef, WireToolCall, WireRequest, WireResponse } from "./wire";
