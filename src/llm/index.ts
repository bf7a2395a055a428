export { LLMClient, validateReply } from "./client.js";
export type {
    ModelClient,
    GenerateOptions,
    ToolGenerateOptions,
    TextResult,
    ObjectResult,
    ToolUsage,
    ToolTextResult,
    ToolObjectResult,
} from "./client.js";
export { resolveLanguageModel, apiKeyVariable, SUPPORTED_PROVIDERS } from "./resolve.js";
