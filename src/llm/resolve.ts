import { openai } from "@ai-sdk/openai";
import { google } from "@ai-sdk/google";
import { anthropic } from "@ai-sdk/anthropic";
import type { LanguageModel } from "ai";

export const SUPPORTED_PROVIDERS = ["openai", "google", "anthropic"] as const;

/**
 * Resolves a LanguageModel based on provider and model names.
 * Falls back to ALLOC_PROVIDER and ALLOC_MODEL environment variables.
 * Defaults to OpenAI gpt-4o if nothing is specified.
 */
export function resolveLanguageModel(
    providerName?: string,
    modelId?: string
): LanguageModel {
    const provider = providerName || process.env.ALLOC_PROVIDER || "openai";
    const model = modelId || process.env.ALLOC_MODEL;

    switch (provider.toLowerCase()) {
        case "openai":
            return openai(model || "gpt-4o");
        case "google":
            return google(model || "gemini-1.5-pro");
        case "anthropic":
            return anthropic(model || "claude-3-5-sonnet-latest");
        default:
            throw new Error(`Unsupported LLM provider: ${provider}`);
    }
}

/** Environment variable holding the API key each provider reads. */
export function apiKeyVariable(providerName?: string): string {
    const provider = (providerName || process.env.ALLOC_PROVIDER || "openai").toLowerCase();
    switch (provider) {
        case "google":
            return "GOOGLE_GENERATIVE_AI_API_KEY";
        case "anthropic":
            return "ANTHROPIC_API_KEY";
        default:
            return "OPENAI_API_KEY";
    }
}
