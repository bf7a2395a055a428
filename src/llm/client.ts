/**
 * LLM Client — Thin wrapper around the Vercel AI SDK.
 *
 * The Vercel AI SDK (`ai` package) provides:
 *  - Provider-agnostic model interface (OpenAI, Anthropic, Google, local)
 *  - `generateObject()` with native Zod schema validation
 *  - Multi-step tool calling through `generateText({ tools, stopWhen })`
 *  - Token usage tracking
 *
 * Agents depend on the `ModelClient` interface, not on this class, so tests
 * can stand in a scripted client. Every structured reply is parsed again
 * with its Zod schema here; a reply that does not conform throws
 * `StructuredOutputError` and the caller takes its fallback path.
 */
import type { LanguageModel, ToolSet } from "ai";
import { generateObject, generateText, Output, stepCountIs } from "ai";
import type { ZodType } from "zod/v4";
import { StructuredOutputError } from "../errors/index.js";

/** Options for an LLM generation request. */
export interface GenerateOptions {
    /** Override the default model for this request. */
    model?: LanguageModel;
    temperature?: number;
    frequencyPenalty?: number;
    /** Name of the calling agent, used in error messages. */
    agent?: string;
}

export interface ToolGenerateOptions extends GenerateOptions {
    /** Model/tool round-trips before the call must answer. Default: 5 */
    maxSteps?: number;
}

/** Result of a text generation (free-form). */
export interface TextResult {
    text: string;
    tokenUsage: number;
}

/** Result of a structured object generation (Zod-validated). */
export interface ObjectResult<T> {
    object: T;
    tokenUsage: number;
}

/**
 * Tool-using calls report the tools they invoked, in call order, alongside the
 * reply itself. Each call owns its record; nothing is tracked globally.
 */
export interface ToolUsage {
    toolCalls: string[];
}

export type ToolTextResult = TextResult & ToolUsage;
export type ToolObjectResult<T> = ObjectResult<T> & ToolUsage;

/** The calls agents make against a language model. */
export interface ModelClient {
    generateText(system: string, prompt: string, options?: GenerateOptions): Promise<TextResult>;
    generateObject<T>(schema: ZodType<T>, system: string, prompt: string, options?: GenerateOptions): Promise<ObjectResult<T>>;
    generateTextWithTools(
        system: string,
        prompt: string,
        tools: ToolSet,
        options?: ToolGenerateOptions,
    ): Promise<ToolTextResult>;
    generateObjectWithTools<T>(
        schema: ZodType<T>,
        system: string,
        prompt: string,
        tools: ToolSet,
        options?: ToolGenerateOptions,
    ): Promise<ToolObjectResult<T>>;
}

/** Parse a reply against its schema, failing closed. */
export function validateReply<T>(schema: ZodType<T>, value: unknown, agent = "model"): T {
    const parsed = schema.safeParse(value);
    if (!parsed.success) {
        const detail = parsed.error.issues
            .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
            .join("; ");
        throw new StructuredOutputError(agent, detail);
    }
    return parsed.data;
}

/**
 * LLM client that wraps Vercel AI SDK's generateText/generateObject.
 * Agents hold a reference to this client and call it each turn.
 */
export class LLMClient implements ModelClient {
    public readonly model: LanguageModel;

    constructor(model: LanguageModel) {
        this.model = model;
    }

    /**
     * Generate a free-form text response.
     */
    async generateText(
        system: string,
        prompt: string,
        options?: GenerateOptions,
    ): Promise<TextResult> {
        const result = await generateText({
            model: options?.model ?? this.model,
            system,
            prompt,
            temperature: options?.temperature ?? 0.7,
            frequencyPenalty: options?.frequencyPenalty ?? 0.0,
        });

        return {
            text: result.text,
            tokenUsage: result.usage.totalTokens ?? 0,
        };
    }

    /**
     * Generate a structured object validated against a Zod schema.
     */
    async generateObject<T>(
        schema: ZodType<T>,
        system: string,
        prompt: string,
        options?: GenerateOptions,
    ): Promise<ObjectResult<T>> {
        const result = await generateObject({
            model: options?.model ?? this.model,
            schema,
            system,
            prompt,
            temperature: options?.temperature ?? 0.7,
            frequencyPenalty: options?.frequencyPenalty ?? 0.0,
        });

        return {
            object: validateReply(schema, result.object, options?.agent),
            tokenUsage: result.usage.totalTokens ?? 0,
        };
    }

    /**
     * Free-form text from a model that may call the given tools first.
     */
    async generateTextWithTools(
        system: string,
        prompt: string,
        tools: ToolSet,
        options?: ToolGenerateOptions,
    ): Promise<ToolTextResult> {
        const result = await generateText({
            model: options?.model ?? this.model,
            system,
            prompt,
            tools,
            stopWhen: stepCountIs(options?.maxSteps ?? 5),
            temperature: options?.temperature ?? 0.7,
            frequencyPenalty: options?.frequencyPenalty ?? 0.0,
        });

        return {
            text: result.text,
            tokenUsage: result.totalUsage.totalTokens ?? 0,
            toolCalls: result.steps.flatMap((step) => step.toolCalls.map((call) => call.toolName)),
        };
    }

    /**
     * Structured object from a model that may call the given tools first.
     * The final step must answer in the schema's shape.
     */
    async generateObjectWithTools<T>(
        schema: ZodType<T>,
        system: string,
        prompt: string,
        tools: ToolSet,
        options?: ToolGenerateOptions,
    ): Promise<ToolObjectResult<T>> {
        const result = await generateText({
            model: options?.model ?? this.model,
            system,
            prompt,
            tools,
            stopWhen: stepCountIs(options?.maxSteps ?? 5),
            experimental_output: Output.object({ schema }),
            temperature: options?.temperature ?? 0.7,
            frequencyPenalty: options?.frequencyPenalty ?? 0.0,
        });

        return {
            object: validateReply(schema, result.experimental_output, options?.agent),
            tokenUsage: result.totalUsage.totalTokens ?? 0,
            toolCalls: result.steps.flatMap((step) => step.toolCalls.map((call) => call.toolName)),
        };
    }
}
