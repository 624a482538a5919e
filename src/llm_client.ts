import OpenAI from "openai";
import type {
    ChatCompletion,
    ChatCompletionCreateParamsNonStreaming,
    ChatCompletionMessageParam,
    ChatCompletionTool,
} from "openai/resources/chat/completions";
import type { ReadyOpenAIConfig } from "./config/app_config";
import { AIServiceError, describeError } from "./errors";
import { createMessageFormatter } from "./formatters/formatter_factory";
import type { MessageFormatter } from "./formatters/message_formatter";
import type { MessageInput, ToolCall } from "./history/models";
import { getLogger } from "./logger";

const logger = getLogger("llm_client");

export interface CompletionRequest {
    messages: readonly MessageInput[];
    tools?: ChatCompletionTool[];
    /** Overrides the client's default model. */
    model?: string;
    maxTokens?: number;
}

export interface TokenUsage {
    model: string;
    promptTokens: number;
    completionTokens: number;
    totalTokens: number;
}

export type AIResponse =
    | { type: "text"; content: string; usage?: TokenUsage }
    | { type: "tool_calls"; content: string | null; calls: ToolCall[]; usage?: TokenUsage };

/** Boundary to a hosted model. Failures surface as `AIServiceError`. */
export interface AIServiceClient {
    complete(request: CompletionRequest): Promise<AIResponse>;
}

/** The slice of the SDK the client calls; tests pass a stub. */
export interface ChatCompletionsApi {
    create(body: ChatCompletionCreateParamsNonStreaming): Promise<ChatCompletion>;
}

export interface OpenAIServiceClientOptions {
    completions: ChatCompletionsApi;
    model: string;
    /** Builds the Chat Completions `messages`; the stock OpenAI formatter when omitted. */
    formatter?: MessageFormatter<ChatCompletionMessageParam[]>;
}

export class OpenAIServiceClient implements AIServiceClient {
    private readonly completions: ChatCompletionsApi;
    private readonly formatter: MessageFormatter<ChatCompletionMessageParam[]>;
    readonly model: string;

    constructor(options: OpenAIServiceClientOptions) {
        this.completions = options.completions;
        this.model = options.model;
        this.formatter = options.formatter ?? createMessageFormatter("openai");
    }

    static fromConfig(config: ReadyOpenAIConfig): OpenAIServiceClient {
        const client = new OpenAI({ apiKey: config.apiKey, baseURL: config.baseUrl });
        return new OpenAIServiceClient({ completions: client.chat.completions, model: config.model });
    }

    async complete(request: CompletionRequest): Promise<AIResponse> {
        const body: ChatCompletionCreateParamsNonStreaming = {
            model: request.model ?? this.model,
            messages: this.formatter.formatMessages(request.messages),
        };
        if (request.tools?.length) {
            body.tools = request.tools;
            body.tool_choice = "auto";
        }
        if (request.maxTokens !== undefined) body.max_tokens = request.maxTokens;

        logger.debug(
            { model: body.model, messages: body.messages.length, tools: request.tools?.length ?? 0 },
            "chat completion request"
        );

        let completion: ChatCompletion;
        try {
            completion = await this.completions.create(body);
        } catch (error) {
            throw toServiceError(error);
        }
        const response = toResponse(completion, body.model);
        logger.debug({ type: response.type, usage: response.usage }, "chat completion response");
        return response;
    }

    /** Tool-less completion returning the reply text. */
    async generateText(messages: readonly MessageInput[], options: { maxTokens?: number } = {}): Promise<string> {
        const response = await this.complete({ messages, maxTokens: options.maxTokens });
        return response.content ?? "";
    }
}

function toResponse(completion: ChatCompletion, requestedModel: string): AIResponse {
    const message = completion.choices[0]?.message;
    if (!message) throw new AIServiceError("OpenAI response contained no choices");

    const usage: TokenUsage | undefined = completion.usage
        ? {
              model: completion.model || requestedModel,
              promptTokens: completion.usage.prompt_tokens,
              completionTokens: completion.usage.completion_tokens,
              totalTokens: completion.usage.total_tokens,
          }
        : undefined;

    const calls: ToolCall[] = (message.tool_calls ?? []).map((call) => ({
        id: call.id,
        name: call.function.name,
        arguments: call.function.arguments,
    }));
    if (calls.length) return { type: "tool_calls", content: message.content, calls, usage };
    return { type: "text", content: message.content ?? "", usage };
}

function toServiceError(error: unknown): AIServiceError {
    if (error instanceof AIServiceError) return error;
    if (error instanceof OpenAI.APIError) {
        logger.error({ status: error.status, code: error.code }, "OpenAI request failed");
        return new AIServiceError(`OpenAI request failed: ${error.message}`, error.status, error);
    }
    logger.error({ err: error }, "OpenAI request failed");
    return new AIServiceError(`OpenAI request failed: ${describeError(error)}`, undefined, error);
}
