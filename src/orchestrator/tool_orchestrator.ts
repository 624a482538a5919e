import { DEFAULT_MAX_TOOL_ROUNDS } from "../config/app_config";
import {
    AIServiceError,
    InvalidArgumentsError,
    ToolExecutionError,
    ToolLoopExceededError,
    UnknownToolError,
    describeError,
    isToolError,
    isToolkitError,
    type ToolError,
} from "../errors";
import type { HistoryManager } from "../history/history_manager";
import type { MessageInput, ToolCall } from "../history/models";
import { encodingForModel, type TrimOptions } from "../history/trimming";
import type { AIResponse, AIServiceClient } from "../llm_client";
import { getLogger } from "../logger";
import { formatContextNotes } from "../system_prompt";
import type { ToolRegistry } from "../tools/tool_registry";
import { NoOpUsageTracker, createUsageEvent, type UsageTracker } from "../usage/usage_tracker";

const logger = getLogger("orchestrator");

export interface ToolCallOutcome {
    call: ToolCall;
    ok: boolean;
    /** Text appended as the tool message. */
    content: string;
}

export interface ToolOrchestratorOptions {
    registry: ToolRegistry;
    history: HistoryManager;
    client: AIServiceClient;
    usage?: UsageTracker;
    /** Tool-call rounds executed before a further request fails the cycle. */
    maxToolRounds?: number;
    /** Window sent to the model on each dispatch. Token budgets use the model's encoding unless one is given. */
    trim?: TrimOptions;
    model?: string;
    onToolCall?: (outcome: ToolCallOutcome) => void;
}

function safeJsonParse(value: string): { ok: true; data: unknown } | { ok: false; error: string } {
    try {
        return { ok: true, data: JSON.parse(value) };
    } catch (err) {
        return { ok: false, error: describeError(err) };
    }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Tool results are sent as text: strings verbatim, everything else as JSON. */
export function serializeToolResult(result: unknown): string {
    if (typeof result === "string") return result;
    try {
        return JSON.stringify(result) ?? "null";
    } catch (err) {
        logger.warn({ err }, "tool result is not JSON-serializable");
        return String(result);
    }
}

export function toolErrorPayload(error: ToolError, toolName: string): string {
    return JSON.stringify({
        error: { type: error.name, code: error.code, message: error.message, tool: toolName },
    });
}

/**
 * Runs the dispatch / tool-call / resubmit cycle for one conversation.
 * Callers serialize cycles per conversation; different conversations may
 * run concurrently against the same orchestrator.
 */
export class ToolOrchestrator {
    private readonly registry: ToolRegistry;
    private readonly history: HistoryManager;
    private readonly client: AIServiceClient;
    private readonly usage: UsageTracker;
    private readonly maxToolRounds: number;
    private readonly trim: TrimOptions;
    private readonly model?: string;
    private readonly onToolCall?: (outcome: ToolCallOutcome) => void;

    constructor(options: ToolOrchestratorOptions) {
        const maxToolRounds = options.maxToolRounds ?? DEFAULT_MAX_TOOL_ROUNDS;
        if (!Number.isInteger(maxToolRounds) || maxToolRounds < 0) {
            throw new RangeError(`maxToolRounds must be a non-negative integer, got ${maxToolRounds}`);
        }
        this.registry = options.registry;
        this.history = options.history;
        this.client = options.client;
        this.usage = options.usage ?? new NoOpUsageTracker();
        this.maxToolRounds = maxToolRounds;
        const trim = options.trim ?? {};
        this.trim =
            trim.encoding === undefined && options.model !== undefined
                ? { ...trim, encoding: encodingForModel(options.model) }
                : trim;
        this.model = options.model;
        this.onToolCall = options.onToolCall;
    }

    /** Appends the user's text and runs a cycle; resolves with the assistant's reply. */
    async respond(conversationId: string, userText: string): Promise<string> {
        await this.settlePendingCalls(conversationId);
        await this.history.addMessage(conversationId, "user", userText);
        return this.cycle(conversationId);
    }

    /**
     * Runs a cycle over the stored history. Every message appended before a
     * failure stays in place; tool calls such a failure left unanswered are
     * answered with an error payload when the conversation is next used.
     */
    async run(conversationId: string): Promise<string> {
        await this.settlePendingCalls(conversationId);
        return this.cycle(conversationId);
    }

    private async cycle(conversationId: string): Promise<string> {
        for (let round = 0; ; round++) {
            const messages = await this.buildRequestMessages(conversationId);
            const response = await this.dispatch(messages);
            this.recordUsage(conversationId, response);

            if (response.type === "text") {
                await this.history.addMessage(conversationId, "assistant", response.content);
                return response.content;
            }

            if (round >= this.maxToolRounds) {
                logger.warn({ conversationId, maxToolRounds: this.maxToolRounds }, "tool loop exceeded");
                throw new ToolLoopExceededError(this.maxToolRounds);
            }

            await this.history.addMessage(conversationId, "assistant", response.content, {
                toolCalls: response.calls,
            });
            logger.info(
                { conversationId, round: round + 1, tools: response.calls.map((call) => call.name) },
                "executing tool calls"
            );
            for (const call of response.calls) {
                const outcome = await this.executeCall(call);
                await this.history.addMessage(conversationId, "tool", outcome.content, {
                    toolCallId: call.id,
                    name: call.name,
                });
                this.onToolCall?.(outcome);
            }
        }
    }

    private async settlePendingCalls(conversationId: string): Promise<void> {
        const pending = await this.history.getPendingToolCalls(conversationId);
        if (pending.length === 0) return;

        logger.warn({ conversationId, callIds: pending.map((call) => call.id) }, "answering interrupted tool calls");
        for (const call of pending) {
            const interrupted = new Error("interrupted before it produced a result");
            const outcome = this.failed(call, new ToolExecutionError(call.name, interrupted));
            await this.history.addMessage(conversationId, "tool", outcome.content, {
                toolCallId: call.id,
                name: call.name,
            });
        }
    }

    /**
     * Trimmed history plus the conversation's context notes as a system
     * message right after the leading system prompt. The notes are never stored.
     */
    private async buildRequestMessages(conversationId: string): Promise<MessageInput[]> {
        const messages: MessageInput[] = await this.history.getMessages(conversationId, this.trim);
        const notes = formatContextNotes(await this.history.getContext(conversationId));
        if (notes === null) return messages;

        const insertAt = messages[0]?.role === "system" ? 1 : 0;
        messages.splice(insertAt, 0, { role: "system", content: notes });
        return messages;
    }

    private async dispatch(messages: MessageInput[]): Promise<AIResponse> {
        try {
            return await this.client.complete({
                messages,
                tools: this.registry.exportSchemas(),
                model: this.model,
            });
        } catch (error) {
            if (isToolkitError(error)) throw error;
            throw new AIServiceError(`AI service request failed: ${describeError(error)}`, undefined, error);
        }
    }

    private recordUsage(conversationId: string, response: AIResponse): void {
        if (response.usage) this.usage.track(createUsageEvent(conversationId, response.usage));
    }

    private async executeCall(call: ToolCall): Promise<ToolCallOutcome> {
        if (!this.registry.has(call.name)) {
            return this.failed(call, new UnknownToolError(call.name));
        }

        const parsed = safeJsonParse(call.arguments.trim() || "{}");
        if (!parsed.ok) {
            return this.failed(call, new InvalidArgumentsError(call.name, [`arguments are not valid JSON: ${parsed.error}`]));
        }
        if (!isPlainObject(parsed.data)) {
            return this.failed(call, new InvalidArgumentsError(call.name, ["arguments must be a JSON object"]));
        }

        try {
            const result = await this.registry.execute(call.name, parsed.data);
            return { call, ok: true, content: serializeToolResult(result) };
        } catch (error) {
            if (isToolError(error)) return this.failed(call, error);
            throw error;
        }
    }

    private failed(call: ToolCall, error: ToolError): ToolCallOutcome {
        logger.warn({ tool: call.name, callId: call.id, code: error.code }, error.message);
        return { call, ok: false, content: toolErrorPayload(error, call.name) };
    }
}
