/**
 * Error taxonomy shared by the registry, history and orchestration layers.
 *
 * Every error carries a stable snake_case `code` so callers (bot, CLI, tool
 * payloads) can branch without string-matching messages.
 */

export type ToolkitErrorCode =
    | "tool_duplicate"
    | "schema_mismatch"
    | "tool_unknown"
    | "invalid_arguments"
    | "tool_execution_failed"
    | "conversation_not_found"
    | "invalid_message"
    | "storage_failed"
    | "ai_service_failed"
    | "tool_loop_exceeded"
    | "config_invalid";

export class ToolkitError extends Error {
    readonly code: ToolkitErrorCode;

    constructor(code: ToolkitErrorCode, message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = new.target.name;
        this.code = code;
    }
}

export class DuplicateToolError extends ToolkitError {
    constructor(readonly toolName: string) {
        super("tool_duplicate", `Tool already registered: ${toolName}`);
    }
}

export class SchemaMismatchError extends ToolkitError {
    constructor(readonly toolName: string, detail: string) {
        super("schema_mismatch", `Tool '${toolName}' schema mismatch: ${detail}`);
    }
}

export class UnknownToolError extends ToolkitError {
    constructor(readonly toolName: string) {
        super("tool_unknown", `Unknown tool: ${toolName}`);
    }
}

export class InvalidArgumentsError extends ToolkitError {
    constructor(readonly toolName: string, readonly issues: string[]) {
        super("invalid_arguments", `Invalid arguments for tool '${toolName}': ${issues.join("; ")}`);
    }
}

export class ToolExecutionError extends ToolkitError {
    constructor(readonly toolName: string, cause: unknown) {
        super("tool_execution_failed", `Tool '${toolName}' failed: ${describeError(cause)}`, { cause });
    }
}

export class ConversationNotFoundError extends ToolkitError {
    constructor(readonly conversationId: string) {
        super("conversation_not_found", `Conversation not found: ${conversationId}`);
    }
}

export class InvalidMessageError extends ToolkitError {
    constructor(message: string) {
        super("invalid_message", message);
    }
}

export class StorageError extends ToolkitError {
    constructor(message: string, cause?: unknown) {
        super("storage_failed", cause === undefined ? message : `${message}: ${describeError(cause)}`, { cause });
    }
}

export class AIServiceError extends ToolkitError {
    constructor(message: string, readonly status?: number, cause?: unknown) {
        super("ai_service_failed", message, { cause });
    }
}

export class ToolLoopExceededError extends ToolkitError {
    constructor(readonly maxToolRounds: number) {
        super("tool_loop_exceeded", `Model kept requesting tools after ${maxToolRounds} round(s)`);
    }
}

export class ConfigError extends ToolkitError {
    constructor(message: string) {
        super("config_invalid", message);
    }
}

/** Registry failures that are reported back to the model instead of aborting a cycle. */
export type ToolError = UnknownToolError | InvalidArgumentsError | ToolExecutionError;

export function isToolError(error: unknown): error is ToolError {
    return (
        error instanceof UnknownToolError ||
        error instanceof InvalidArgumentsError ||
        error instanceof ToolExecutionError
    );
}

export function isToolkitError(error: unknown): error is ToolkitError {
    return error instanceof ToolkitError;
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
