import pino, { type Logger } from "pino";
import type { LogLevel } from "./config/app_config";

export type { Logger } from "pino";

const RESULT_PREVIEW_LIMIT = 100;

let root: Logger | null = null;
const children = new Map<string, Logger>();

function isTestTooling(env: NodeJS.ProcessEnv): boolean {
    return env.VITEST === "true" || env.NODE_ENV === "test";
}

/** Test runs stay quiet whatever level the configuration asks for. */
export function resolveLogLevel(level: LogLevel, env: NodeJS.ProcessEnv = process.env): LogLevel {
    return isTestTooling(env) ? "silent" : level;
}

function rootLogger(): Logger {
    if (!root) {
        root = pino({
            level: resolveLogLevel("info"),
            base: { app: "ai-tools-core" },
            messageKey: "msg",
            timestamp: pino.stdTimeFunctions.isoTime,
            redact: { paths: ["apiKey", "token", "*.apiKey", "*.token"], censor: "[REDACTED]" },
        });
    }
    return root;
}

/**
 * Module-scoped child of the process logger. Modules grab theirs at import
 * time, before the configuration is loaded; `configureLogger` adjusts them all.
 */
export function getLogger(name: string): Logger {
    let child = children.get(name);
    if (!child) {
        child = rootLogger().child({ module: name });
        children.set(name, child);
    }
    return child;
}

/** Applies the validated `LOG_LEVEL` to the root logger and every module logger. */
export function configureLogger(level: LogLevel, env: NodeJS.ProcessEnv = process.env): void {
    const effective = resolveLogLevel(level, env);
    rootLogger().level = effective;
    for (const child of children.values()) child.level = effective;
}

function renderForLog(result: unknown): string {
    try {
        return JSON.stringify(result) ?? String(result);
    } catch {
        // BigInt values and circular structures have no JSON form.
        return String(result);
    }
}

export function previewResult(result: unknown): string {
    const text = typeof result === "string" ? result : renderForLog(result);
    return text.length > RESULT_PREVIEW_LIMIT ? `${text.slice(0, RESULT_PREVIEW_LIMIT - 3)}...` : text;
}

export function logToolExecution(toolName: string, args: Record<string, unknown>, result: unknown): void {
    const log = getLogger("tools");
    if (result === undefined || result === null) {
        log.warn({ tool: toolName, args }, "tool returned no result");
        return;
    }
    log.info({ tool: toolName, args, result: previewResult(result) }, "tool executed");
}
