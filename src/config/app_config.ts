import { resolve } from "node:path";
import { z } from "zod";
import { ConfigError } from "../errors";

export type ValueSource = "env" | "default" | "missing";

export const STORAGE_KINDS = ["memory", "file", "sqlite"] as const;
export type StorageKind = (typeof STORAGE_KINDS)[number];

export const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export const DEFAULT_MODEL = "gpt-4o-mini";
export const DEFAULT_MAX_TOOL_ROUNDS = 8;

export interface AppConfig {
    openai: {
        apiKey?: string;
        baseUrl?: string;
        model: string;
    };
    telegramToken?: string;
    logLevel: LogLevel;
    history: {
        storage: StorageKind;
        dir: string;
        dbPath: string;
        messageLimit?: number;
        tokenBudget?: number;
    };
    maxToolRounds: number;
    sources: ReadonlyMap<EnvKey, ValueSource>;
}

export interface ReadyOpenAIConfig {
    apiKey: string;
    baseUrl?: string;
    model: string;
}

const ENV_KEYS = [
    "OPENAI_API_KEY",
    "OPENAI_BASE_URL",
    "OPENAI_MODEL",
    "TELEGRAM_BOT_TOKEN",
    "LOG_LEVEL",
    "HISTORY_STORAGE",
    "HISTORY_DIR",
    "HISTORY_DB_PATH",
    "HISTORY_MESSAGE_LIMIT",
    "HISTORY_TOKEN_BUDGET",
    "MAX_TOOL_ROUNDS",
] as const;

export type EnvKey = (typeof ENV_KEYS)[number];

const SECRET_KEYS: ReadonlySet<EnvKey> = new Set<EnvKey>(["OPENAI_API_KEY", "TELEGRAM_BOT_TOKEN"]);

const positiveInt = z.coerce.number().int().positive();

const envSchema = z.object({
    OPENAI_API_KEY: z.string().optional(),
    OPENAI_BASE_URL: z.string().url().optional(),
    OPENAI_MODEL: z.string().default(DEFAULT_MODEL),
    TELEGRAM_BOT_TOKEN: z.string().optional(),
    LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
    HISTORY_STORAGE: z.enum(STORAGE_KINDS).default("file"),
    HISTORY_DIR: z.string().optional(),
    HISTORY_DB_PATH: z.string().optional(),
    HISTORY_MESSAGE_LIMIT: positiveInt.optional(),
    HISTORY_TOKEN_BUDGET: positiveInt.optional(),
    MAX_TOOL_ROUNDS: positiveInt.default(DEFAULT_MAX_TOOL_ROUNDS),
});

const DEFAULTED: ReadonlySet<EnvKey> = new Set<EnvKey>([
    "OPENAI_MODEL",
    "LOG_LEVEL",
    "HISTORY_STORAGE",
    "HISTORY_DIR",
    "HISTORY_DB_PATH",
    "MAX_TOOL_ROUNDS",
]);

/**
 * Builds the application config from an environment map (defaults to
 * `process.env`). Blank values count as unset.
 */
export function loadAppConfig(env: NodeJS.ProcessEnv = process.env, cwd = process.cwd()): AppConfig {
    const raw: Partial<Record<EnvKey, string>> = {};
    const sources = new Map<EnvKey, ValueSource>();
    for (const key of ENV_KEYS) {
        const value = trim(env[key]);
        if (value !== undefined) raw[key] = value;
        sources.set(key, value !== undefined ? "env" : DEFAULTED.has(key) ? "default" : "missing");
    }

    const parsed = envSchema.safeParse(raw);
    if (!parsed.success) {
        const details = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
        throw new ConfigError(`Invalid environment configuration (${details.join("; ")})`);
    }
    const values = parsed.data;

    return {
        openai: {
            apiKey: values.OPENAI_API_KEY,
            baseUrl: values.OPENAI_BASE_URL,
            model: values.OPENAI_MODEL,
        },
        telegramToken: values.TELEGRAM_BOT_TOKEN,
        logLevel: values.LOG_LEVEL,
        history: {
            storage: values.HISTORY_STORAGE,
            dir: values.HISTORY_DIR ?? resolve(cwd, "data", "history"),
            dbPath: values.HISTORY_DB_PATH ?? resolve(cwd, "data", "history.sqlite"),
            messageLimit: values.HISTORY_MESSAGE_LIMIT,
            tokenBudget: values.HISTORY_TOKEN_BUDGET,
        },
        maxToolRounds: values.MAX_TOOL_ROUNDS,
        sources,
    };
}

export function requireOpenAIConfig(config: AppConfig): ReadyOpenAIConfig {
    const { apiKey, baseUrl, model } = config.openai;
    if (!apiKey) {
        throw new ConfigError("Missing required variable (OPENAI_API_KEY). Set it in the environment or .env.");
    }
    return { apiKey, baseUrl, model };
}

export function requireTelegramToken(config: AppConfig): string {
    if (!config.telegramToken) {
        throw new ConfigError("Missing required variable (TELEGRAM_BOT_TOKEN). Set it in the environment or .env.");
    }
    return config.telegramToken;
}

function effectiveValue(config: AppConfig, key: EnvKey): string | number | undefined {
    switch (key) {
        case "OPENAI_API_KEY":
            return config.openai.apiKey;
        case "OPENAI_BASE_URL":
            return config.openai.baseUrl;
        case "OPENAI_MODEL":
            return config.openai.model;
        case "TELEGRAM_BOT_TOKEN":
            return config.telegramToken;
        case "LOG_LEVEL":
            return config.logLevel;
        case "HISTORY_STORAGE":
            return config.history.storage;
        case "HISTORY_DIR":
            return config.history.dir;
        case "HISTORY_DB_PATH":
            return config.history.dbPath;
        case "HISTORY_MESSAGE_LIMIT":
            return config.history.messageLimit;
        case "HISTORY_TOKEN_BUDGET":
            return config.history.tokenBudget;
        case "MAX_TOOL_ROUNDS":
            return config.maxToolRounds;
    }
}

/**
 * One line per variable with its effective value and where it came from.
 * Secrets are reported as set or unset, never printed.
 */
export function formatConfigReport(config: AppConfig): string {
    const width = Math.max(...ENV_KEYS.map((key) => key.length));
    return ENV_KEYS.map((key) => {
        const source = config.sources.get(key) ?? "missing";
        const value = effectiveValue(config, key);
        const shown = value === undefined ? "(unset)" : SECRET_KEYS.has(key) ? "(set)" : String(value);
        return `${key.padEnd(width)}  ${shown}  [${source}]`;
    }).join("\n");
}

function trim(value: string | undefined): string | undefined {
    if (typeof value !== "string") return undefined;
    const out = value.trim();
    return out.length > 0 ? out : undefined;
}
