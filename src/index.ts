#!/usr/bin/env -S npx tsx

import "dotenv/config";
import { createCommandSystem, createHistoryManager, createToolRegistry, trimOptionsFrom } from "./bootstrap";
import { BotController, createTelegramBot } from "./bot/telegram_bot";
import { ChatRunner, openSession } from "./chat_runner";
import { CliUI } from "./cli_ui";
import { formatToolList } from "./commands/tools";
import {
    formatConfigReport,
    loadAppConfig,
    requireOpenAIConfig,
    requireTelegramToken,
    type AppConfig,
} from "./config/app_config";
import { ConfigError, describeError } from "./errors";
import { OpenAIServiceClient } from "./llm_client";
import { configureLogger, getLogger } from "./logger";
import { ToolOrchestrator, serializeToolResult } from "./orchestrator/tool_orchestrator";
import { CLI_ASSISTANT_PROMPT } from "./system_prompt";
import { InMemoryUsageTracker } from "./usage/usage_tracker";

const logger = getLogger("cli");

const USAGE = [
    "Usage: ai-tools <command>",
    "",
    "  chat [conversation-id]   Interactive chat (default)",
    "  tools                    List registered tools",
    "  exec <tool> [json-args]  Execute one tool and print its result",
    "  config                   Show the effective configuration and where each value came from",
    "  bot                      Run the Telegram bot",
].join("\n");

async function main(argv: string[]): Promise<void> {
    const [mode = "chat", ...rest] = argv;
    if (mode === "help" || mode === "--help" || mode === "-h") {
        console.log(USAGE);
        return;
    }

    const config = loadAppConfig();
    configureLogger(config.logLevel);
    switch (mode) {
        case "chat":
            return runChat(config, rest[0]);
        case "tools":
            console.log(formatToolList(createToolRegistry().list()));
            return;
        case "exec":
            return runExec(rest[0], rest[1]);
        case "config":
            console.log(formatConfigReport(config));
            return;
        case "bot":
            return runBot(config);
        default:
            throw new ConfigError(`Unknown command '${mode}'\n\n${USAGE}`);
    }
}

async function runExec(toolName: string | undefined, argText = "{}"): Promise<void> {
    if (!toolName) throw new ConfigError(`Missing tool name\n\n${USAGE}`);
    let args: unknown;
    try {
        args = JSON.parse(argText);
    } catch (error) {
        throw new ConfigError(`Arguments must be JSON: ${describeError(error)}`);
    }
    const result = await createToolRegistry().execute(toolName, args);
    console.log(serializeToolResult(result));
}

async function runChat(config: AppConfig, conversationId?: string): Promise<void> {
    const openai = requireOpenAIConfig(config);
    const ui = new CliUI();
    const history = createHistoryManager(config);
    try {
        const registry = createToolRegistry();
        const client = OpenAIServiceClient.fromConfig(openai);
        const usage = new InMemoryUsageTracker();
        const orchestrator = new ToolOrchestrator({
            registry,
            history,
            client,
            usage,
            maxToolRounds: config.maxToolRounds,
            trim: trimOptionsFrom(config),
            model: openai.model,
            onToolCall: ({ call, ok, content }) => {
                ui.printToolCall(call.name, call.arguments);
                ui.printToolResult(call.name, content, ok);
            },
        });

        const owner = `cli:${process.env.USER ?? "local"}`;
        const session = await openSession(history, owner, CLI_ASSISTANT_PROMPT, conversationId);
        ui.printBanner({ model: openai.model, conversationId: session.conversationId });

        const runner = new ChatRunner({
            session,
            history,
            registry,
            usage,
            textGenerator: client,
            ui,
            systemPrompt: CLI_ASSISTANT_PROMPT,
            orchestrator,
            commandSystem: createCommandSystem(),
        });
        await runner.run();
    } finally {
        ui.close();
        await history.close();
    }
}

async function runBot(config: AppConfig): Promise<void> {
    const token = requireTelegramToken(config);
    const openai = requireOpenAIConfig(config);
    const history = createHistoryManager(config);
    const orchestrator = new ToolOrchestrator({
        registry: createToolRegistry(),
        history,
        client: OpenAIServiceClient.fromConfig(openai),
        usage: new InMemoryUsageTracker(),
        maxToolRounds: config.maxToolRounds,
        trim: trimOptionsFrom(config),
        model: openai.model,
    });
    const bot = createTelegramBot(token, new BotController({ history, orchestrator }));

    const stop = (signal: string) => {
        logger.info({ signal }, "stopping bot");
        void bot.stop().catch((error: unknown) => logger.error({ err: error }, "failed to stop bot"));
    };
    process.once("SIGINT", () => stop("SIGINT"));
    process.once("SIGTERM", () => stop("SIGTERM"));

    try {
        await bot.start({
            onStart: (me) => logger.info({ username: me.username }, "bot started"),
        });
    } finally {
        await history.close();
    }
}

main(process.argv.slice(2)).catch((error: unknown) => {
    logger.error({ err: error }, "command failed");
    console.error(describeError(error));
    process.exitCode = 1;
});
