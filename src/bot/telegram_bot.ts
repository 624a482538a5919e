import { Bot, type Context } from "grammy";
import type { HistoryManager } from "../history/history_manager";
import { getLogger } from "../logger";
import type { ToolOrchestrator } from "../orchestrator/tool_orchestrator";
import { PROJECT_ASSISTANT_PROMPT } from "../system_prompt";
import { ConversationLock } from "./conversation_lock";

const logger = getLogger("bot.telegram");

const RECENT_CONVERSATIONS = 5;
const PREVIEW_LENGTH = 50;

export const APOLOGY_TEXT = "Sorry, an error occurred while processing your request. Please try again later.";
export const EMPTY_REPLY_TEXT = "I'm not sure how to help with that.";

export const HELP_TEXT = [
    "Here's what you can do with this bot:",
    "",
    "Project Management:",
    "- List all projects",
    "- Create a new project",
    "- Delete a project",
    "- Switch to a different project",
    "- Get details about a project",
    "",
    "Conversation Management:",
    "- /new_conversation - Start a new conversation",
    "- /list_conversations - List your recent conversations",
    "",
    "Just ask me in natural language, for example:",
    '"Show me all projects"',
    "\"Create a new project called 'Test' with description 'A test project'\"",
    '"Switch to project xyz789"',
    "\"What's the active project?\"",
].join("\n");

export interface BotUser {
    id: string;
    username: string;
    firstName: string;
    lastName: string;
}

export interface BotControllerOptions {
    history: HistoryManager;
    orchestrator: ToolOrchestrator;
    lock?: ConversationLock;
    systemPrompt?: string;
}

function preview(text: string): string {
    return text.length > PREVIEW_LENGTH ? `${text.slice(0, PREVIEW_LENGTH)}...` : text;
}

/** `YYYY-MM-DD HH:MM` in UTC. */
function formatTimestamp(iso: string): string {
    return iso.slice(0, 16).replace("T", " ");
}

/**
 * Chat logic behind the Telegram transport: maps each user to their active
 * conversation and routes text through the orchestrator, one cycle at a time
 * per conversation.
 */
export class BotController {
    private readonly history: HistoryManager;
    private readonly orchestrator: ToolOrchestrator;
    private readonly lock: ConversationLock;
    private readonly systemPrompt: string;
    private readonly activeConversations = new Map<string, string>();

    constructor(options: BotControllerOptions) {
        this.history = options.history;
        this.orchestrator = options.orchestrator;
        this.lock = options.lock ?? new ConversationLock();
        this.systemPrompt = options.systemPrompt ?? PROJECT_ASSISTANT_PROMPT;
    }

    activeConversation(userId: string): string | undefined {
        return this.activeConversations.get(userId);
    }

    async start(user: BotUser): Promise<string> {
        await this.startConversation(user);
        return (
            `Hello ${user.firstName}! I'm your AI Tools bot. You can talk to me in natural language ` +
            "to manage projects. Type /help to see available commands."
        );
    }

    help(): string {
        return HELP_TEXT;
    }

    async newConversation(user: BotUser): Promise<string> {
        await this.startConversation(user);
        return "Started a new conversation! You can now interact with me using natural language.";
    }

    async listConversations(user: BotUser): Promise<string> {
        const summaries = await this.history.listConversations(user.id);
        if (summaries.length === 0) return "You don't have any conversations yet.";

        const lines = ["Your recent conversations:", ""];
        for (const [index, summary] of summaries.slice(0, RECENT_CONVERSATIONS).entries()) {
            const conversation = await this.history.getConversation(summary.id);
            const firstUser = conversation.messages.find((message) => message.role === "user");
            lines.push(`${index + 1}. ${formatTimestamp(summary.updatedAt)} - ${preview(firstUser?.content ?? "")}`);
        }

        const current = this.activeConversations.get(user.id);
        if (current) lines.push("", `Current conversation ID: ${current}`);
        return lines.join("\n");
    }

    async handleText(user: BotUser, text: string): Promise<string> {
        const conversationId = await this.lock.runExclusive(`user:${user.id}`, () => this.resolveConversation(user));
        logger.info({ userId: user.id, conversationId }, "message received");

        const reply = await this.lock.runExclusive(conversationId, () =>
            this.orchestrator.respond(conversationId, text)
        );
        return reply.trim() ? reply : EMPTY_REPLY_TEXT;
    }

    private async resolveConversation(user: BotUser): Promise<string> {
        const existing = this.activeConversations.get(user.id);
        if (existing && (await this.history.hasConversation(existing))) return existing;
        return this.startConversation(user);
    }

    private async startConversation(user: BotUser): Promise<string> {
        const conversationId = await this.history.createConversation(user.id, {
            metadata: { username: user.username, first_name: user.firstName, last_name: user.lastName },
            systemPrompt: this.systemPrompt,
        });
        this.activeConversations.set(user.id, conversationId);
        logger.info({ userId: user.id, conversationId }, "conversation started");
        return conversationId;
    }
}

export function toBotUser(ctx: Context): BotUser | undefined {
    const from = ctx.from;
    if (!from) return undefined;
    return {
        id: String(from.id),
        username: from.username ?? "",
        firstName: from.first_name,
        lastName: from.last_name ?? "",
    };
}

/** Wires the controller to grammy handlers. Call `bot.start()` to begin polling. */
export function createTelegramBot(token: string, controller: BotController): Bot {
    const bot = new Bot(token);

    bot.command("start", async (ctx) => {
        const user = toBotUser(ctx);
        if (user) await ctx.reply(await controller.start(user));
    });
    bot.command("help", async (ctx) => {
        await ctx.reply(controller.help());
    });
    bot.command("new_conversation", async (ctx) => {
        const user = toBotUser(ctx);
        if (user) await ctx.reply(await controller.newConversation(user));
    });
    bot.command("list_conversations", async (ctx) => {
        const user = toBotUser(ctx);
        if (user) await ctx.reply(await controller.listConversations(user));
    });

    bot.on("message:text", async (ctx) => {
        const user = toBotUser(ctx);
        if (!user) return;
        if (ctx.message.text.startsWith("/")) {
            await ctx.reply("Unknown command. Type /help to see available commands.");
            return;
        }
        await ctx.replyWithChatAction("typing");
        await ctx.reply(await controller.handleText(user, ctx.message.text));
    });

    bot.catch(async (err) => {
        logger.error({ err: err.error, updateId: err.ctx.update.update_id }, "update handling failed");
        try {
            if (err.ctx.chat) await err.ctx.reply(APOLOGY_TEXT);
        } catch (replyError) {
            logger.error({ err: replyError }, "failed to send apology");
        }
    });

    return bot;
}
