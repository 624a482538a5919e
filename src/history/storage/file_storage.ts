import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { globby } from "globby";
import { StorageError } from "../../errors";
import { getLogger } from "../../logger";
import {
    CONVERSATION_ID_PATTERN,
    compareByRecency,
    decodeConversation,
    summarizeConversation,
    type Conversation,
    type ConversationSummary,
} from "../models";
import type { StorageBackend } from "./storage";

const logger = getLogger("history.file_storage");

async function atomicWrite(filePath: string, content: string): Promise<void> {
    const dir = dirname(filePath);
    await mkdir(dir, { recursive: true });
    const tmpPath = join(dir, `.tmp-${process.pid}-${Date.now()}-${Math.random().toString(16).slice(2)}`);
    await writeFile(tmpPath, content, "utf8");
    await rename(tmpPath, filePath);
}

function isNotFound(error: unknown): boolean {
    return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/** One pretty-printed `<id>.json` document per conversation. */
export class FileStorage implements StorageBackend {
    constructor(private readonly dir: string) {}

    async load(conversationId: string): Promise<Conversation | undefined> {
        if (!CONVERSATION_ID_PATTERN.test(conversationId)) return undefined;
        return this.readDocument(this.pathFor(conversationId));
    }

    async save(conversation: Conversation): Promise<void> {
        if (!CONVERSATION_ID_PATTERN.test(conversation.id)) {
            throw new StorageError(`Refusing to store conversation with unsafe id '${conversation.id}'`);
        }
        const payload = `${JSON.stringify(conversation, null, 2)}\n`;
        try {
            await atomicWrite(this.pathFor(conversation.id), payload);
        } catch (error) {
            throw new StorageError(`Failed to write conversation ${conversation.id}`, error);
        }
    }

    async delete(conversationId: string): Promise<void> {
        if (!CONVERSATION_ID_PATTERN.test(conversationId)) return;
        try {
            await rm(this.pathFor(conversationId), { force: true });
        } catch (error) {
            throw new StorageError(`Failed to delete conversation ${conversationId}`, error);
        }
    }

    async list(owner?: string): Promise<ConversationSummary[]> {
        let files: string[];
        try {
            await mkdir(this.dir, { recursive: true });
            files = await globby("*.json", { cwd: this.dir, onlyFiles: true });
        } catch (error) {
            throw new StorageError(`Failed to list conversations in ${this.dir}`, error);
        }

        const out: ConversationSummary[] = [];
        for (const file of files) {
            let conversation: Conversation | undefined;
            try {
                conversation = await this.readDocument(join(this.dir, file));
            } catch (error) {
                logger.warn({ err: error, file }, "skipping unreadable conversation file");
                continue;
            }
            if (!conversation) continue;
            if (owner !== undefined && conversation.owner !== owner) continue;
            out.push(summarizeConversation(conversation));
        }
        return out.sort(compareByRecency);
    }

    async close(): Promise<void> {}

    private pathFor(conversationId: string): string {
        return join(this.dir, `${conversationId}.json`);
    }

    private async readDocument(filePath: string): Promise<Conversation | undefined> {
        let raw: string;
        try {
            raw = await readFile(filePath, "utf8");
        } catch (error) {
            if (isNotFound(error)) return undefined;
            throw new StorageError(`Failed to read ${filePath}`, error);
        }

        let json: unknown;
        try {
            json = JSON.parse(raw);
        } catch (error) {
            throw new StorageError(`Failed to parse ${filePath}`, error);
        }
        const decoded = decodeConversation(json);
        if (!decoded.ok) throw new StorageError(`Malformed conversation document ${filePath}: ${decoded.error}`);
        return decoded.conversation;
    }
}
