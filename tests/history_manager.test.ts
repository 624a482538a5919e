import { describe, expect, it } from "vitest";
import { ConversationNotFoundError, InvalidMessageError, StorageError } from "../src/errors";
import { HistoryManager } from "../src/history/history_manager";
import type { Conversation } from "../src/history/models";
import { MemoryStorage } from "../src/history/storage/memory_storage";

function sequentialIds(prefix = "conv"): () => string {
    let n = 0;
    return () => `${prefix}-${++n}`;
}

function tickingClock(start = Date.parse("2024-01-01T00:00:00.000Z")): () => Date {
    let t = start;
    return () => new Date((t += 1000));
}

function createManager(storage = new MemoryStorage()): HistoryManager {
    return new HistoryManager(storage, { generateId: sequentialIds(), now: tickingClock() });
}

class FailingSaveStorage extends MemoryStorage {
    failSaves = false;

    override async save(conversation: Conversation): Promise<void> {
        if (this.failSaves) throw new StorageError("disk full");
        return super.save(conversation);
    }
}

describe("HistoryManager", () => {
    it("returns the system and user message in order", async () => {
        const history = createManager();
        const id = await history.createConversation("u1");
        await history.addMessage(id, "system", "You are helpful.");
        await history.addMessage(id, "user", "Hello");

        const messages = await history.getMessages(id);
        expect(messages.map((m) => [m.role, m.content])).toEqual([
            ["system", "You are helpful."],
            ["user", "Hello"],
        ]);
    });

    it("creates conversations with unique ids, metadata and an optional system prompt", async () => {
        const history = new HistoryManager(new MemoryStorage());
        const a = await history.createConversation("u1", { metadata: { username: "ada" }, systemPrompt: "Be brief." });
        const b = await history.createConversation("u1");

        expect(a).not.toBe(b);
        const conversation = await history.getConversation(a);
        expect(conversation).toMatchObject({ owner: "u1", context: {}, metadata: { username: "ada" } });
        expect(conversation.messages).toHaveLength(1);
        expect(conversation.messages[0]).toMatchObject({ role: "system", content: "Be brief." });
        expect(await history.getMessages(b)).toEqual([]);
    });

    it("stamps updatedAt on every append", async () => {
        const history = createManager();
        const id = await history.createConversation("u1");
        const before = await history.getConversation(id);
        await history.addMessage(id, "user", "Hi");
        const after = await history.getConversation(id);

        expect(before.createdAt).toBe("2024-01-01T00:00:01.000Z");
        expect(after.updatedAt).toBe("2024-01-01T00:00:02.000Z");
        expect(after.createdAt).toBe(before.createdAt);
    });

    it("fails with ConversationNotFoundError for unknown ids", async () => {
        const history = createManager();
        await expect(history.addMessage("nope", "user", "hi")).rejects.toBeInstanceOf(ConversationNotFoundError);
        await expect(history.getMessages("nope")).rejects.toBeInstanceOf(ConversationNotFoundError);
        await expect(history.setContext("nope", "k", "v")).rejects.toBeInstanceOf(ConversationNotFoundError);
        await expect(history.getContext("nope")).rejects.toBeInstanceOf(ConversationNotFoundError);
    });

    describe("tool message validation", () => {
        async function withToolCall(): Promise<{ history: HistoryManager; id: string }> {
            const history = createManager();
            const id = await history.createConversation("u1");
            await history.addMessage(id, "user", "Echo x");
            await history.addMessage(id, "assistant", null, {
                toolCalls: [{ id: "1", name: "echo", arguments: '{"text":"x"}' }],
            });
            return { history, id };
        }

        it("accepts a tool result answering an outstanding call", async () => {
            const { history, id } = await withToolCall();
            const message = await history.addMessage(id, "tool", "x", { toolCallId: "1", name: "echo" });
            expect(message).toMatchObject({ role: "tool", toolCallId: "1", name: "echo", content: "x" });
        });

        it("rejects tool results for undeclared or already answered calls", async () => {
            const { history, id } = await withToolCall();
            await expect(history.addMessage(id, "tool", "x", { toolCallId: "2" })).rejects.toThrow(
                "tool_call_id '2' does not match any assistant tool call"
            );
            await history.addMessage(id, "tool", "x", { toolCallId: "1" });
            await expect(history.addMessage(id, "tool", "again", { toolCallId: "1" })).rejects.toThrow(
                "tool_call_id '1' has already been answered"
            );
        });

        it("requires tool_call_id on tool messages only", async () => {
            const { history, id } = await withToolCall();
            await expect(history.addMessage(id, "tool", "x")).rejects.toBeInstanceOf(InvalidMessageError);
            await expect(history.addMessage(id, "user", "x", { toolCallId: "1" })).rejects.toBeInstanceOf(
                InvalidMessageError
            );
        });

        it("allows tool calls on assistant messages only, with unique ids", async () => {
            const { history, id } = await withToolCall();
            await expect(
                history.addMessage(id, "user", "x", { toolCalls: [{ id: "9", name: "echo", arguments: "{}" }] })
            ).rejects.toThrow("Only assistant messages may carry tool calls");
            await expect(
                history.addMessage(id, "assistant", null, { toolCalls: [{ id: "1", name: "echo", arguments: "{}" }] })
            ).rejects.toThrow("Duplicate tool call id '1'");
        });

        it("refuses other messages until every call is answered", async () => {
            const { history, id } = await withToolCall();
            expect(await history.getPendingToolCalls(id)).toEqual([{ id: "1", name: "echo", arguments: '{"text":"x"}' }]);
            await expect(history.addMessage(id, "user", "next")).rejects.toThrow(
                "Tool call(s) '1' must be answered before another user message"
            );

            await history.addMessage(id, "tool", "x", { toolCallId: "1", name: "echo" });
            expect(await history.getPendingToolCalls(id)).toEqual([]);
            await expect(history.addMessage(id, "user", "next")).resolves.toMatchObject({ role: "user" });
        });

        it("allows null content only alongside tool calls", async () => {
            const history = createManager();
            const id = await history.createConversation("u1");
            await expect(history.addMessage(id, "assistant", null)).rejects.toBeInstanceOf(InvalidMessageError);
        });

        it("leaves the transcript untouched after a rejected append", async () => {
            const { history, id } = await withToolCall();
            await expect(history.addMessage(id, "tool", "x", { toolCallId: "7" })).rejects.toThrow();
            expect((await history.getMessages(id)).map((m) => m.role)).toEqual(["user", "assistant"]);
        });
    });

    it("surfaces backend failures as StorageError without partial writes", async () => {
        const storage = new FailingSaveStorage();
        const history = createManager(storage);
        const id = await history.createConversation("u1");
        await history.addMessage(id, "user", "first");

        storage.failSaves = true;
        await expect(history.addMessage(id, "user", "second")).rejects.toBeInstanceOf(StorageError);
        storage.failSaves = false;

        expect((await history.getMessages(id)).map((m) => m.content)).toEqual(["first"]);
    });

    it("trims to the most recent messages, keeping the system prompt", async () => {
        const history = createManager();
        const id = await history.createConversation("u1", { systemPrompt: "sys" });
        for (const text of ["a", "b", "c"]) await history.addMessage(id, "user", text);

        expect((await history.getMessages(id, 2)).map((m) => m.content)).toEqual(["sys", "b", "c"]);
        expect((await history.getMessages(id, { limit: 0 })).map((m) => m.content)).toEqual(["sys"]);
        await expect(history.getMessages(id, -1)).rejects.toBeInstanceOf(RangeError);
    });

    it("keeps context notes per conversation with last-write-wins", async () => {
        const history = createManager();
        const a = await history.createConversation("u1");
        const b = await history.createConversation("u1");
        await history.setContext(a, "goal", "ship");
        await history.setContext(a, "goal", "ship v2");
        await history.setContext(a, "owner", "ada");

        expect(await history.getContext(a)).toEqual({ goal: "ship v2", owner: "ada" });
        expect(await history.getContext(b)).toEqual({});

        await history.clearContext(a, "goal");
        expect(await history.getContext(a)).toEqual({ owner: "ada" });
        await history.clearContext(a);
        expect(await history.getContext(a)).toEqual({});
    });

    it("returns copies that callers cannot use to mutate stored state", async () => {
        const history = createManager();
        const id = await history.createConversation("u1");
        await history.setContext(id, "k", "v");

        const context = await history.getContext(id);
        context.k = "changed";
        const messages = await history.getMessages(id);
        messages.push({ role: "user", content: "injected", createdAt: "" });

        expect(await history.getContext(id)).toEqual({ k: "v" });
        expect(await history.getMessages(id)).toEqual([]);
    });

    it("lists an owner's conversations newest first", async () => {
        const history = createManager();
        const first = await history.createConversation("u1");
        const other = await history.createConversation("u2");
        const second = await history.createConversation("u1");
        await history.addMessage(first, "user", "bump");

        const listed = await history.listConversations("u1");
        expect(listed.map((s) => s.id)).toEqual([first, second]);
        expect(listed[0]).toMatchObject({ owner: "u1", messageCount: 1 });
        expect((await history.listConversations()).map((s) => s.id)).toContain(other);
    });

    it("deletes idempotently", async () => {
        const history = createManager();
        const id = await history.createConversation("u1");
        await history.addMessage(id, "user", "hi");

        await history.deleteConversation(id);
        await history.deleteConversation(id);
        await history.deleteConversation("never-existed");
        expect(await history.hasConversation(id)).toBe(false);
        await expect(history.getMessages(id)).rejects.toBeInstanceOf(ConversationNotFoundError);
    });
});
