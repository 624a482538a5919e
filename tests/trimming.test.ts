import { describe, expect, it } from "vitest";
import type { Message } from "../src/history/models";
import { countMessageTokens, encodingForModel, groupMessages, trimMessages } from "../src/history/trimming";

const at = "2024-01-01T00:00:00.000Z";

const system: Message = { role: "system", content: "You manage projects.", createdAt: at };
const question: Message = { role: "user", content: "What time is it?", createdAt: at };
const call: Message = {
    role: "assistant",
    content: null,
    toolCalls: [{ id: "1", name: "get_time", arguments: "{}" }],
    createdAt: at,
};
const result: Message = { role: "tool", content: "2024-01-01T09:00:00.000+09:00", toolCallId: "1", name: "get_time", createdAt: at };
const answer: Message = { role: "assistant", content: "It is nine in the morning.", createdAt: at };

const transcript = [system, question, call, result, answer];

describe("groupMessages", () => {
    it("keeps a tool call together with its results", () => {
        expect(groupMessages(transcript.slice(1))).toEqual([[question], [call, result], [answer]]);
    });

    it("merges interleaved tool-call spans into one group", () => {
        const first: Message = { ...call, toolCalls: [{ id: "a", name: "x", arguments: "{}" }] };
        const second: Message = { ...call, toolCalls: [{ id: "b", name: "y", arguments: "{}" }] };
        const answerA: Message = { ...result, toolCallId: "a" };
        const answerB: Message = { ...result, toolCallId: "b" };

        expect(groupMessages([question, first, second, answerA, answerB, answer])).toEqual([
            [question],
            [first, second, answerA, answerB],
            [answer],
        ]);
    });
});

describe("trimMessages", () => {
    it("returns everything when no limits are given", () => {
        const out = trimMessages(transcript, {});
        expect(out).toEqual(transcript);
        expect(out).not.toBe(transcript);
    });

    it("drops whole groups rather than splitting a call from its result", () => {
        expect(trimMessages(transcript, { limit: 2 })).toEqual([system, answer]);
        expect(trimMessages(transcript, { limit: 3 })).toEqual([system, call, result, answer]);
        expect(trimMessages(transcript, { limit: 4 })).toEqual(transcript);
    });

    it("always keeps the leading system message", () => {
        expect(trimMessages(transcript, { limit: 0 })).toEqual([system]);
        expect(trimMessages(transcript, { tokenBudget: 0 })).toEqual([system]);
    });

    it("does not treat a later system message as the head", () => {
        const note: Message = { role: "system", content: "note", createdAt: at };
        expect(trimMessages([question, note, answer], { limit: 1 })).toEqual([answer]);
    });

    it("fits the token budget from the newest end", () => {
        const answerTokens = countMessageTokens(answer);
        const pairTokens = countMessageTokens(call) + countMessageTokens(result);

        expect(trimMessages(transcript, { tokenBudget: answerTokens })).toEqual([system, answer]);
        expect(trimMessages(transcript, { tokenBudget: answerTokens + pairTokens - 1 })).toEqual([system, answer]);
        expect(trimMessages(transcript, { tokenBudget: answerTokens + pairTokens })).toEqual([
            system,
            call,
            result,
            answer,
        ]);
    });

    it("stops at the first group that does not fit so the window stays contiguous", () => {
        const short: Message = { role: "user", content: "hi", createdAt: at };
        const long: Message = { role: "user", content: "word ".repeat(200), createdAt: at };
        const latest: Message = { role: "user", content: "ok", createdAt: at };
        const budget = countMessageTokens(latest) + countMessageTokens(short);

        expect(trimMessages([short, long, latest], { tokenBudget: budget })).toEqual([latest]);
    });

    it("applies the message limit and token budget together", () => {
        const budget = countMessageTokens(answer) + countMessageTokens(call) + countMessageTokens(result);
        expect(trimMessages(transcript, { limit: 2, tokenBudget: budget })).toEqual([system, answer]);
    });
});

describe("token counting", () => {
    it("counts content, tool call names and arguments", () => {
        const bare = countMessageTokens({ role: "assistant", content: null, createdAt: at });
        expect(countMessageTokens(call)).toBeGreaterThan(bare);
        expect(countMessageTokens(answer)).toBeGreaterThan(bare);
    });

    it("chooses the encoding by model family", () => {
        expect(encodingForModel("gpt-4o-mini")).toBe("o200k_base");
        expect(encodingForModel("o3-mini")).toBe("o200k_base");
        expect(encodingForModel("gpt-3.5-turbo")).toBe("cl100k_base");
        expect(encodingForModel("gpt-4-turbo")).toBe("cl100k_base");
        expect(encodingForModel("gpt-4.1-mini")).toBe("o200k_base");
        expect(encodingForModel("local-model")).toBe("o200k_base");
    });

    it("budgets with the requested encoding", () => {
        const budget = countMessageTokens(answer, "cl100k_base");
        expect(trimMessages(transcript, { tokenBudget: budget, encoding: "cl100k_base" })).toEqual([system, answer]);
    });
});
