import { type ChatContext } from "../chat_runner";
import { type MessageInput } from "../history/models";
import { type CommandDefinition } from "./command_system";

const TITLE_MAX_LENGTH = 40;
const UNTITLED = "Untitled conversation";

export const titleCommand: CommandDefinition<ChatContext> = {
    name: "title",
    description: "Generate a short title for this conversation and store it as the 'title' note",
    handler: async ({ session, history, textGenerator, ui }, _args) => {
        const messages = await history.getMessages(session.conversationId);
        const title = await generateTitle(textGenerator, messages);
        await history.setContext(session.conversationId, "title", title);
        ui.printSystem(`Title: ${title}`);
    },
};

export async function generateTitle(
    textGenerator: ChatContext["textGenerator"],
    history: readonly MessageInput[]
): Promise<string> {
    // A simplified tail of the transcript is enough for a title.
    const excerpt: MessageInput[] = history
        .filter((msg) => (msg.role === "user" || msg.role === "assistant") && msg.content)
        .map((msg) => ({ role: msg.role, content: (msg.content ?? "").slice(0, 200) }))
        .slice(-6);
    if (excerpt.length === 0) return UNTITLED;

    const raw = await textGenerator.generateText(
        [
            {
                role: "system",
                content:
                    "You write conversation titles. Reply with a short title of at most six words that reflects the main topic, without quotes or trailing punctuation.",
            },
            ...excerpt,
            { role: "user", content: "Write a title for this conversation." },
        ],
        { maxTokens: 32 }
    );
    return cleanTitle(raw);
}

export function cleanTitle(raw: string): string {
    const title = raw
        .replace(/[\r\n]+/g, " ")
        .replace(/^["'\s]+|["'.\s]+$/g, "")
        .trim();
    if (!title) return UNTITLED;
    return title.length > TITLE_MAX_LENGTH ? title.substring(0, TITLE_MAX_LENGTH).trimEnd() : title;
}
