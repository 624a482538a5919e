import { ConfigError } from "../errors";
import { AnthropicMessageFormatter } from "./anthropic_formatter";
import { FORMATTER_PROVIDERS } from "./message_formatter";
import { OpenAIMessageFormatter } from "./openai_formatter";

export function createMessageFormatter(provider: "openai"): OpenAIMessageFormatter;
export function createMessageFormatter(provider: "anthropic"): AnthropicMessageFormatter;
export function createMessageFormatter(provider: string): OpenAIMessageFormatter | AnthropicMessageFormatter;
export function createMessageFormatter(provider: string): OpenAIMessageFormatter | AnthropicMessageFormatter {
    switch (provider) {
        case "openai":
            return new OpenAIMessageFormatter();
        case "anthropic":
            return new AnthropicMessageFormatter();
        default:
            throw new ConfigError(
                `Unknown message formatter: ${provider} (expected one of ${FORMATTER_PROVIDERS.join(", ")})`
            );
    }
}
