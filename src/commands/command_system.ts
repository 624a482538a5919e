export type CommandAction = "continue" | "exit";

export type CommandHandler<Ctx> = (
    ctx: Ctx,
    args: string[]
) => void | CommandAction | Promise<void | CommandAction>;

export interface CommandDefinition<Ctx> {
    /** Name without the prefix: "history" for "/history". */
    name: string;
    description: string;
    /** Argument synopsis shown in help, e.g. "[count]". */
    usage?: string;
    aliases?: string[];
    handler: CommandHandler<Ctx>;
}

export interface ParsedCommand {
    name: string;
    args: string[];
}

export interface CommandSystemOptions {
    prefix?: string;
    helpHeader?: string;
    /** Where help and unknown-command notices go. Defaults to console.log. */
    output?: (text: string) => void;
}

const COMMAND_NAME = /^[a-z][a-z0-9_-]*$/;

/**
 * Slash-command router for the REPL. Names and aliases share one namespace and
 * are matched case-insensitively; a bare prefix prints help.
 */
export class CommandSystem<Ctx> {
    private readonly prefix: string;
    private readonly helpHeader: string;
    private readonly output: (text: string) => void;
    private readonly commands: CommandDefinition<Ctx>[] = [];
    private readonly byName = new Map<string, CommandDefinition<Ctx>>();

    constructor(options: CommandSystemOptions = {}) {
        this.prefix = options.prefix ?? "/";
        this.helpHeader = options.helpHeader ?? "Available commands:";
        this.output = options.output ?? ((text) => console.log(text));
    }

    register(def: CommandDefinition<Ctx>): this {
        const command: CommandDefinition<Ctx> = {
            ...def,
            name: def.name.trim().toLowerCase(),
            aliases: (def.aliases ?? []).map((alias) => alias.trim().toLowerCase()),
        };

        const names = [command.name, ...(command.aliases ?? [])];
        for (const [i, name] of names.entries()) {
            if (!COMMAND_NAME.test(name)) throw new Error(`Invalid command name: '${name}'`);
            const taken = this.byName.get(name)?.name ?? (names.indexOf(name) < i ? command.name : undefined);
            if (taken !== undefined) {
                throw new Error(`${this.prefix}${name} is already taken by ${this.prefix}${taken}`);
            }
        }

        this.commands.push(command);
        for (const name of names) this.byName.set(name, command);
        return this;
    }

    /** Runs `input` when it is a command; resolves null for plain text. */
    async tryHandle(input: string, ctx: Ctx): Promise<CommandAction | null> {
        const parsed = this.parse(input);
        if (!parsed) return null;

        if (!parsed.name) {
            this.output(this.formatHelp());
            return "continue";
        }

        const command = this.byName.get(parsed.name);
        if (!command) {
            this.output(this.unknownCommandNotice(parsed.name));
            return "continue";
        }
        return (await command.handler(ctx, parsed.args)) ?? "continue";
    }

    parse(input: string): ParsedCommand | null {
        if (!input.startsWith(this.prefix)) return null;
        const [head = "", ...args] = input.slice(this.prefix.length).trim().split(/\s+/).filter(Boolean);
        return { name: head.toLowerCase(), args };
    }

    formatHelp(): string {
        const rows = this.commands.map((command) => {
            const aliases = command.aliases?.length
                ? ` (also ${command.aliases.map((alias) => this.prefix + alias).join(", ")})`
                : "";
            return {
                synopsis: [this.prefix + command.name, command.usage].filter(Boolean).join(" "),
                description: command.description + aliases,
            };
        });
        const width = Math.max(0, ...rows.map((row) => row.synopsis.length));
        return [this.helpHeader, ...rows.map((row) => `  ${row.synopsis.padEnd(width)}  ${row.description}`)].join(
            "\n"
        );
    }

    private unknownCommandNotice(name: string): string {
        const close = [...this.byName.keys()].filter((known) => known.startsWith(name) || name.startsWith(known));
        const hint = close.length
            ? `Did you mean ${close.map((known) => this.prefix + known).join(" or ")}?`
            : `Type '${this.prefix}' to see available commands.`;
        return `Unknown command: ${this.prefix}${name}. ${hint}`;
    }
}
