import type { StorageKind } from "../../config/app_config";
import { ConfigError } from "../../errors";
import type { Conversation, ConversationSummary } from "../models";
import { FileStorage } from "./file_storage";
import { MemoryStorage } from "./memory_storage";
import { SqliteStorage } from "./sqlite_storage";

/**
 * Persistence boundary for conversations. Implementations surface every I/O or
 * decoding failure as `StorageError` and must give read-your-writes per id.
 */
export interface StorageBackend {
    load(conversationId: string): Promise<Conversation | undefined>;
    save(conversation: Conversation): Promise<void>;
    /** Absent ids are not an error. */
    delete(conversationId: string): Promise<void>;
    /** Entries that cannot be decoded are logged and left out; `load` raises `StorageError` for them. */
    list(owner?: string): Promise<ConversationSummary[]>;
    close(): Promise<void>;
}

export interface StorageOptions {
    dir?: string;
    dbPath?: string;
}

export function createStorageBackend(kind: StorageKind | string, options: StorageOptions = {}): StorageBackend {
    switch (kind) {
        case "memory":
            return new MemoryStorage();
        case "file":
            if (!options.dir) throw new ConfigError("File storage requires a directory");
            return new FileStorage(options.dir);
        case "sqlite":
            if (!options.dbPath) throw new ConfigError("SQLite storage requires a database path");
            return new SqliteStorage(options.dbPath);
        default:
            throw new ConfigError(`Unknown storage backend: ${kind}`);
    }
}
