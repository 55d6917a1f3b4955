export * from "./sqlite/connection.js";
export * from "./migrations/SidekickMigrations.js";
export * from "./repositories/ConversationRepository.js";
export type { Database } from "sqlite";
