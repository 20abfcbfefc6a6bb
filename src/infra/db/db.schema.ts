import { sqliteTable, text } from "drizzle-orm/sqlite-core";

export const operatorIdentityTable = sqliteTable("operator_identity", {
  slot: text("slot").primaryKey(),
  chatId: text("chat_id").notNull(),
  username: text("username"),
  pairedAt: text("paired_at").notNull(),
  updatedAt: text("updated_at").notNull(),
});
