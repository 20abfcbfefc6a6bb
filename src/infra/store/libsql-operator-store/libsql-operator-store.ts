import { eq } from "drizzle-orm";
import { operatorIdentityTable, type RelayDB } from "@infra/db/db";
import { OPERATOR_SLOT } from "@infra/db/db.consts";
import type { Clock } from "@core/ports/clock.types";
import type { OperatorStore } from "@core/ports/operator-store.types";

export function createLibsqlOperatorStore(database: RelayDB, clock: Clock): OperatorStore {
  return {
    async get() {
      const rows = await database.db
        .select()
        .from(operatorIdentityTable)
        .where(eq(operatorIdentityTable.slot, OPERATOR_SLOT))
        .limit(1);
      const row = rows[0];
      if (!row) {
        return undefined;
      }
      return {
        chatId: row.chatId,
        pairedAt: row.pairedAt,
        ...(row.username ? { username: row.username } : {}),
      };
    },

    async remember(input) {
      const timestamp = clock.nowIso();
      await database.db
        .insert(operatorIdentityTable)
        .values({
          slot: OPERATOR_SLOT,
          chatId: input.chatId,
          username: input.username ?? null,
          pairedAt: timestamp,
          updatedAt: timestamp,
        })
        .onConflictDoUpdate({
          target: operatorIdentityTable.slot,
          set: {
            chatId: input.chatId,
            username: input.username ?? null,
            updatedAt: timestamp,
          },
        });
    },

    async forget() {
      await database.db
        .delete(operatorIdentityTable)
        .where(eq(operatorIdentityTable.slot, OPERATOR_SLOT));
    },
  };
}
