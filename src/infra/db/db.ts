import { mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import { createClient } from "@libsql/client";
import { drizzle } from "drizzle-orm/libsql";
import { StorageError, errorMessage } from "@infra/errors/errors";
import { REQUIRED_TABLE_STATEMENTS } from "./db.consts";
import type { RelayDB } from "./db.types";

export async function createRelayDB(dbPath: string): Promise<RelayDB> {
  try {
    await mkdir(dirname(dbPath), { recursive: true });
  } catch (error) {
    throw new StorageError(dbPath, `Failed to create database directory: ${errorMessage(error)}`);
  }

  const client = createClient({
    url: `file:${dbPath}`,
  });

  try {
    for (const statement of REQUIRED_TABLE_STATEMENTS) {
      await client.execute(statement);
    }
  } catch (error) {
    client.close();
    throw new StorageError(dbPath, `Failed to prepare tables: ${errorMessage(error)}`);
  }

  return {
    client,
    db: drizzle(client),
  };
}

export { operatorIdentityTable } from "./db.schema";
export type { RelayDB } from "./db.types";
