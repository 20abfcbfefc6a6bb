import { mkdir, open, readFile, unlink } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";
import { errorMessage } from "@infra/errors/errors";
import { logger } from "@infra/logger/logger";

export type LockAcquisition =
  | { acquired: true; release: () => Promise<void> }
  | { acquired: false; holder: string };

const lockHolderSchema = z.object({ pid: z.number().int() }).passthrough();

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    return error instanceof Error && "code" in error && error.code === "EPERM";
  }
}

export async function tryAcquireLock(lockFilePath: string): Promise<LockAcquisition> {
  await mkdir(dirname(lockFilePath), { recursive: true });

  const acquireFresh = async (): Promise<LockAcquisition> => {
    const handle = await open(lockFilePath, "wx");
    const payload = JSON.stringify({ pid: process.pid, startedAt: new Date().toISOString() }, null, 2);
    await handle.writeFile(`${payload}\n`, "utf8");

    const release = async () => {
      try {
        await handle.close();
        await unlink(lockFilePath);
      } catch (error) {
        logger.warn({ lockFilePath, error: errorMessage(error) }, "[stdhuman] Failed to release lock file.");
      }
    };

    return { acquired: true, release };
  };

  try {
    return await acquireFresh();
  } catch (error) {
    const message = errorMessage(error);
    if (!message.includes("EEXIST")) {
      return { acquired: false, holder: message };
    }
  }

  let holder: string;
  try {
    holder = (await readFile(lockFilePath, "utf8")).trim();
  } catch {
    return { acquired: false, holder: "lock held by another process" };
  }

  let parsedHolder: unknown;
  try {
    parsedHolder = JSON.parse(holder);
  } catch {
    return { acquired: false, holder };
  }

  const parsed = lockHolderSchema.safeParse(parsedHolder);
  if (parsed.success && !isProcessAlive(parsed.data.pid)) {
    logger.warn({ lockFilePath, stalePid: parsed.data.pid }, "[stdhuman] Reclaiming stale lock file.");
    await unlink(lockFilePath);
    return await acquireFresh();
  }
  return { acquired: false, holder };
}
