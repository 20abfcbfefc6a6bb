import { randomBytes } from "node:crypto";
import { mkdir, readFile, writeFile } from "node:fs/promises";
import { hostname as osHostname } from "node:os";
import { resolve } from "node:path";
import { deriveStartCode } from "@core/pairing/start-code.utils";
import type { StartCodeProvider } from "@core/ports/start-code.types";
import { logger } from "@infra/logger/logger";

export const MACHINE_ID_FILE = "machine-id";
export const SALT_FILE = "start-salt";
const DEFAULT_MACHINE_ID_SOURCES = ["/etc/machine-id", "/var/lib/dbus/machine-id"];

async function readTrimmed(path: string): Promise<string | undefined> {
  try {
    const text = (await readFile(path, "utf8")).trim();
    return text || undefined;
  } catch {
    return undefined;
  }
}

export function createStartCodeProvider(input: {
  runtimeDir: string;
  salt?: string | undefined;
  machineIdSources?: string[];
  hostname?: () => string;
}): StartCodeProvider {
  const machineIdPath = resolve(input.runtimeDir, MACHINE_ID_FILE);
  const saltPath = resolve(input.runtimeDir, SALT_FILE);
  const sources = input.machineIdSources ?? DEFAULT_MACHINE_ID_SOURCES;
  const hostname = input.hostname ?? osHostname;
  let cached: Promise<string> | undefined;

  const machineId = async (): Promise<string> => {
    const stored = await readTrimmed(machineIdPath);
    if (stored) {
      return stored;
    }

    let value = `host:${hostname() || "unknown"}`;
    for (const source of sources) {
      const id = await readTrimmed(source);
      if (id) {
        value = `machine-id:${id}`;
        break;
      }
    }
    await writeFile(machineIdPath, value, "utf8");
    return value;
  };

  const salt = async (): Promise<string> => {
    if (input.salt) {
      await writeFile(saltPath, input.salt, "utf8");
      return input.salt;
    }
    const stored = await readTrimmed(saltPath);
    if (stored) {
      return stored;
    }
    const generated = randomBytes(16).toString("hex");
    await writeFile(saltPath, generated, "utf8");
    logger.info({ saltPath }, "[stdhuman] Generated a new start code salt.");
    return generated;
  };

  const compute = async (): Promise<string> => {
    await mkdir(input.runtimeDir, { recursive: true });
    return deriveStartCode(await machineId(), await salt());
  };

  return {
    startCode() {
      cached ??= compute().catch((error: unknown) => {
        cached = undefined;
        throw error;
      });
      return cached;
    },
  };
}
