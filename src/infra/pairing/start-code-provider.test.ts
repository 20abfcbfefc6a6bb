import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { MACHINE_ID_FILE, SALT_FILE, createStartCodeProvider } from "./start-code-provider";

describe("start code provider", () => {
  let root = "";

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "stdhuman-pairing-"));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("derives the code from the machine id file and configured salt", async () => {
    const source = join(root, "etc-machine-id");
    await writeFile(source, "abc123\n", "utf8");
    const provider = createStartCodeProvider({
      runtimeDir: join(root, "runtime"),
      salt: "test-salt",
      machineIdSources: [source],
    });

    expect(await provider.startCode()).toBe("mH76IYEQ-CV2");
    expect(await readFile(join(root, "runtime", MACHINE_ID_FILE), "utf8")).toBe("machine-id:abc123");
    expect(await readFile(join(root, "runtime", SALT_FILE), "utf8")).toBe("test-salt");
  });

  it("falls back to the hostname", async () => {
    const provider = createStartCodeProvider({
      runtimeDir: root,
      salt: "other-salt",
      machineIdSources: [join(root, "missing")],
      hostname: () => "devbox",
    });

    expect(await provider.startCode()).toBe("GjKbM4ij0fgl");
  });

  it("persists a generated salt so the code survives restarts", async () => {
    const options = { runtimeDir: root, machineIdSources: [], hostname: () => "devbox" };

    const first = await createStartCodeProvider(options).startCode();
    const second = await createStartCodeProvider(options).startCode();

    expect(second).toBe(first);
    expect(await readFile(join(root, SALT_FILE), "utf8")).toMatch(/^[0-9a-f]{32}$/);
  });
});
