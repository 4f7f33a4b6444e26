import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, type Mock, vi } from "vitest";
import { type CliDependencies, HELP_TEXT, main } from "../cli.js";
import { ZoneLockController } from "../controller.js";
import { VERSION } from "../version.js";
import { FakeWapiServer, type FakeZone } from "./fixtures/fake-wapi.js";
import { createMemoryLogger, type MemoryLogger } from "./fixtures/logger.js";

interface Harness {
  readonly server: FakeWapiServer;
  readonly logger: MemoryLogger;
  readonly output: string[];
  readonly createController: Mock<NonNullable<CliDependencies["createController"]>>;
  readonly deps: CliDependencies;
}

function harness(zones: readonly FakeZone[]): Harness {
  const server = new FakeWapiServer(zones);
  const logger = createMemoryLogger("info");
  const output: string[] = [];
  const createController = vi.fn<NonNullable<CliDependencies["createController"]>>(
    async (_configPath, log) => new ZoneLockController(server.client(), log),
  );
  const clock = vi.fn<() => number>().mockReturnValueOnce(1000).mockReturnValueOnce(2500);
  return {
    server,
    logger,
    output,
    createController,
    deps: { logger, createController, stdout: (text) => output.push(text), clock },
  };
}

const STATUS_LINE = /^Zone: /;

describe("main", () => {
  it("prints help without connecting", async () => {
    const { deps, output, createController } = harness([]);

    expect(await main(["--help"], deps)).toBe(0);

    expect(output).toEqual([HELP_TEXT]);
    expect(createController).not.toHaveBeenCalled();
  });

  it("prints the version", async () => {
    const { deps, output } = harness([]);

    await main(["-v"], deps);

    expect(output).toEqual([VERSION]);
  });

  it("reports lock status by default", async () => {
    const { deps, logger, output, createController } = harness([
      { fqdn: "a.test", locked: true, lockedBy: "alice" },
      { fqdn: "b.test" },
    ]);

    expect(await main([], deps)).toBe(0);

    expect(createController).toHaveBeenCalledWith("gm.ini", logger);
    expect(logger.messages("info").filter((line) => STATUS_LINE.test(line))).toEqual([
      "Zone: a.test, Locked: true, Locked by: alice",
      "Zone: b.test, Locked: false",
    ]);
    expect(output).toEqual([]);
  });

  it("writes the status report to stdout in the chosen format", async () => {
    const { deps, output } = harness([{ fqdn: "a.test" }]);

    await main(["--format", "text", "--zone", "a.test"], deps);

    expect(output).toEqual(["Zone: a.test, Locked: false"]);
  });

  it("locks one zone", async () => {
    const { deps, server, logger } = harness([{ fqdn: "a.test" }, { fqdn: "b.test" }]);

    await main(["-c", "site.ini", "-z", "a.test", "-l"], deps);

    expect(server.snapshot().map((zone) => zone.locked)).toEqual([true, false]);
    expect(logger.messages("info")).toContain("Zone locked");
  });

  it("unlocks every zone when no zone is named", async () => {
    const { deps, server, logger } = harness([
      { fqdn: "a.test", locked: true },
      { fqdn: "b.test" },
    ]);

    await main(["--unlock"], deps);

    expect(server.writes).toHaveLength(1);
    expect(logger.messages("info")).toContain("Processed 2 zones: 1 changed, 1 skipped, 0 failed");
  });

  it("closes the session and logs the run time", async () => {
    const { deps, server, logger } = harness([]);

    await main([], deps);

    expect(server.closed).toBe(true);
    expect(logger.messages("info").at(-1)).toBe("Run time: 1.500s");
  });

  it("logs argument warnings", async () => {
    const { deps, logger } = harness([]);

    await main(["stray", "--format", "xml"], deps);

    expect(logger.messages("warn")).toEqual([
      'Unknown output format "xml", using "log"',
      'Ignoring unexpected argument "stray"',
    ]);
  });

  it("changes nothing when the zone name is missing", async () => {
    const { deps, server, logger, createController } = harness([
      { fqdn: "a.test" },
      { fqdn: "b.test" },
      { fqdn: "c.test" },
    ]);

    expect(await main(["-l", "-z"], deps)).toBe(0);

    expect(createController).not.toHaveBeenCalled();
    expect(server.calls).toEqual([]);
    expect(server.snapshot().map((zone) => zone.locked)).toEqual([false, false, false]);
    expect(logger.messages("error")).toEqual([
      "Option --zone requires a value",
      "Nothing was changed; see zone-locks --help",
    ]);
  });

  it("exits 0 when setup fails", async () => {
    const { deps, logger } = harness([]);
    const failing: CliDependencies = {
      ...deps,
      createController: () => Promise.reject(new Error("boom")),
    };

    expect(await main(["--lock"], failing)).toBe(0);

    expect(logger.messages("error")).toEqual(["Unexpected failure: boom"]);
    expect(logger.messages("info").at(-1)).toBe("Run time: 1.500s");
  });

  it("logs the stack of an unexpected failure at debug level", async () => {
    const logger = createMemoryLogger("debug");

    await main([], {
      logger,
      createController: () => Promise.reject(new Error("boom")),
      clock: () => 0,
    });

    expect(logger.messages("error")).toEqual(["Unexpected failure: boom"]);
    expect(logger.messages("debug")[0]?.startsWith("Error: boom\n")).toBe(true);
  });

  it("exits 0 when the server rejects every request", async () => {
    const { deps, server, logger } = harness([{ fqdn: "a.test" }]);
    server.respondNext(401, "Authorization Required");

    expect(await main(["-z", "a.test", "-l"], deps)).toBe(0);

    expect(server.writes).toEqual([]);
    expect(logger.messages("error")).toEqual([
      "Failed to retrieve zone data",
      "Cannot proceed: 0 zone matches",
    ]);
  });
});

describe("main with a config file", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "zone-locks-cli-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("reads the config and talks to the configured host", async () => {
    const file = join(dir, "gm.ini");
    await writeFile(
      file,
      "[NIOS]\ngm = gm.test\napi_version = v2.13\nvalid_cert = false\nuser = admin\npass = test-secret\n",
      "utf-8",
    );
    const server = new FakeWapiServer([{ fqdn: "a.test" }]);
    const logger = createMemoryLogger("info");

    await main(["--config", file], {
      logger,
      createController: (configPath, log) =>
        ZoneLockController.fromConfigFile(configPath, log, { transport: server }),
      stdout: () => undefined,
    });

    expect(server.calls[0]?.url).toBe(
      "https://gm.test/wapi/v2.13/zone_auth?_return_fields=fqdn,locked,locked_by",
    );
    expect(logger.messages("info")).toContain("Zone: a.test, Locked: false");
  });

  it("carries on with empty settings when the file is missing", async () => {
    const file = join(dir, "absent.ini");
    const server = new FakeWapiServer([]);
    const logger = createMemoryLogger("info");

    expect(
      await main(["--config", file], {
        logger,
        createController: (configPath, log) =>
          ZoneLockController.fromConfigFile(configPath, log, { transport: server }),
        stdout: () => undefined,
      }),
    ).toBe(0);

    expect(logger.messages("warn")[0]).toBe(`Config file not found: ${file}`);
    expect(server.calls).toHaveLength(1);
    expect(logger.messages("error")).toEqual(["Failed to retrieve zone data"]);
  });
});
