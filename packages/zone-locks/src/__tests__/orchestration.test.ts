import { describe, expect, it } from "vitest";
import { ZoneLockController } from "../controller.js";
import {
  controlZoneLock,
  formatZoneStatus,
  processAllZones,
  reportLockStatus,
  resolveIntent,
} from "../orchestration.js";
import { FakeWapiServer, zoneRef } from "./fixtures/fake-wapi.js";
import { createMemoryLogger } from "./fixtures/logger.js";

function setup(zones: ConstructorParameters<typeof FakeWapiServer>[0]) {
  const server = new FakeWapiServer(zones);
  const logger = createMemoryLogger("info");
  const controller = new ZoneLockController(server.client(), logger);
  return { server, logger, controller };
}

const STATUS_LINE = /^Zone: /;

describe("resolveIntent", () => {
  it("lets unlock win over lock", () => {
    expect(resolveIntent(true, true)).toBe("unlock");
    expect(resolveIntent(false, true)).toBe("unlock");
    expect(resolveIntent(true, false)).toBe("lock");
    expect(resolveIntent(false, false)).toBe("none");
  });
});

describe("formatZoneStatus", () => {
  it("formats an unlocked zone", () => {
    expect(formatZoneStatus({ _ref: "zone_auth/x", fqdn: "a.test", locked: false })).toBe(
      "Zone: a.test, Locked: false",
    );
  });

  it("names who holds the lock", () => {
    expect(
      formatZoneStatus({ _ref: "zone_auth/x", fqdn: "a.test", locked: true, locked_by: "alice" }),
    ).toBe("Zone: a.test, Locked: true, Locked by: alice");
  });

  it("falls back when the holder is not reported", () => {
    expect(formatZoneStatus({ _ref: "zone_auth/x", fqdn: "a.test", locked: true })).toBe(
      "Zone: a.test, Locked: true, Locked by: unknown",
    );
  });
});

describe("reportLockStatus", () => {
  it("logs one line per zone", async () => {
    const { controller, logger } = setup([
      { fqdn: "a.test", locked: true, lockedBy: "alice" },
      { fqdn: "b.test" },
    ]);

    const zones = await reportLockStatus(controller, logger);

    expect(zones).toHaveLength(2);
    expect(logger.messages("info").filter((line) => STATUS_LINE.test(line))).toEqual([
      "Zone: a.test, Locked: true, Locked by: alice",
      "Zone: b.test, Locked: false",
    ]);
  });

  it("restricts the report to one zone", async () => {
    const { server, controller, logger } = setup([{ fqdn: "a.test" }, { fqdn: "b.test" }]);

    await reportLockStatus(controller, logger, { zone: "b.test" });

    expect(server.calls[0]?.params.fqdn).toBe("b.test");
    expect(logger.messages("info")).toContain("Zone: b.test, Locked: false");
  });

  it("says so when nothing matches", async () => {
    const { controller, logger } = setup([]);

    expect(await reportLockStatus(controller, logger, { zone: "a.test" })).toEqual([]);
    expect(logger.messages("info")).toContain("No matching zones found.");
  });
});

describe("controlZoneLock", () => {
  it("locks the named zone", async () => {
    const { server, controller } = setup([{ fqdn: "a.test" }]);

    expect(await controlZoneLock(controller, { zone: "a.test", lock: true, unlock: false })).toBe(
      true,
    );
    expect(server.snapshot()[0]?.locked).toBe(true);
  });

  it("unlocks when both flags are set", async () => {
    const { server, controller } = setup([{ fqdn: "a.test", locked: true }]);

    await controlZoneLock(controller, { zone: "a.test", lock: true, unlock: true });

    expect(server.writes.map((call) => call.params.operation)).toEqual(["UNLOCK"]);
  });

  it("acts on an object reference", async () => {
    const { server, controller } = setup([{ fqdn: "a.test" }]);

    await controlZoneLock(controller, { zoneRef: zoneRef("a.test"), lock: true, unlock: false });

    expect(server.calls.map((call) => call.method)).toEqual(["POST"]);
  });

  it("does nothing without a flag", async () => {
    const { server, controller } = setup([{ fqdn: "a.test" }]);

    expect(await controlZoneLock(controller, { zone: "a.test", lock: false, unlock: false })).toBe(
      false,
    );
    expect(server.calls).toEqual([]);
  });
});

describe("processAllZones", () => {
  it("only unlocks the zones that are locked", async () => {
    const { server, controller, logger } = setup([
      { fqdn: "a.test", locked: true },
      { fqdn: "b.test" },
      { fqdn: "c.test", locked: true },
    ]);

    const summary = await processAllZones(controller, logger, { lock: false, unlock: true });

    expect(server.writes.map((call) => call.path)).toEqual([zoneRef("a.test"), zoneRef("c.test")]);
    expect(summary).toEqual({ total: 3, changed: 2, skipped: 1, failed: 0 });
    expect(server.snapshot().every((zone) => !zone.locked)).toBe(true);
  });

  it("reports every zone after its turn", async () => {
    const { controller, logger } = setup([{ fqdn: "a.test", locked: true }, { fqdn: "b.test" }]);

    await processAllZones(controller, logger, { lock: true, unlock: false });

    expect(logger.messages("info").filter((line) => STATUS_LINE.test(line))).toEqual([
      "Zone: a.test, Locked: true, Locked by: admin",
      "Zone: b.test, Locked: true, Locked by: admin",
    ]);
    expect(logger.messages("info").at(-1)).toBe(
      "Processed 2 zones: 1 changed, 1 skipped, 0 failed",
    );
  });

  it("continues past a failed zone", async () => {
    const { server, controller, logger } = setup([{ fqdn: "a.test" }, { fqdn: "b.test" }]);
    server.respondNextWrite(500, "Internal Server Error");

    const summary = await processAllZones(controller, logger, { lock: true, unlock: false });

    expect(server.writes.map((call) => call.path)).toEqual([zoneRef("a.test"), zoneRef("b.test")]);
    expect(summary).toEqual({ total: 2, changed: 1, skipped: 0, failed: 1 });
    expect(server.snapshot().map((zone) => zone.locked)).toEqual([false, true]);
    expect(logger.messages("error")).toEqual(["Error locking zone: HTTP response: 500"]);
    expect(logger.messages("info")).toContain("Zone: a.test, Locked: false");
  });

  it("limits the batch to one view", async () => {
    const { server, controller, logger } = setup([
      { fqdn: "a.test", view: "internal" },
      { fqdn: "a.test" },
    ]);

    const summary = await processAllZones(controller, logger, {
      lock: true,
      unlock: false,
      view: "internal",
    });

    expect(summary.total).toBe(1);
    expect(server.writes.map((call) => call.path)).toEqual([zoneRef("a.test", "internal")]);
  });

  it("handles an empty zone list", async () => {
    const { server, controller, logger } = setup([]);

    const summary = await processAllZones(controller, logger, { lock: true, unlock: false });

    expect(summary).toEqual({ total: 0, changed: 0, skipped: 0, failed: 0 });
    expect(server.writes).toEqual([]);
    expect(logger.messages("info").at(-1)).toBe("Processed 0 zones: 0 changed, 0 skipped, 0 failed");
  });
});
