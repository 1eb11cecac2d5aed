import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type { BotConnection, ConnectionState } from "../../src/connection/frame.js";
import { disconnectedWriter } from "../../src/connection/writer.js";
import { formatUptime, HealthServer } from "../../src/gateway/health.js";
import { unknownBot, type BotStatus } from "../../src/protocol/event.js";
import { Scheduler } from "../../src/scheduler/scheduler.js";
import { makeContext, makeServices, silentLogger } from "../helpers/fixtures.js";

function stubConnection(id: string, state: ConnectionState, bot: BotStatus = unknownBot("onebot", "qq")): BotConnection {
  const services = makeServices();
  return {
    id,
    state,
    bot,
    pendingWaiters: 2,
    oldestWaiterAgeMs: 1_500,
    writer: disconnectedWriter,
    createContext: (event) => makeContext(services, event),
    start: () => undefined,
    stop: async () => undefined,
  };
}

const identified: BotStatus = {
  adapter: "onebot",
  platform: "qq",
  loginUser: { id: "10001", name: "tide", nick: "tide" },
};

describe("HealthServer", () => {
  let scheduler: Scheduler;

  beforeEach(() => {
    scheduler = new Scheduler(silentLogger());
  });

  afterEach(() => {
    scheduler.shutdown();
  });

  describe("GET /health", () => {
    it("reports every connection and the scheduled task count", async () => {
      scheduler.addInterval(60_000, () => undefined);
      const server = new HealthServer(
        [stubConnection("onebot-0", "connected", identified), stubConnection("onebot-1", "connecting")],
        scheduler,
        19877,
        "127.0.0.1",
      );

      const res = await server.app.request("/health");
      expect(res.status).toBe(200);

      const body: unknown = await res.json();
      expect(body).toMatchObject({
        status: "ok",
        version: "0.1.0",
        scheduledTasks: 1,
        bots: [
          { id: "onebot-0", state: "connected", adapter: "onebot", userId: "10001", nickname: "tide", pendingWaiters: 2, oldestWaiterAgeMs: 1_500 },
          { id: "onebot-1", state: "connecting", adapter: "onebot", userId: "0", pendingWaiters: 2, oldestWaiterAgeMs: 1_500 },
        ],
      });
      expect(body).toHaveProperty("system.nodeVersion", process.version);
    });

    it("is degraded with nothing connected", async () => {
      const server = new HealthServer([stubConnection("onebot-0", "disconnected")], scheduler, 19877, "127.0.0.1");

      const res = await server.app.request("/health");

      expect(await res.json()).toMatchObject({ status: "degraded" });
    });
  });

  describe("GET /ready", () => {
    it("returns 503 until a bot is connected", async () => {
      const server = new HealthServer([stubConnection("onebot-0", "connecting")], scheduler, 19877, "127.0.0.1");

      const res = await server.app.request("/ready");

      expect(res.status).toBe(503);
      expect(await res.json()).toEqual({ ready: false, reason: "no bot connected" });
    });

    it("counts connected bots", async () => {
      const server = new HealthServer(
        [stubConnection("onebot-0", "connected"), stubConnection("console-1", "connected")],
        scheduler,
        19877,
        "127.0.0.1",
      );

      const res = await server.app.request("/ready");

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ ready: true, bots: 2 });
    });
  });
});

describe("formatUptime", () => {
  it("uses the two largest units", () => {
    expect(formatUptime(42_000)).toBe("42s");
    expect(formatUptime(125_000)).toBe("2m 5s");
    expect(formatUptime(3 * 3_600_000 + 7 * 60_000)).toBe("3h 7m");
    expect(formatUptime(26 * 3_600_000)).toBe("1d 2h");
  });
});
