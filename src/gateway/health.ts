import { Hono } from "hono";
import { serve } from "@hono/node-server";
import type { BotConnection } from "../connection/frame.js";
import type { Scheduler } from "../scheduler/scheduler.js";

interface BotHealth {
  id: string;
  state: string;
  adapter: string;
  userId: string;
  nickname?: string;
  pendingWaiters: number;
  oldestWaiterAgeMs: number;
}

export class HealthServer {
  readonly app: Hono;
  private server: ReturnType<typeof serve> | null = null;
  private readonly startedAt = Date.now();

  constructor(
    private readonly connections: readonly BotConnection[],
    private readonly scheduler: Scheduler,
    private readonly port: number,
    private readonly hostname: string,
    private readonly version = "0.1.0",
  ) {
    this.app = new Hono();
    this.setupRoutes();
  }

  private setupRoutes(): void {
    this.app.get("/health", (c) => {
      const bots = this.getBotStatuses();
      const connected = bots.filter((b) => b.state === "connected").length;
      const uptime = Date.now() - this.startedAt;
      const mem = process.memoryUsage();

      return c.json({
        status: connected > 0 ? "ok" : "degraded",
        version: this.version,
        uptime,
        uptimeHuman: formatUptime(uptime),
        bots,
        scheduledTasks: this.scheduler.size,
        system: {
          memoryMB: {
            rss: Math.round(mem.rss / 1024 / 1024),
            heapUsed: Math.round(mem.heapUsed / 1024 / 1024),
          },
          nodeVersion: process.version,
          pid: process.pid,
        },
      });
    });

    this.app.get("/ready", (c) => {
      const connected = this.connections.filter((conn) => conn.state === "connected").length;
      if (connected === 0) {
        return c.json({ ready: false, reason: "no bot connected" }, 503);
      }
      return c.json({ ready: true, bots: connected });
    });
  }

  private getBotStatuses(): BotHealth[] {
    return this.connections.map((conn) => ({
      id: conn.id,
      state: conn.state,
      adapter: conn.bot.adapter,
      userId: conn.bot.loginUser.id,
      nickname: conn.bot.loginUser.nick,
      pendingWaiters: conn.pendingWaiters,
      oldestWaiterAgeMs: conn.oldestWaiterAgeMs,
    }));
  }

  async start(): Promise<void> {
    this.server = serve({
      fetch: this.app.fetch,
      port: this.port,
      hostname: this.hostname,
    });
  }

  async stop(): Promise<void> {
    if (this.server) {
      this.server.close();
      this.server = null;
    }
  }
}

export function formatUptime(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);
  const days = Math.floor(hours / 24);

  if (days > 0) return `${days}d ${hours % 24}h`;
  if (hours > 0) return `${hours}h ${minutes % 60}m`;
  if (minutes > 0) return `${minutes}m ${seconds % 60}s`;
  return `${seconds}s`;
}
