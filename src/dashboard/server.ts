import express from "express";
import { createServer } from "http";
import type { EventEmitter } from "events";
import { WebSocketManager, type DashboardState } from "./websocket.js";
import type { OutboundMessage } from "../agent/types.js";
import { errorMessage } from "../errors.js";
import type { AggregatedStatus } from "../health/aggregator.js";
import type { ChangeEvent } from "../rules/types.js";

const MAX_EVENTS = 200;
const MAX_MESSAGES = 100;

export interface DashboardDependencies {
  getState: () => string;
  getStatus: () => AggregatedStatus | null;
  getStatusLines: () => string[];
  readOpsLog: () => Promise<string>;
}

function pushBounded<T>(buffer: T[], items: T[], max: number): void {
  buffer.push(...items);
  if (buffer.length > max) {
    buffer.splice(0, buffer.length - max);
  }
}

function parseLimit(value: unknown, fallback: number): number {
  if (typeof value !== "string") return fallback;
  const parsed = parseInt(value, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

/**
 * Read-only status surface. Keeps the most recent change events and outbound
 * messages in memory and relays them to socket.io clients as they arrive.
 */
export class DashboardServer {
  private app: express.Application;
  private httpServer: ReturnType<typeof createServer>;
  private wsManager: WebSocketManager;
  private port: number;
  private deps: DashboardDependencies;
  private events: ChangeEvent[] = [];
  private messages: OutboundMessage[] = [];
  private listening = false;

  constructor(port: number, deps: DashboardDependencies) {
    this.port = port;
    this.deps = deps;
    this.app = express();
    this.httpServer = createServer(this.app);
    this.wsManager = new WebSocketManager(this.httpServer, () => this.snapshot());

    this.setupRoutes();
  }

  private setupRoutes(): void {
    this.app.get("/health", (req, res) => {
      res.json({ status: "ok", state: this.deps.getState(), timestamp: Date.now() });
    });

    this.app.get("/api/status", (req, res) => {
      res.json({
        state: this.deps.getState(),
        status: this.deps.getStatus(),
        lines: this.deps.getStatusLines(),
      });
    });

    this.app.get("/api/events", (req, res) => {
      const limit = parseLimit(req.query.limit, MAX_EVENTS);
      res.json(this.events.slice(-limit));
    });

    this.app.get("/api/messages", (req, res) => {
      const limit = parseLimit(req.query.limit, MAX_MESSAGES);
      res.json(this.messages.slice(-limit));
    });

    this.app.get("/api/ops-log", async (req, res) => {
      try {
        const content = await this.deps.readOpsLog();
        res.type("text/markdown").send(content);
      } catch (error) {
        res.status(500).json({ error: errorMessage(error) });
      }
    });
  }

  private snapshot(): DashboardState {
    return {
      state: this.deps.getState(),
      status: this.deps.getStatus(),
      events: [...this.events],
      messages: [...this.messages],
    };
  }

  /** Subscribes to the supervisor's "status", "events" and "message" emissions. */
  attach(source: EventEmitter): void {
    source.on("status", (status: AggregatedStatus) => this.publishStatus(status));
    source.on("events", (events: ChangeEvent[]) => this.publishEvents(events));
    source.on("message", (message: OutboundMessage) => this.publishMessage(message));
  }

  publishStatus(status: AggregatedStatus): void {
    this.wsManager.broadcastStatus(status);
  }

  publishEvents(events: ChangeEvent[]): void {
    pushBounded(this.events, events, MAX_EVENTS);
    this.wsManager.broadcastEvents(events);
  }

  publishMessage(message: OutboundMessage): void {
    pushBounded(this.messages, [message], MAX_MESSAGES);
    this.wsManager.broadcastMessage(message);
  }

  /** Resolves with the bound port, which differs from the configured one when that is 0. */
  start(): Promise<number> {
    return new Promise((resolve, reject) => {
      this.httpServer.once("error", reject);
      this.httpServer.listen(this.port, () => {
        this.httpServer.off("error", reject);
        this.listening = true;
        const address = this.httpServer.address();
        const port = typeof address === "object" && address ? address.port : this.port;
        console.log(`[Dashboard] Running at http://localhost:${port}`);
        resolve(port);
      });
    });
  }

  async stop(): Promise<void> {
    if (!this.listening) return;
    this.listening = false;
    await this.wsManager.close();
  }
}
