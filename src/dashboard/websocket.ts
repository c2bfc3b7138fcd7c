import { Server as SocketIOServer } from "socket.io";
import type { Server as HTTPServer } from "http";
import type { OutboundMessage } from "../agent/types.js";
import type { AggregatedStatus } from "../health/aggregator.js";
import type { ChangeEvent } from "../rules/types.js";

export interface DashboardState {
  state: string;
  status: AggregatedStatus | null;
  events: ChangeEvent[];
  messages: OutboundMessage[];
}

/** Pushes live status to dashboard clients over socket.io. */
export class WebSocketManager {
  private io: SocketIOServer;

  constructor(httpServer: HTTPServer, getState: () => DashboardState) {
    this.io = new SocketIOServer(httpServer, {
      cors: {
        origin: "*",
        methods: ["GET"],
      },
    });

    this.io.on("connection", (socket) => {
      console.log(`[Dashboard] Client connected: ${socket.id}`);

      socket.on("disconnect", () => {
        console.log(`[Dashboard] Client disconnected: ${socket.id}`);
      });

      socket.on("request-state", () => {
        socket.emit("state", getState());
      });
    });
  }

  broadcastStatus(status: AggregatedStatus): void {
    this.io.emit("status", status);
  }

  broadcastEvents(events: ChangeEvent[]): void {
    this.io.emit("events", events);
  }

  broadcastMessage(message: OutboundMessage): void {
    this.io.emit("message", message);
  }

  /** Disconnects clients and closes the underlying HTTP server. */
  close(): Promise<void> {
    return new Promise((resolve, reject) => {
      void this.io.close((err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }
}
