import { createHash } from "crypto";
import WebSocket from "ws";

// obs-websocket v5 opcodes
const OP_HELLO = 0;
const OP_IDENTIFY = 1;
const OP_IDENTIFIED = 2;
const OP_REQUEST = 6;
const OP_REQUEST_RESPONSE = 7;

export type ObsResponseData = Record<string, unknown>;

export interface ObsRequester {
  readonly connected: boolean;
  connect(): Promise<void>;
  request(requestType: string, requestData?: Record<string, unknown>): Promise<ObsResponseData>;
  close(): Promise<void>;
}

interface PendingRequest {
  resolve: (data: ObsResponseData) => void;
  reject: (error: Error) => void;
  timer: ReturnType<typeof setTimeout>;
}

interface ObsMessage {
  op: number;
  d: Record<string, unknown>;
}

export function computeObsAuth(password: string, salt: string, challenge: string): string {
  const secret = createHash("sha256").update(password + salt).digest("base64");
  return createHash("sha256").update(secret + challenge).digest("base64");
}

function parseMessage(raw: WebSocket.RawData): ObsMessage | null {
  try {
    const parsed: unknown = JSON.parse(raw.toString());
    if (typeof parsed !== "object" || parsed === null) return null;
    const op = "op" in parsed ? parsed.op : undefined;
    const d = "d" in parsed ? parsed.d : undefined;
    if (typeof op !== "number" || typeof d !== "object" || d === null) return null;
    return { op, d: { ...d } };
  } catch {
    return null;
  }
}

function asRecord(value: unknown): Record<string, unknown> {
  return typeof value === "object" && value !== null ? { ...value } : {};
}

export class ObsClient implements ObsRequester {
  private url: string;
  private password: string;
  private timeoutMs: number;
  private socket: WebSocket | null = null;
  private identified = false;
  private nextId = 0;
  private pending: Map<string, PendingRequest> = new Map();

  constructor(host: string, port: number, password: string, timeoutMs: number = 5000) {
    this.url = `ws://${host}:${port}`;
    this.password = password;
    this.timeoutMs = timeoutMs;
  }

  get connected(): boolean {
    return this.identified && this.socket?.readyState === WebSocket.OPEN;
  }

  async connect(): Promise<void> {
    await this.close();

    const socket = new WebSocket(this.url, { handshakeTimeout: this.timeoutMs });
    this.socket = socket;

    await new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        fail(new Error(`OBS handshake timed out after ${this.timeoutMs}ms`));
      }, this.timeoutMs);

      const fail = (error: Error) => {
        clearTimeout(timer);
        socket.removeAllListeners("message");
        socket.terminate();
        reject(error);
      };

      socket.once("error", fail);
      socket.once("close", () => fail(new Error("OBS closed the connection during handshake")));

      socket.on("message", (raw) => {
        const message = parseMessage(raw);
        if (!message) return;

        if (message.op === OP_HELLO) {
          const auth = asRecord(message.d.authentication);
          const identify: Record<string, unknown> = { rpcVersion: 1 };
          if (typeof auth.challenge === "string" && typeof auth.salt === "string") {
            identify.authentication = computeObsAuth(this.password, auth.salt, auth.challenge);
          }
          socket.send(JSON.stringify({ op: OP_IDENTIFY, d: identify }));
          return;
        }

        if (message.op === OP_IDENTIFIED) {
          clearTimeout(timer);
          socket.removeAllListeners("message");
          socket.removeAllListeners("close");
          socket.removeAllListeners("error");
          this.attach(socket);
          this.identified = true;
          resolve();
        }
      });
    });
  }

  private attach(socket: WebSocket): void {
    socket.on("message", (raw) => {
      const message = parseMessage(raw);
      if (!message || message.op !== OP_REQUEST_RESPONSE) return;

      const requestId = message.d.requestId;
      if (typeof requestId !== "string") return;
      const pending = this.pending.get(requestId);
      if (!pending) return;

      this.pending.delete(requestId);
      clearTimeout(pending.timer);

      const status = asRecord(message.d.requestStatus);
      if (status.result === true) {
        pending.resolve(asRecord(message.d.responseData));
      } else {
        const comment = typeof status.comment === "string" ? status.comment : `code ${String(status.code)}`;
        pending.reject(new Error(`OBS request failed: ${comment}`));
      }
    });

    socket.on("close", () => {
      this.identified = false;
      this.rejectAll(new Error("OBS connection closed"));
    });

    socket.on("error", (error) => {
      console.error("[OBS] Socket error:", error.message);
    });
  }

  request(requestType: string, requestData: Record<string, unknown> = {}): Promise<ObsResponseData> {
    const socket = this.socket;
    if (!socket || !this.connected) {
      return Promise.reject(new Error("Not connected to OBS"));
    }

    const requestId = String(++this.nextId);

    return new Promise<ObsResponseData>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending.delete(requestId);
        reject(new Error(`OBS ${requestType} timed out after ${this.timeoutMs}ms`));
      }, this.timeoutMs);

      this.pending.set(requestId, { resolve, reject, timer });
      socket.send(
        JSON.stringify({ op: OP_REQUEST, d: { requestType, requestId, requestData } })
      );
    });
  }

  private rejectAll(error: Error): void {
    for (const [id, pending] of this.pending) {
      clearTimeout(pending.timer);
      pending.reject(error);
      this.pending.delete(id);
    }
  }

  async close(): Promise<void> {
    const socket = this.socket;
    this.socket = null;
    this.identified = false;
    this.rejectAll(new Error("OBS client closed"));

    if (socket) {
      socket.removeAllListeners();
      // Keep an error listener so a late socket error is not thrown as unhandled
      socket.on("error", () => undefined);
      socket.terminate();
    }
  }
}
