import { mkdir, readFile, rename, writeFile } from "fs/promises";
import { dirname, join } from "path";
import type { AgentTier } from "../errors.js";
import { errorMessage } from "../errors.js";

export const SESSIONS_FILE = ".sessions.json";

export interface Session {
  tier: AgentTier;
  sessionId: string;
  lastUsedAt: number;
}

type SessionRecord = Partial<Record<AgentTier, { sessionId: string; lastUsedAt: number }>>;

function parseRecord(raw: unknown): SessionRecord {
  const record: SessionRecord = {};
  if (typeof raw !== "object" || raw === null) return record;

  for (const tier of ["observer", "actor"] as const) {
    const entry: unknown = Reflect.get(raw, tier);
    if (typeof entry !== "object" || entry === null) continue;
    const sessionId: unknown = Reflect.get(entry, "sessionId");
    const lastUsedAt: unknown = Reflect.get(entry, "lastUsedAt");
    if (typeof sessionId === "string" && sessionId) {
      record[tier] = { sessionId, lastUsedAt: typeof lastUsedAt === "number" ? lastUsedAt : 0 };
    }
  }
  return record;
}

/** Per-tier agent session ids, kept beside the ops log so they survive restarts. */
export class SessionStore {
  readonly path: string;
  private sessions: SessionRecord | null = null;

  constructor(directory: string) {
    this.path = join(directory, SESSIONS_FILE);
  }

  private async load(): Promise<SessionRecord> {
    if (this.sessions) return this.sessions;

    let content: string;
    try {
      content = await readFile(this.path, "utf-8");
    } catch {
      this.sessions = {};
      return this.sessions;
    }

    try {
      this.sessions = parseRecord(JSON.parse(content));
    } catch (error) {
      console.error(`[Sessions] Ignoring corrupt ${this.path}:`, errorMessage(error));
      this.sessions = {};
    }
    return this.sessions;
  }

  async get(tier: AgentTier): Promise<Session | null> {
    const entry = (await this.load())[tier];
    return entry ? { tier, ...entry } : null;
  }

  async set(tier: AgentTier, sessionId: string, now: number = Date.now()): Promise<void> {
    const sessions = await this.load();
    sessions[tier] = { sessionId, lastUsedAt: now };
    await this.save(sessions);
  }

  async invalidate(tier: AgentTier): Promise<void> {
    const sessions = await this.load();
    if (!sessions[tier]) return;
    delete sessions[tier];
    await this.save(sessions);
    console.log(`[Sessions] Cleared ${tier} session`);
  }

  private async save(sessions: SessionRecord): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });
    const tmp = `${this.path}.tmp`;
    await writeFile(tmp, JSON.stringify(sessions, null, 2), "utf-8");
    await rename(tmp, this.path);
  }
}
