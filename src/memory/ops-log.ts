import { mkdir, readFile, rename, writeFile } from "fs/promises";
import { dirname, join } from "path";
import { errorMessage } from "../errors.js";

export const SECTIONS = {
  status: "Current Status",
  issues: "Active Issues",
  events: "Recent Events",
  history: "History Summary",
  instructions: "Standing Instructions",
} as const;

export type SectionName = keyof typeof SECTIONS;

const SECTION_ORDER: SectionName[] = ["status", "issues", "events", "history", "instructions"];

export const OPS_LOG_FILE = "ops-log.md";

export function defaultOpsLog(retentionHours: number = 6): string {
  return `# Ops Log

## Current Status
_Waiting for first health check..._

## Active Issues
_None currently_

## Recent Events (Last ${retentionHours}h)
_No events yet_

## History Summary
Key patterns and learnings (compressed, not a full log):
- _No history yet_

## Standing Instructions
- Alert if GPU > 80C
- Alert if dropped frames > 1%
- Alert if disk > 85%
- Keep responses concise (read on mobile)
`;
}

export interface RecentEvent {
  at: Date | null;
  text: string;
  line: string;
}

interface Section {
  header: string;
  key: SectionName | null;
  body: string[];
}

interface ParsedLog {
  preamble: string[];
  sections: Section[];
}

const EVENT_LINE = /^- (\d{2})\/(\d{2}) (\d{2}):(\d{2}) - (.*?)(?: <!-- (\S+) -->)?$/;

const pad = (n: number): string => String(n).padStart(2, "0");

export function formatEventStamp(at: Date): string {
  return `${pad(at.getMonth() + 1)}/${pad(at.getDate())} ${pad(at.getHours())}:${pad(at.getMinutes())}`;
}

export function formatEventLine(text: string, at: Date): string {
  const singleLine = text.replace(/\s*\n\s*/g, " ").trim();
  return `- ${formatEventStamp(at)} - ${singleLine} <!-- ${at.toISOString()} -->`;
}

/**
 * Reads the time of an event line. Lines written by this module carry an ISO
 * timestamp in a trailing comment; hand-written `MM/DD HH:MM` lines are
 * resolved against the year of `now`.
 */
export function parseEventLine(line: string, now: Date = new Date()): RecentEvent | null {
  const match = EVENT_LINE.exec(line);
  if (!match) return null;

  const [, month, day, hours, minutes, text, iso] = match;
  if (iso) {
    const at = new Date(iso);
    if (!Number.isNaN(at.getTime())) return { at, text, line };
  }

  const at = new Date(now.getFullYear(), Number(month) - 1, Number(day), Number(hours), Number(minutes));
  if (at.getTime() > now.getTime()) {
    at.setFullYear(at.getFullYear() - 1);
  }
  return { at, text, line };
}

function parse(content: string): ParsedLog {
  const preamble: string[] = [];
  const sections: Section[] = [];

  for (const line of content.split("\n")) {
    if (line.startsWith("## ")) {
      const title = line.slice(3).trim();
      const key = SECTION_ORDER.find((name) => title.startsWith(SECTIONS[name])) ?? null;
      sections.push({ header: line, key, body: [] });
      continue;
    }
    const current = sections[sections.length - 1];
    if (current) {
      current.body.push(line);
    } else {
      preamble.push(line);
    }
  }

  return { preamble, sections };
}

function trimBlank(lines: string[]): string[] {
  let start = 0;
  let end = lines.length;
  while (start < end && !lines[start].trim()) start++;
  while (end > start && !lines[end - 1].trim()) end--;
  return lines.slice(start, end);
}

function serialize(log: ParsedLog): string {
  const parts: string[] = [];
  const preamble = trimBlank(log.preamble);
  if (preamble.length > 0) parts.push(preamble.join("\n"));

  for (const section of log.sections) {
    parts.push([section.header, ...trimBlank(section.body)].join("\n"));
  }

  return parts.join("\n\n") + "\n";
}

export interface OpsLogOptions {
  retentionHours?: number;
  maxRecentEvents?: number;
}

/**
 * The rolling operational memory: a small markdown document with five
 * sections. This process writes Current Status and Recent Events; the actor
 * edits the rest with its own file tools.
 */
export class OpsLog {
  readonly path: string;
  private retentionHours: number;
  private maxRecentEvents: number;
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(directory: string, options: OpsLogOptions = {}) {
    this.path = join(directory, OPS_LOG_FILE);
    this.retentionHours = options.retentionHours ?? 6;
    this.maxRecentEvents = options.maxRecentEvents ?? 20;
  }

  async ensureExists(): Promise<void> {
    try {
      await readFile(this.path, "utf-8");
      return;
    } catch {
      // missing; create below
    }

    await mkdir(dirname(this.path), { recursive: true });
    await this.write(defaultOpsLog(this.retentionHours));
    console.log(`[OpsLog] Created ${this.path}`);
  }

  async read(): Promise<string> {
    try {
      return await readFile(this.path, "utf-8");
    } catch (error) {
      console.error(`[OpsLog] Failed to read ${this.path}:`, errorMessage(error));
      return defaultOpsLog(this.retentionHours);
    }
  }

  async section(name: SectionName): Promise<string> {
    const log = parse(await this.read());
    const section = log.sections.find((s) => s.key === name);
    return section ? trimBlank(section.body).join("\n") : "";
  }

  async recentEvents(now: Date = new Date()): Promise<RecentEvent[]> {
    const body = await this.section("events");
    const events: RecentEvent[] = [];
    for (const line of body.split("\n")) {
      if (!line.startsWith("- ")) continue;
      events.push(parseEventLine(line, now) ?? { at: null, text: line.slice(2), line });
    }
    return events;
  }

  /** Replaces the Current Status section with the latest cycle's lines. */
  applyStatus(lines: string[], at: Date = new Date()): Promise<void> {
    return this.mutate((log) => {
      const body = [`_Updated ${formatEventStamp(at)}_`, ...lines.map((line) => `- ${line}`)];
      this.sectionFor(log, "status").body = body;
    });
  }

  /** Adds an event at the top of Recent Events, then trims by age and count. */
  appendEvent(text: string, at: Date = new Date()): Promise<void> {
    return this.mutate((log) => {
      const section = this.sectionFor(log, "events");
      const entries = section.body.filter((line) => line.startsWith("- "));
      section.body = [formatEventLine(text, at), ...entries];
      this.trimSection(section, at);
    });
  }

  /** Appends a learning to History Summary, replacing the placeholder. */
  addToHistory(text: string): Promise<void> {
    return this.mutate((log) => {
      const section = this.sectionFor(log, "history");
      const body = trimBlank(section.body).filter((line) => line.trim() !== "- _No history yet_");
      section.body = [...body, `- ${text.replace(/\s*\n\s*/g, " ").trim()}`];
    });
  }

  trimEvents(now: Date = new Date()): Promise<void> {
    return this.mutate((log) => {
      const section = log.sections.find((s) => s.key === "events");
      if (section) this.trimSection(section, now);
    });
  }

  /**
   * The document for prompts, at most `maxChars` long where possible. Oldest
   * recent events are dropped first; no other section is shortened.
   */
  async render(maxChars: number = Infinity, now: Date = new Date()): Promise<string> {
    const log = parse(await this.read());
    const events = log.sections.find((s) => s.key === "events");
    if (events) this.trimSection(events, now);

    let rendered = serialize(log);
    while (events && rendered.length > maxChars) {
      const lastEntry = events.body.map((line) => line.startsWith("- ")).lastIndexOf(true);
      if (lastEntry === -1) break;
      events.body.splice(lastEntry, 1);
      rendered = serialize(log);
    }
    return rendered;
  }

  /** A prompt asking the agent to fold recent events into the history summary. */
  async compressionPrompt(): Promise<string> {
    const events = await this.section("events");
    const entries = events.split("\n").filter((line) => line.startsWith("- "));
    if (entries.length < 5) return "";

    const history = await this.section("history");
    return `Review these recent events and update the history summary in ${this.path}.

Current History Summary:
${history}

Recent Events to Review:
${entries.join("\n")}

---
Extract any patterns, learnings, or important context worth remembering.
Keep the summary concise (max 10 bullet points total).
Don't duplicate what's already in history.
If nothing new is worth adding, respond with just "No updates needed."`;
  }

  private trimSection(section: Section, now: Date): void {
    const cutoff = now.getTime() - this.retentionHours * 3600 * 1000;
    const kept: string[] = [];

    for (const line of section.body) {
      if (!line.startsWith("- ")) {
        // Placeholder text goes once real entries exist
        if (line.trim()) kept.push(line);
        continue;
      }
      const event = parseEventLine(line, now);
      if (event?.at && event.at.getTime() < cutoff) continue;
      kept.push(line);
    }

    const entries = kept.filter((line) => line.startsWith("- ")).slice(0, this.maxRecentEvents);
    section.body = entries.length > 0 ? entries : kept.length > 0 ? kept : ["_No events yet_"];
  }

  private sectionFor(log: ParsedLog, key: SectionName): Section {
    const existing = log.sections.find((s) => s.key === key);
    if (existing) return existing;

    const header = key === "events" ? `## ${SECTIONS.events} (Last ${this.retentionHours}h)` : `## ${SECTIONS[key]}`;
    const created: Section = { header, key, body: [] };

    const order = SECTION_ORDER.indexOf(key);
    const before = log.sections.findIndex((s) => s.key !== null && SECTION_ORDER.indexOf(s.key) > order);
    if (before === -1) {
      log.sections.push(created);
    } else {
      log.sections.splice(before, 0, created);
    }
    return created;
  }

  /** Like read(), but only a missing file falls back to the template. */
  private async readForUpdate(): Promise<string> {
    try {
      return await readFile(this.path, "utf-8");
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        return defaultOpsLog(this.retentionHours);
      }
      throw error;
    }
  }

  private mutate(change: (log: ParsedLog) => void): Promise<void> {
    const run = this.writeQueue.then(async () => {
      // Writing the template over an unreadable file would erase the actor's sections
      const log = parse(await this.readForUpdate());
      change(log);
      await this.write(serialize(log));
    });
    // Keep the queue alive after a failed write; the caller still sees the error
    this.writeQueue = run.catch(() => undefined);
    return run;
  }

  private async write(content: string): Promise<void> {
    const tmp = `${this.path}.tmp`;
    await writeFile(tmp, content, "utf-8");
    await rename(tmp, this.path);
  }
}
