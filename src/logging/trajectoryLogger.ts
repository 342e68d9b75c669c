import fs from "node:fs/promises";
import path from "node:path";

import { z } from "zod";

import { sumCosts } from "../pricing.js";
import { type TrajectoryEvent } from "../types.js";
import { logVerbose } from "./events.js";
import { redactTrajectoryEvent, resolveRedactionPolicy } from "./redaction.js";
import { type RedactionPolicy, type TrajectoryMetadata } from "./traceTypes.js";

export interface TrajectoryLoggerOptions {
  logDir?: string;
  redactionPolicy?: Partial<RedactionPolicy>;
  verbose?: boolean;
}

export interface TrajectorySummary {
  id: string;
  modifiedAt: string;
  eventCount: number;
  totalTokens: number;
  totalCostUsd: number | null;
}

const TRAJECTORY_EXTENSION = ".jsonl";
const DAY_MS = 24 * 60 * 60 * 1000;

const toolCallSchema = z.object({
  id: z.string(),
  name: z.string(),
  arguments: z.record(z.unknown()),
});

const toolResultSchema = z.object({
  toolCallId: z.string(),
  content: z.string(),
  isError: z.boolean(),
});

const trajectoryEventSchema = z.object({
  trajectoryId: z.string(),
  callId: z.string(),
  parentCallId: z.string().nullable(),
  depth: z.number().int(),
  prompt: z.string(),
  response: z.string().nullable(),
  toolCalls: z.array(toolCallSchema),
  toolResults: z.array(toolResultSchema),
  inputTokens: z.number(),
  outputTokens: z.number(),
  durationMs: z.number(),
  error: z.string().optional(),
  estimatedCostUsd: z.number().nullable().optional(),
  timestamp: z.string(),
});

const metadataSchema = z.object({
  _type: z.literal("trajectory_metadata"),
  eventCount: z.number().optional(),
  totalTokens: z.number().optional(),
  totalCostUsd: z.number().nullable().optional(),
});

/**
 * Persists trajectories as JSONL, one file per trajectory id: a metadata
 * record followed by one line per event.
 */
export class TrajectoryLogger {
  readonly logDir: string;
  private readonly redactionPolicy: RedactionPolicy;
  private readonly verbose: boolean;

  constructor(options: TrajectoryLoggerOptions = {}) {
    this.logDir = options.logDir ?? "./logs";
    this.redactionPolicy = resolveRedactionPolicy(options.redactionPolicy);
    this.verbose = options.verbose ?? false;
  }

  /** Writes the whole trajectory, replacing any earlier file for the id. */
  async logTrajectory(trajectoryId: string, events: readonly TrajectoryEvent[]): Promise<string> {
    const outputPath = this.pathFor(trajectoryId);
    await fs.mkdir(this.logDir, { recursive: true });

    const metadata: TrajectoryMetadata = {
      _type: "trajectory_metadata",
      trajectoryId,
      eventCount: events.length,
      totalTokens: events.reduce((sum, event) => sum + event.inputTokens + event.outputTokens, 0),
      totalDurationMs: events.reduce((sum, event) => sum + event.durationMs, 0),
      totalCostUsd: sumCosts(events.map((event) => event.estimatedCostUsd)),
      createdAt: new Date().toISOString(),
    };

    const lines = [JSON.stringify(metadata), ...events.map((event) => this.serialize(event))];
    const payload = `${lines.join("\n")}\n`;
    const temporaryPath = `${outputPath}.tmp-${process.pid}-${Date.now()}`;

    await fs.writeFile(temporaryPath, payload, "utf8");
    await fs.rename(temporaryPath, outputPath);

    logVerbose(this.verbose, `trajectory ${trajectoryId} written (${events.length} events) -> ${outputPath}`);
    return outputPath;
  }

  async logEvent(event: TrajectoryEvent): Promise<void> {
    await fs.mkdir(this.logDir, { recursive: true });
    await fs.appendFile(this.pathFor(event.trajectoryId), `${this.serialize(event)}\n`, "utf8");
  }

  /** Events of a stored trajectory, or null when no file exists for the id. */
  async loadTrajectory(trajectoryId: string): Promise<TrajectoryEvent[] | null> {
    const raw = await readOrNull(this.pathFor(trajectoryId));
    if (raw === null) {
      return null;
    }

    const events: TrajectoryEvent[] = [];
    for (const line of raw.split("\n")) {
      const record = parseLine(line);
      if (record === undefined || metadataSchema.safeParse(record).success) {
        continue;
      }
      const parsed = trajectoryEventSchema.safeParse(record);
      if (parsed.success) {
        events.push(parsed.data);
      } else {
        logVerbose(this.verbose, `skipping malformed event in ${trajectoryId}: ${parsed.error.message}`);
      }
    }
    return events;
  }

  /** Stored trajectories, most recently modified first. */
  async listTrajectories(limit = 20): Promise<TrajectorySummary[]> {
    const names = await readDirOrEmpty(this.logDir);
    const summaries: TrajectorySummary[] = [];
    const mtimes = new Map<string, number>();

    for (const name of names) {
      if (!name.endsWith(TRAJECTORY_EXTENSION)) {
        continue;
      }
      const filePath = path.join(this.logDir, name);
      const stats = await fs.stat(filePath);
      const raw = await fs.readFile(filePath, "utf8");
      const metadata = metadataSchema.safeParse(parseLine(raw.split("\n", 1)[0] ?? ""));
      const id = name.slice(0, -TRAJECTORY_EXTENSION.length);

      mtimes.set(id, stats.mtimeMs);
      summaries.push({
        id,
        modifiedAt: stats.mtime.toISOString(),
        eventCount: metadata.success ? (metadata.data.eventCount ?? 0) : 0,
        totalTokens: metadata.success ? (metadata.data.totalTokens ?? 0) : 0,
        totalCostUsd: metadata.success ? (metadata.data.totalCostUsd ?? null) : null,
      });
    }

    summaries.sort((left, right) => (mtimes.get(right.id) ?? 0) - (mtimes.get(left.id) ?? 0));
    return summaries.slice(0, limit);
  }

  async deleteTrajectory(trajectoryId: string): Promise<boolean> {
    try {
      await fs.unlink(this.pathFor(trajectoryId));
      return true;
    } catch (error) {
      if (isMissingFile(error)) {
        return false;
      }
      throw error;
    }
  }

  /** Deletes trajectory files older than `maxAgeDays`; returns how many were removed. */
  async cleanupOld(maxAgeDays: number, now: Date = new Date()): Promise<number> {
    const cutoff = now.getTime() - maxAgeDays * DAY_MS;
    let removed = 0;

    for (const name of await readDirOrEmpty(this.logDir)) {
      if (!name.endsWith(TRAJECTORY_EXTENSION)) {
        continue;
      }
      const filePath = path.join(this.logDir, name);
      const stats = await fs.stat(filePath);
      if (stats.mtimeMs < cutoff) {
        await fs.unlink(filePath);
        removed += 1;
      }
    }
    return removed;
  }

  pathFor(trajectoryId: string): string {
    if (trajectoryId.length === 0 || path.basename(trajectoryId) !== trajectoryId) {
      throw new Error(`Invalid trajectory id: ${trajectoryId}`);
    }
    return path.join(this.logDir, `${trajectoryId}${TRAJECTORY_EXTENSION}`);
  }

  private serialize(event: TrajectoryEvent): string {
    return JSON.stringify(redactTrajectoryEvent(event, this.redactionPolicy));
  }
}

function parseLine(line: string): unknown {
  const trimmed = line.trim();
  if (trimmed.length === 0) {
    return undefined;
  }
  try {
    return JSON.parse(trimmed);
  } catch {
    return undefined;
  }
}

async function readOrNull(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, "utf8");
  } catch (error) {
    if (isMissingFile(error)) {
      return null;
    }
    throw error;
  }
}

async function readDirOrEmpty(dirPath: string): Promise<string[]> {
  try {
    return await fs.readdir(dirPath);
  } catch (error) {
    if (isMissingFile(error)) {
      return [];
    }
    throw error;
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
