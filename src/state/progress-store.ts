import { readFile, writeFile, appendFile, mkdir, rename } from "fs/promises";
import { existsSync } from "fs";
import { join } from "path";
import { z } from "zod";
import { errorMessage, ErrorType } from "../errors.js";
import { Logger } from "../util/logger.js";

export const MarkerSchema = z.enum([
  "mirror-cloned",
  "lfs-migrated",
  "pushed",
  "skipped-existing",
]);

export const ErrorTypeSchema = z.enum(["transient", "recoverable", "permanent"]);

export const MarkerEntrySchema = z.object({
  marker: MarkerSchema,
  at: z.string(),
});

export const ProgressRecordSchema = z.object({
  version: z.number().default(1),
  slug: z.string(),
  path: z.string().optional(),
  markers: z.array(MarkerEntrySchema).default([]),
  attemptCount: z.number().default(0),
  lastAttempt: z.string().optional(),
  lastError: z.string().optional(),
  errorType: ErrorTypeSchema.optional(),
});

export type Marker = z.infer<typeof MarkerSchema>;
export type MarkerEntry = z.infer<typeof MarkerEntrySchema>;
export type ProgressRecord = z.infer<typeof ProgressRecordSchema>;

/**
 * Append-only progress markers, one JSON record per repository slug plus a
 * `<slug>.state` text log of the same markers. Each slug is only ever touched
 * by the pipeline currently migrating it.
 */
export class ProgressStore {
  private stateDir: string;
  private logger?: Logger;
  private clock: () => Date;
  private records = new Map<string, ProgressRecord>();

  constructor(stateDir: string, options: { logger?: Logger; clock?: () => Date } = {}) {
    this.stateDir = stateDir;
    this.logger = options.logger;
    this.clock = options.clock ?? (() => new Date());
  }

  recordPath(slug: string): string {
    return join(this.stateDir, `${slug}.json`);
  }

  logPath(slug: string): string {
    return join(this.stateDir, `${slug}.state`);
  }

  async load(slug: string): Promise<ProgressRecord> {
    const cached = this.records.get(slug);
    if (cached) return cached;

    let record: ProgressRecord = { version: 1, slug, markers: [], attemptCount: 0 };
    const path = this.recordPath(slug);
    if (existsSync(path)) {
      try {
        const content = await readFile(path, "utf-8");
        record = ProgressRecordSchema.parse(JSON.parse(content));
      } catch (error) {
        this.logger?.warn(`Failed to load progress for ${slug}, starting fresh: ${errorMessage(error)}`);
      }
    }

    this.records.set(slug, record);
    return record;
  }

  async has(slug: string, marker: Marker): Promise<boolean> {
    const record = await this.load(slug);
    return record.markers.some((entry) => entry.marker === marker);
  }

  async markers(slug: string): Promise<Marker[]> {
    const record = await this.load(slug);
    return record.markers.map((entry) => entry.marker);
  }

  /** Records `marker` once; later calls for the same marker are no-ops. */
  async append(slug: string, marker: Marker): Promise<void> {
    const record = await this.load(slug);
    if (record.markers.some((entry) => entry.marker === marker)) return;

    const at = this.clock().toISOString();
    record.markers.push({ marker, at });
    await this.save(record);
    await appendFile(this.logPath(slug), `${at} ${marker}\n`);
  }

  async recordAttempt(slug: string, path: string): Promise<void> {
    const record = await this.load(slug);
    record.path = path;
    record.attemptCount += 1;
    record.lastAttempt = this.clock().toISOString();
    record.lastError = undefined;
    record.errorType = undefined;
    await this.save(record);
  }

  async recordFailure(slug: string, error: string, errorType: ErrorType): Promise<void> {
    const record = await this.load(slug);
    record.lastError = error;
    record.errorType = errorType;
    await this.save(record);
  }

  private async save(record: ProgressRecord): Promise<void> {
    if (!existsSync(this.stateDir)) {
      await mkdir(this.stateDir, { recursive: true });
    }
    const path = this.recordPath(record.slug);
    const tmp = `${path}.tmp`;
    await writeFile(tmp, JSON.stringify(record, null, 2));
    await rename(tmp, path);
  }
}
