import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";
import { errorMessage } from "../errors.js";
import { createLogger } from "../log.js";
import type { ScrollPlan } from "../types.js";

const log = createLogger("cache");

export const ScrollPlanSchema = z.object({
  moreScrollCount: z.number().int(),
  moreElementY: z.number(),
  domainScrollCount: z.number().int().min(-1),
  domainElementY: z.number(),
  domainPage: z.number().int().positive().nullable(),
  viewportHeight: z.number(),
  gestureDistance: z.number(),
  calculated: z.boolean(),
});

const StoreSchema = z.object({
  cache: z.record(ScrollPlanSchema),
  useCount: z.record(z.number().int().min(0)),
});

export type PlanStore = z.infer<typeof StoreSchema>;

export interface CacheOptions {
  /** Reuses allowed before a plan is recomputed. */
  refreshInterval: number;
}

/** JSON array encoding: no query or target content can produce another pair's key. */
export function cacheKey(query: string, target: string): string {
  return JSON.stringify([query, target]);
}

function emptyStore(): PlanStore {
  return { cache: {}, useCount: {} };
}

function isMissingFile(e: unknown): boolean {
  return e instanceof Error && "code" in e && e.code === "ENOENT";
}

/**
 * Last plan per (query, target) with a reuse counter, persisted after every
 * mutation. Page layouts drift, so a plan expires after refreshInterval uses.
 */
export class ScrollPlanCache {
  private writes: Promise<void> = Promise.resolve();

  private constructor(
    private readonly file: string,
    private readonly options: CacheOptions,
    private store: PlanStore,
  ) {}

  static async open(file: string, options: CacheOptions): Promise<ScrollPlanCache> {
    return new ScrollPlanCache(file, options, await loadStore(file));
  }

  async get(query: string, target: string): Promise<ScrollPlan | undefined> {
    const key = cacheKey(query, target);
    const count = this.store.useCount[key] ?? 0;

    if (count === 0 || count >= this.options.refreshInterval) {
      this.store.useCount[key] = 0;
      await this.persist();
      return undefined;
    }
    return this.store.cache[key];
  }

  async set(query: string, target: string, plan: ScrollPlan): Promise<void> {
    const key = cacheKey(query, target);
    this.store.cache[key] = { ...plan };
    this.store.useCount[key] = 1;
    await this.persist();
  }

  async increment(query: string, target: string): Promise<void> {
    const key = cacheKey(query, target);
    this.store.useCount[key] = (this.store.useCount[key] ?? 0) + 1;
    await this.persist();
  }

  count(query: string, target: string): number {
    return this.store.useCount[cacheKey(query, target)] ?? 0;
  }

  get refreshInterval(): number {
    return this.options.refreshInterval;
  }

  get size(): number {
    return Object.keys(this.store.cache).length;
  }

  snapshot(): PlanStore {
    return structuredClone(this.store);
  }

  private persist(): Promise<void> {
    const data = JSON.stringify(this.store, null, 2);
    // Serialize writes so two mutations never race on the temp file.
    const next = this.writes.then(() => writeAtomic(this.file, data));
    this.writes = next.catch(() => undefined);
    return next.catch((e: unknown) => {
      log.error(`Persist to ${this.file} failed`, errorMessage(e));
    });
  }
}

async function writeAtomic(file: string, data: string): Promise<void> {
  const tmp = `${file}.${process.pid}.tmp`;
  await mkdir(dirname(file), { recursive: true });
  await writeFile(tmp, data, "utf-8");
  await rename(tmp, file);
}

export async function loadStore(file: string): Promise<PlanStore> {
  let raw: string;
  try {
    raw = await readFile(file, "utf-8");
  } catch (e) {
    if (isMissingFile(e)) return emptyStore();
    log.error(`Cannot read ${file}, starting empty`, errorMessage(e));
    return emptyStore();
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (e) {
    log.error(`Corrupt cache ${file}, starting empty`, errorMessage(e));
    return emptyStore();
  }

  const parsed = StoreSchema.safeParse(json);
  if (!parsed.success) {
    log.error(`Cache ${file} does not match the store schema, starting empty`);
    return emptyStore();
  }
  log.info(`Loaded ${Object.keys(parsed.data.cache).length} plans from ${file}`);
  return parsed.data;
}
