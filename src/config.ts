import { readFile } from "node:fs/promises";
import { z } from "zod";
import { ConfigError, errorMessage } from "./errors.js";

const ViewportChromeSchema = z.object({
  statusBarHeight: z.number().min(0).default(50),
  addressBarHeight: z.number().min(0).default(56),
  navBarHeight: z.number().min(0).default(0),
});

const PredictionSchema = z.object({
  // Swipe distance lost to touch-to-scroll conversion: 0.85 means a 400px swipe scrolls ~340px.
  calibration: z.number().positive().max(2).default(0.85),
  marginRatio: z.number().min(0).default(0.1),
  marginMin: z.number().int().min(0).default(1),
  marginMax: z.number().int().min(0).default(5),
  moreTargetFraction: z.number().min(0).max(1).default(0.4),
  domainTargetFraction: z.number().min(0).max(1).default(0.35),
  defaultMoreScrollCount: z.number().int().min(0).default(30),
  maxPages: z.number().int().positive().default(5),
});

const SearchSchema = z.object({
  searchUrl: z.string().default("https://m.search.naver.com/search.naver?query={query}"),
  resultsUrl: z
    .string()
    .default("https://m.search.naver.com/search.naver?where=m_web&query={query}&sm=mtb_pge&start={start}"),
  resultsPageSize: z.number().int().positive().default(10),
  expandLabel: z.string().min(1).default("검색결과 더보기"),
  sublinkSelector: z.string().min(1).default('[data-heatmap-target=".sublink"]'),
  maxElementHeight: z.number().positive().default(150),
  minElementWidth: z.number().min(0).default(50),
  maxTextLength: z.number().int().positive().default(50),
});

const CacheSchema = z.object({
  refreshInterval: z.number().int().positive().default(10),
  file: z.string().default("scroll-plan-cache.json"),
});

const ReadingPauseSchema = z.object({
  enabled: z.boolean().default(true),
  probability: z.number().min(0).max(1).default(0.1),
  minMs: z.number().min(0).default(2000),
  maxMs: z.number().min(0).default(4000),
});

const GestureSchema = z.object({
  nominalDistance: z.number().int().positive().default(400),
  distanceRandom: z.number().int().min(0).default(200),
  durationMinMs: z.number().int().min(0).default(300),
  durationMaxMs: z.number().int().min(0).default(600),
  swipeXFraction: z.number().min(0).max(1).default(0.5),
  swipeStartFraction: z.number().min(0).max(1).default(0.76),
  xJitter: z.number().int().min(0).default(30),
  pauseMinMs: z.number().min(0).default(100),
  pauseMaxMs: z.number().min(0).default(200),
  readingPause: ReadingPauseSchema.default({}),
});

const CdpSchema = z.object({
  port: z.number().int().positive().default(9222),
  headless: z.boolean().default(true),
  userAgent: z
    .string()
    .default(
      "Mozilla/5.0 (Linux; Android 14; SM-S928N) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/131.0.0.0 Mobile Safari/537.36",
    ),
  acceptLanguage: z.string().default("ko-KR,ko;q=0.9"),
  deviceScaleFactor: z.number().positive().default(2),
  pageLoadWaitMs: z.number().min(0).default(3000),
  navigationTimeoutMs: z.number().positive().default(30000),
});

const AdbSchema = z.object({
  path: z.string().default("adb"),
  commandTimeoutMs: z.number().positive().default(30000),
});

export const ConfigSchema = z.object({
  viewport: ViewportChromeSchema.default({}),
  prediction: PredictionSchema.default({}),
  search: SearchSchema.default({}),
  cache: CacheSchema.default({}),
  gesture: GestureSchema.default({}),
  cdp: CdpSchema.default({}),
  adb: AdbSchema.default({}),
  debug: z.boolean().default(false),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;
export type PredictionConfig = Config["prediction"];
export type GestureConfig = Config["gesture"];
export type SearchConfig = Config["search"];
export type ViewportChromeConfig = Config["viewport"];

export function parseConfig(input: unknown): Config {
  const parsed = ConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid config: ${issues}`);
  }
  const config = parsed.data;
  if (config.prediction.marginMin > config.prediction.marginMax) {
    throw new ConfigError("Invalid config: prediction.marginMin exceeds prediction.marginMax");
  }
  if (config.gesture.durationMinMs > config.gesture.durationMaxMs) {
    throw new ConfigError("Invalid config: gesture.durationMinMs exceeds gesture.durationMaxMs");
  }
  return config;
}

/** Load and validate a JSON config file; defaults only when no path is given. */
export async function loadConfig(path?: string): Promise<Config> {
  if (!path) return parseConfig({});

  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (e) {
    throw new ConfigError(`Cannot read config ${path}: ${errorMessage(e)}`, { cause: e });
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (e) {
    throw new ConfigError(`Config ${path} is not valid JSON: ${errorMessage(e)}`, { cause: e });
  }
  return parseConfig(json);
}
