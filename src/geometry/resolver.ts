import { z } from "zod";
import type { SearchConfig } from "../config.js";
import { errorMessage } from "../errors.js";
import { createLogger } from "../log.js";
import type { ElementMeasurement, Outcome, ScriptChannel } from "../types.js";

const log = createLogger("resolver");

// Shared by both page functions: visibility, size bounds and ranking.
const CANDIDATE_HELPERS = `
  function isVisible(el) {
    var style = getComputedStyle(el);
    if (style.display === "none" || style.visibility === "hidden") return false;
    if (parseFloat(style.opacity) === 0) return false;
    if (el.offsetParent === null && style.position !== "fixed") return false;
    return true;
  }

  function measure(el, bounds) {
    if (!isVisible(el)) return null;
    var rect = el.getBoundingClientRect();
    if (!(rect.height > 0 && rect.height <= bounds.maxHeight && rect.width > bounds.minWidth)) return null;
    return rect;
  }

  function rank(el) {
    if (el.tagName === "A") return 3;
    if (el.tagName === "BUTTON") return 2;
    if (typeof el.onclick === "function" || getComputedStyle(el).cursor === "pointer") return 1;
    return 0;
  }

  function toResult(el, rect) {
    return {
      found: true,
      absoluteY: rect.top + window.scrollY,
      screenY: rect.top,
      width: rect.width,
      height: rect.height,
      tag: el.tagName,
      text: (el.textContent || "").trim().substring(0, 50),
      href: el.getAttribute("href") || undefined,
    };
  }
`;

const FIND_TEXT_FN = `function(needle, exact, bounds) {
  ${CANDIDATE_HELPERS}

  function matches(el) {
    var text = (el.textContent || "").trim();
    var label = el.getAttribute("aria-label") || "";
    var href = el.getAttribute("href") || "";
    if (exact) return text === needle || label === needle || href === needle;
    return (text.indexOf(needle) !== -1 && text.length < bounds.maxTextLength) ||
      label.indexOf(needle) !== -1 || href.indexOf(needle) !== -1;
  }

  var best = null;
  var bestRank = -1;
  var all = document.querySelectorAll("*");
  for (var i = 0; i < all.length; i++) {
    var el = all[i];
    if (!matches(el)) continue;
    var rect = measure(el, bounds);
    if (!rect) continue;
    var r = rank(el);
    if (r > bestRank) {
      best = toResult(el, rect);
      bestRank = r;
    }
  }
  return best || { found: false };
}`;

const FIND_DOMAIN_FN = `function(target, bounds, sublinkSelector) {
  ${CANDIDATE_HELPERS}

  var slash = target.indexOf("/");
  var baseDomain = slash === -1 ? target : target.substring(0, slash);

  function normalize(href) {
    var h = href.split("#")[0].split("?")[0];
    return h.replace(/\\/+$/, "");
  }

  // Bare domain matches the root only; domain + path matches that exact path.
  function sameTarget(href) {
    var h = normalize(href);
    return h === target || h.endsWith("/" + target) || h.endsWith("." + target);
  }

  var skipped = [];
  function skip(href, reason) {
    if (skipped.length < 20) skipped.push({ href: href, reason: reason });
  }

  var links = document.querySelectorAll("a[href]");
  for (var i = 0; i < links.length; i++) {
    var link = links[i];
    var href = link.getAttribute("href") || "";
    if (href.indexOf(baseDomain) === -1) continue;
    if (link.matches(sublinkSelector)) { skip(href, "sublink"); continue; }
    if (!sameTarget(href)) { skip(href, "mismatch"); continue; }
    var rect = measure(link, bounds);
    if (!rect) { skip(href, "hidden"); continue; }
    return toResult(link, rect);
  }
  return { found: false, skipped: skipped };
}`;

const MeasurementSchema = z.union([
  z.object({
    found: z.literal(true),
    absoluteY: z.number(),
    screenY: z.number(),
    width: z.number(),
    height: z.number(),
    tag: z.string().optional(),
    text: z.string().optional(),
    href: z.string().optional(),
  }),
  z.object({
    found: z.literal(false),
    // Links that mentioned the domain but were passed over.
    skipped: z
      .array(z.object({ href: z.string(), reason: z.enum(["sublink", "mismatch", "hidden"]) }))
      .optional(),
  }),
]);

type Skipped = NonNullable<Extract<z.infer<typeof MeasurementSchema>, { found: false }>["skipped"]>;

function summarize(skipped: Skipped): string {
  const counts = new Map<string, number>();
  for (const s of skipped) counts.set(s.reason, (counts.get(s.reason) ?? 0) + 1);
  return [...counts].map(([reason, n]) => `${n} ${reason}`).join(", ");
}

export interface ResolverBounds {
  maxHeight: number;
  minWidth: number;
  maxTextLength: number;
}

export function boundsFromConfig(search: SearchConfig): ResolverBounds {
  return {
    maxHeight: search.maxElementHeight,
    minWidth: search.minElementWidth,
    maxTextLength: search.maxTextLength,
  };
}

function callExpression(fn: string, args: unknown[]): string {
  return `(${fn})(${args.map((a) => JSON.stringify(a)).join(", ")})`;
}

/**
 * Read-only element lookup on the measurement session. Issues exactly one
 * script evaluation per call and never sends input to the page.
 */
export class GeometryResolver {
  constructor(
    private readonly bounds: ResolverBounds,
    private readonly sublinkSelector: string,
  ) {}

  static fromConfig(search: SearchConfig): GeometryResolver {
    return new GeometryResolver(boundsFromConfig(search), search.sublinkSelector);
  }

  findText(
    channel: ScriptChannel,
    text: string,
    opts: { exact?: boolean } = {},
  ): Promise<Outcome<ElementMeasurement>> {
    const expression = callExpression(FIND_TEXT_FN, [text, opts.exact === true, this.bounds]);
    return this.run(channel, expression, `text "${text}"`);
  }

  findDomainLink(channel: ScriptChannel, domain: string): Promise<Outcome<ElementMeasurement>> {
    const target = domain.trim().replace(/^https?:\/\//, "").replace(/\/+$/, "");
    const expression = callExpression(FIND_DOMAIN_FN, [target, this.bounds, this.sublinkSelector]);
    return this.run(channel, expression, `domain "${target}"`);
  }

  private async run(
    channel: ScriptChannel,
    expression: string,
    what: string,
  ): Promise<Outcome<ElementMeasurement>> {
    let raw: unknown;
    try {
      raw = await channel.evaluate(expression);
    } catch (e) {
      log.error(`Lookup of ${what} failed`, errorMessage(e));
      return { status: "failed", error: { code: "SCRIPT_ERROR", message: errorMessage(e) } };
    }

    const parsed = MeasurementSchema.safeParse(raw);
    if (!parsed.success) {
      log.error(`Lookup of ${what} returned a malformed result`);
      return { status: "failed", error: { code: "SCRIPT_ERROR", message: `Malformed measurement for ${what}` } };
    }

    const result = parsed.data;
    if (!result.found) {
      const skipped = result.skipped ?? [];
      for (const s of skipped) log.debug(`Skipped ${s.href} for ${what}: ${s.reason}`);
      const detail = skipped.length > 0 ? ` (skipped ${summarize(skipped)})` : "";
      log.debug(`No candidate for ${what}${detail}`);
      return { status: "not-found", reason: `No visible candidate for ${what}${detail}` };
    }

    log.debug(`Found ${what}: <${result.tag ?? "?"}> absoluteY=${result.absoluteY.toFixed(0)}`);
    return { status: "ok", value: result };
  }
}
