import { JSDOM } from "jsdom";
import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import type { MeasurementSession, ScriptChannel, ViewportGeometry } from "../src/types.js";

// jsdom has no layout engine. Elements carry their document-space box in
// data-box="left,top,width,height"; rects are reported relative to scrollY.
const LAYOUT_STUB = `
  (function () {
    function hiddenByAncestor(el) {
      for (var cur = el; cur; cur = cur.parentElement) {
        if (getComputedStyle(cur).display === "none") return true;
      }
      return false;
    }
    Object.defineProperty(HTMLElement.prototype, "getBoundingClientRect", {
      configurable: true,
      value: function () {
        var parts = (this.getAttribute("data-box") || "0,0,0,0").split(",").map(Number);
        var top = parts[1] - window.scrollY;
        return { left: parts[0], top: top, width: parts[2], height: parts[3],
          right: parts[0] + parts[2], bottom: top + parts[3], x: parts[0], y: top };
      },
    });
    Object.defineProperty(HTMLElement.prototype, "offsetParent", {
      configurable: true,
      get: function () {
        if (hiddenByAncestor(this)) return null;
        if (getComputedStyle(this).position === "fixed") return null;
        return this.parentElement;
      },
    });
  })();
`;

/** An in-process page that evaluates expressions the way Runtime.evaluate does. */
export class JsdomPage implements ScriptChannel {
  readonly dom: JSDOM;
  evaluations = 0;

  constructor(html: string, opts: { url?: string; scrollY?: number } = {}) {
    this.dom = new JSDOM(html, { url: opts.url ?? "https://search.test/", runScripts: "outside-only" });
    this.dom.window.eval(LAYOUT_STUB);
    if (opts.scrollY) {
      this.dom.window.eval(
        `Object.defineProperty(window, "scrollY", { value: ${opts.scrollY}, configurable: true, writable: true });`,
      );
    }
  }

  async evaluate(expression: string): Promise<unknown> {
    this.evaluations++;
    const value: unknown = this.dom.window.eval(expression);
    // returnByValue semantics: plain JSON data only.
    return value === undefined ? undefined : JSON.parse(JSON.stringify(value));
  }
}

export function fixture(name: string): string {
  return readFileSync(resolve(import.meta.dirname, "fixtures", name), "utf-8");
}

const BLANK = "<!doctype html><html><body></body></html>";

/** A measurement session whose pages are loaded from fixtures by URL. */
export class FixtureSession implements MeasurementSession {
  readonly visited: string[] = [];
  emulated: ViewportGeometry | null = null;
  failOn: ((url: string) => boolean) | null = null;
  /** Delay after each load, so concurrent callers can interleave. */
  settleMs = 0;
  private page: JsdomPage | null = null;

  constructor(private readonly pages: Record<string, string> = {}) {}

  async emulate(geometry: ViewportGeometry): Promise<void> {
    this.emulated = geometry;
  }

  async navigate(url: string): Promise<void> {
    this.visited.push(url);
    if (this.failOn?.(url)) throw new Error(`net::ERR_NAME_NOT_RESOLVED at ${url}`);
    this.page = new JsdomPage(this.pages[url] ?? BLANK, { url });
    if (this.settleMs > 0) await new Promise<void>((resolve) => setTimeout(resolve, this.settleMs));
  }

  async evaluate(expression: string): Promise<unknown> {
    if (!this.page) throw new Error("No page loaded");
    return this.page.evaluate(expression);
  }
}
