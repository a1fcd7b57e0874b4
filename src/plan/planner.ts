import type { Config } from "../config.js";
import { errorMessage, toErrorDetail } from "../errors.js";
import { GeometryResolver } from "../geometry/resolver.js";
import { buildViewportGeometry, isGeometryError } from "../geometry/viewport.js";
import { createLogger } from "../log.js";
import {
  explainMarginFreeCount,
  explainMarginPaddedCount,
  formatBreakdown,
} from "../predict/predictor.js";
import type {
  ElementMeasurement,
  MeasurementSession,
  Outcome,
  PlanLookup,
  PlanPhase,
  ScrollPlan,
  ViewportGeometry,
} from "../types.js";
import type { ScrollPlanCache } from "./cache.js";

const log = createLogger("planner");

export type PlannerConfig = Pick<Config, "viewport" | "prediction" | "search" | "gesture">;

export function fillUrl(template: string, query: string, start?: number): string {
  return template
    .replaceAll("{query}", encodeURIComponent(query))
    .replaceAll("{start}", String(start ?? 1));
}

export function emptyPlan(geometry?: ViewportGeometry, gestureDistance = 0): ScrollPlan {
  return {
    moreScrollCount: 0,
    moreElementY: 0,
    domainScrollCount: -1,
    domainElementY: 0,
    domainPage: null,
    viewportHeight: geometry?.effectiveViewportHeight ?? 0,
    gestureDistance,
    calculated: false,
  };
}

/** The only way a plan reaches the actuator. */
export function gestureCountFor(plan: ScrollPlan, phase: PlanPhase): Outcome<number> {
  if (!plan.calculated) {
    return { status: "failed", error: { code: "PLAN_NOT_CALCULATED", message: "Plan was not calculated" } };
  }
  if (phase === "more") return { status: "ok", value: plan.moreScrollCount };
  if (plan.domainScrollCount < 0) {
    return { status: "not-found", reason: "Target was not found within the searched pages" };
  }
  return { status: "ok", value: plan.domainScrollCount };
}

class NavigationFailure extends Error {}

/**
 * Measures the page on the surrogate session and turns the measurements into
 * gesture counts. Plans are cached per (query, target) through the injected cache.
 */
export class ScrollPlanner {
  private readonly resolver: GeometryResolver;
  private measuring: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly session: MeasurementSession,
    private readonly cache: ScrollPlanCache,
    private readonly config: PlannerConfig,
    resolver?: GeometryResolver,
  ) {
    this.resolver = resolver ?? GeometryResolver.fromConfig(config.search);
  }

  async getPlan(
    query: string,
    target: string,
    screen: { width: number; height: number },
    opts: { forceRefresh?: boolean } = {},
  ): Promise<PlanLookup> {
    if (!opts.forceRefresh) {
      const cached = await this.cache.get(query, target);
      if (cached) {
        log.info(`Cache hit (${this.cache.count(query, target)}/${this.cache.refreshInterval}) for "${query}" -> ${target}`);
        await this.cache.increment(query, target);
        return { plan: cached, source: "cache" };
      }
    }

    log.info(`Computing plan for "${query}" -> ${target} (force=${opts.forceRefresh === true})`);
    const plan = await this.computePlan(query, target, screen.width, screen.height);
    if (plan.calculated) {
      await this.cache.set(query, target, plan);
      log.info(`Plan cached, reused for the next ${this.cache.refreshInterval - 1} calls`);
    }
    return { plan, source: "computed" };
  }

  /** Plans share one measurement tab, so computations run one at a time. */
  computePlan(query: string, target: string, screenWidth: number, screenHeight: number): Promise<ScrollPlan> {
    const run = this.measuring.then(() => this.measurePlan(query, target, screenWidth, screenHeight));
    this.measuring = run.catch(() => undefined);
    return run;
  }

  private async measurePlan(
    query: string,
    target: string,
    screenWidth: number,
    screenHeight: number,
  ): Promise<ScrollPlan> {
    const { prediction, search, gesture } = this.config;
    const gestureDistance = gesture.nominalDistance;

    const geometry = buildViewportGeometry(screenWidth, screenHeight, this.config.viewport);
    if (isGeometryError(geometry)) {
      log.error(`Plan not calculated: ${geometry.message}`);
      return emptyPlan(undefined, gestureDistance);
    }

    const plan = emptyPlan(geometry, gestureDistance);
    const viewportHeight = geometry.effectiveViewportHeight;

    try {
      await this.session.emulate(geometry);

      // Aggregate results: how far to the "expand results" affordance.
      await this.goto(fillUrl(search.searchUrl, query));
      const more = this.measured(await this.resolver.findText(this.session, search.expandLabel, { exact: true }));
      if (more) {
        const b = explainMarginPaddedCount(
          more.absoluteY,
          prediction.moreTargetFraction,
          viewportHeight,
          gestureDistance,
          prediction,
        );
        log.debug(`more: ${formatBreakdown(b)}`);
        plan.moreElementY = more.absoluteY;
        plan.moreScrollCount = b.count;
      } else {
        log.warn(`"${search.expandLabel}" not found, using default ${prediction.defaultMoreScrollCount} gestures`);
        plan.moreScrollCount = prediction.defaultMoreScrollCount;
      }

      // Expanded results: first page whose target link is measurable.
      for (let page = 1; page <= prediction.maxPages; page++) {
        const start = 1 + (page - 1) * search.resultsPageSize;
        await this.goto(fillUrl(search.resultsUrl, query, start));

        const hit = this.measured(await this.resolver.findDomainLink(this.session, target));
        if (!hit) continue;

        const b = explainMarginFreeCount(hit.absoluteY, prediction.domainTargetFraction, viewportHeight, gestureDistance);
        log.debug(`domain: ${formatBreakdown(b)}`);
        plan.domainElementY = hit.absoluteY;
        plan.domainPage = page;
        plan.domainScrollCount = b.count;
        log.info(`${target} on page ${page} at y=${hit.absoluteY.toFixed(0)}, ${b.count} gestures`);
        break;
      }

      if (plan.domainPage === null) {
        log.info(`${target} not found within ${prediction.maxPages} pages`);
      }
      plan.calculated = true;
    } catch (e) {
      const detail = toErrorDetail(e, e instanceof NavigationFailure ? "NAVIGATION_FAILED" : "CDP_DISCONNECTED");
      log.error(`Plan not calculated (${detail.code})`, detail.message);
      return { ...plan, calculated: false };
    }

    return plan;
  }

  private async goto(url: string): Promise<void> {
    try {
      await this.session.navigate(url);
    } catch (e) {
      throw new NavigationFailure(errorMessage(e), { cause: e });
    }
  }

  /** Channel failures degrade to not-found for the step. */
  private measured(outcome: Outcome<ElementMeasurement>): ElementMeasurement | null {
    switch (outcome.status) {
      case "ok":
        return outcome.value;
      case "not-found":
        return null;
      case "failed":
        log.warn(`Measurement failed (${outcome.error.code}), treating as not found`);
        return null;
    }
  }
}
