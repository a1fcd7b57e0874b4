import { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ScreenSize } from "../device/actuator.js";
import type { DeviceHandle } from "../device/registry.js";
import { toErrorDetail } from "../errors.js";
import { gestureCountFor, type ScrollPlanner } from "../plan/planner.js";
import type { ErrorDetail, PlanLookup, SequenceResult } from "../types.js";

export interface ScrollToolContext {
  planner: () => Promise<ScrollPlanner>;
  /** One handle, and so one actuator, per device serial. */
  device: (serial: string, screen?: ScreenSize) => Promise<DeviceHandle>;
}

type ToolText = { content: [{ type: "text"; text: string }] };

function text(payload: unknown): ToolText {
  return { content: [{ type: "text", text: JSON.stringify(payload) }] };
}

export interface ScrollDeviceResult {
  ok: boolean;
  phase: "more" | "domain";
  source?: PlanLookup["source"];
  sequence?: SequenceResult;
  notFound?: string;
  errors: ErrorDetail[];
}

export function registerScrollTools(server: McpServer, ctx: ScrollToolContext): void {
  server.tool(
    "scroll_plan_compute",
    "Predict gesture counts for a query/target pair by measuring the page on the CDP session. Uses the plan cache unless forceRefresh.",
    {
      query: z.string().min(1).describe("Search query"),
      target: z.string().min(1).describe('Target domain, e.g. "example.com" or "example.com/lessons"'),
      screenWidth: z.number().int().positive().describe("Device screen width in px"),
      screenHeight: z.number().int().positive().describe("Device screen height in px"),
      forceRefresh: z.boolean().optional().describe("Recompute even if a cached plan is fresh"),
    },
    async ({ query, target, screenWidth, screenHeight, forceRefresh }) => {
      try {
        const planner = await ctx.planner();
        const lookup = await planner.getPlan(query, target, { width: screenWidth, height: screenHeight }, { forceRefresh });
        return text({ ok: lookup.plan.calculated, ...lookup, errors: [] });
      } catch (e) {
        return text({ ok: false, errors: [toErrorDetail(e, "CDP_DISCONNECTED")] });
      }
    },
  );

  server.tool(
    "scroll_device",
    "Run the planned number of compensated scroll gestures on a device for one phase (more = expand-results affordance, domain = target link).",
    {
      serial: z.string().min(1).describe("adb device serial or host:port"),
      query: z.string().min(1).describe("Search query"),
      target: z.string().min(1).describe("Target domain"),
      phase: z.enum(["more", "domain"]).describe("Which planned count to execute"),
      screenWidth: z
        .number()
        .int()
        .positive()
        .optional()
        .describe("Screen width; give with screenHeight, or omit both to detect via adb"),
      screenHeight: z
        .number()
        .int()
        .positive()
        .optional()
        .describe("Screen height; give with screenWidth, or omit both to detect via adb"),
    },
    async ({ serial, query, target, phase, screenWidth, screenHeight }) => {
      const result: ScrollDeviceResult = { ok: false, phase, errors: [] };
      if ((screenWidth === undefined) !== (screenHeight === undefined)) {
        result.errors.push({
          code: "GEOMETRY_INVALID",
          message: "screenWidth and screenHeight must be given together",
        });
        return text(result);
      }
      try {
        const screen =
          screenWidth !== undefined && screenHeight !== undefined ? { width: screenWidth, height: screenHeight } : undefined;
        const device = await ctx.device(serial, screen);
        const planner = await ctx.planner();
        const lookup = await planner.getPlan(query, target, device.screen);
        result.source = lookup.source;

        const count = gestureCountFor(lookup.plan, phase);
        if (count.status === "failed") {
          result.errors.push(count.error);
        } else if (count.status === "not-found") {
          result.notFound = count.reason;
        } else {
          result.sequence = await device.actuator.runSequence(count.value, "compensated");
          result.ok = true;
        }
      } catch (e) {
        result.errors.push(toErrorDetail(e, "ADB_FAILED"));
      }
      return text(result);
    },
  );
}
