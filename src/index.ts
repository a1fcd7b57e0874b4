#!/usr/bin/env node
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { connect, disconnect, isConnected } from "./cdp/client.js";
import { CdpMeasurementSession } from "./cdp/session.js";
import { loadConfig } from "./config.js";
import { AdbGestureChannel } from "./device/adb.js";
import { CompensatedActuator } from "./device/actuator.js";
import { DeviceRegistry } from "./device/registry.js";
import { ActuationError } from "./errors.js";
import { createLogger, setDebug } from "./log.js";
import { ScrollPlanCache } from "./plan/cache.js";
import { ScrollPlanner } from "./plan/planner.js";
import { registerScrollTools } from "./tools/scroll.js";

const log = createLogger("main");

interface CliArgs {
  cdpUrl?: string;
  configPath?: string;
  cacheFile?: string;
}

function parseArgs(): CliArgs {
  const args = process.argv.slice(2);
  const parsed: CliArgs = {};
  for (let i = 0; i < args.length; i++) {
    const value = args[i + 1];
    if (!value) break;
    if (args[i] === "--cdp-url") parsed.cdpUrl = value;
    else if (args[i] === "--config") parsed.configPath = value;
    else if (args[i] === "--cache-file") parsed.cacheFile = value;
    else continue;
    i++;
  }
  return parsed;
}

async function main(): Promise<void> {
  const args = parseArgs();
  const config = await loadConfig(args.configPath);
  setDebug(config.debug);

  const cache = await ScrollPlanCache.open(args.cacheFile ?? config.cache.file, {
    refreshInterval: config.cache.refreshInterval,
  });

  // Chrome is only started once a plan has to be measured.
  let planner: ScrollPlanner | null = null;
  const getPlanner = async (): Promise<ScrollPlanner> => {
    if (planner && isConnected()) return planner;
    log.info(`Connecting to Chrome${args.cdpUrl ? ` at ${args.cdpUrl}` : " (launching)"}...`);
    const cdp = await connect({ cdpUrl: args.cdpUrl, port: config.cdp.port, headless: config.cdp.headless });
    planner = new ScrollPlanner(new CdpMeasurementSession(cdp, config.cdp), cache, config);
    return planner;
  };

  const devices = new DeviceRegistry(async (serial, screen) => {
    const channel = new AdbGestureChannel({
      serial,
      adbPath: config.adb.path,
      timeoutMs: config.adb.commandTimeoutMs,
    });
    const size = screen ?? (await channel.detectScreenSize());
    if (!size) throw new ActuationError(`Cannot determine screen size of ${serial}`);
    return { actuator: new CompensatedActuator(channel, size, config.gesture), screen: size };
  });

  const server = new McpServer({
    name: "scroll-pilot",
    version: "0.1.0",
  });

  registerScrollTools(server, { planner: getPlanner, device: (serial, screen) => devices.get(serial, screen) });

  const transport = new StdioServerTransport();
  await server.connect(transport);
  log.info("MCP server ready on stdio");

  const shutdown = async () => {
    log.info("Shutting down...");
    await server.close();
    await disconnect();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err: unknown) => {
      log.error("Shutdown failed", err);
      process.exit(1);
    });
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}

main().catch((err: unknown) => {
  log.error("Fatal", err);
  process.exit(1);
});
