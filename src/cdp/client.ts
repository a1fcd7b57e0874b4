import CDP from "chrome-remote-interface";
import * as chromeLauncher from "chrome-launcher";
import { ChannelError, errorMessage } from "../errors.js";
import { createLogger } from "../log.js";

const log = createLogger("cdp");

export type CDPClient = CDP.Client;

export interface ConnectOptions {
  /** ws://host:port/... of an already running Chrome; launches one when omitted. */
  cdpUrl?: string;
  port?: number;
  headless?: boolean;
}

let chrome: chromeLauncher.LaunchedChrome | null = null;
let client: CDPClient | null = null;
let crashed = false;
let connecting: Promise<CDPClient> | null = null;

export function isCrashed(): boolean {
  return crashed;
}

export function isConnected(): boolean {
  return client !== null && !crashed;
}

/** Connects once; concurrent callers share the attempt. */
export function connect(options: ConnectOptions = {}): Promise<CDPClient> {
  if (client && !crashed) return Promise.resolve(client);
  if (!connecting) {
    connecting = connectWithRetry(options).finally(() => {
      connecting = null;
    });
  }
  return connecting;
}

async function connectWithRetry(options: ConnectOptions): Promise<CDPClient> {
  if (crashed) await disconnect();
  try {
    return await open(options);
  } catch (e) {
    log.warn(`Connect failed, retrying once: ${errorMessage(e)}`);
    await disconnect();
  }
  try {
    return await open(options);
  } catch (e) {
    await disconnect();
    throw new ChannelError("CDP_DISCONNECTED", `Cannot connect to Chrome: ${errorMessage(e)}`, { cause: e });
  }
}

async function open(options: ConnectOptions): Promise<CDPClient> {
  let host = "127.0.0.1";
  let port: number;

  if (options.cdpUrl) {
    const url = new URL(options.cdpUrl);
    host = url.hostname;
    port = parseInt(url.port, 10);
  } else {
    const chromeFlags = ["--no-first-run", "--no-default-browser-check", "--window-size=720,1440"];
    if (options.headless !== false) chromeFlags.push("--headless=new");
    log.info(`Launching Chrome (headless=${options.headless !== false})`);
    chrome = await chromeLauncher.launch({ port: options.port, chromeFlags });
    port = chrome.port;
  }

  const raw = await CDP({ host, port });
  client = raw;

  await Promise.all([raw.Page.enable(), raw.Runtime.enable(), raw.Network.enable(), raw.Inspector.enable()]);

  raw.on("Inspector.targetCrashed", () => {
    crashed = true;
    log.error("Measurement tab crashed");
  });
  raw.on("disconnect", () => {
    if (client === raw) client = null;
  });

  return raw;
}

export async function disconnect(): Promise<void> {
  if (client) {
    try {
      await client.close();
    } catch (e) {
      log.warn(`Close failed: ${errorMessage(e)}`);
    }
    client = null;
  }
  if (chrome) {
    chrome.kill();
    chrome = null;
  }
  crashed = false;
}
