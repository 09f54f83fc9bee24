/**
 * Stdio startup for the termdesk servers: one McpServer per package,
 * stopped once on SIGTERM or SIGINT.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { errorMessage } from "./result.js";

export interface ServerConfig {
  name: string;
  version: string;
}

export interface ServerBootstrapOptions<S> {
  config: ServerConfig;
  createServices: () => S | Promise<S>;
  registerTools: (server: McpServer, services: S) => void;
  /** Runs before the transport connects */
  onStartup?: (services: S) => Promise<void> | void;
  /** Runs on a shutdown signal, before the server closes */
  onShutdown?: (services: S) => Promise<void> | void;
}

export const SHUTDOWN_SIGNALS: readonly NodeJS.Signals[] = ["SIGTERM", "SIGINT"];

export function startupMessage(
  config: ServerConfig,
  platform: NodeJS.Platform = process.platform,
  pid: number = process.pid
): string {
  return `[${config.name}] Listening on stdio (v${config.version}, ${platform}, pid ${pid})`;
}

export interface ShutdownHooks {
  name: string;
  stop: () => Promise<void>;
  exit?: (code: number) => void;
}

/**
 * Signal handler that stops the server once, then exits 0 (1 when stopping
 * throws). Signals arriving while it stops are logged and ignored.
 */
export function shutdownHandler({
  name,
  stop,
  exit = (code) => process.exit(code),
}: ShutdownHooks): (signal: NodeJS.Signals) => Promise<void> {
  let stopping = false;

  return async (signal) => {
    if (stopping) {
      console.error(`[${name}] ${signal} while stopping, ignored`);
      return;
    }
    stopping = true;
    console.error(`[${name}] ${signal} received, stopping`);

    try {
      await stop();
      exit(0);
    } catch (error) {
      console.error(`[${name}] Shutdown failed: ${errorMessage(error)}`);
      exit(1);
    }
  };
}

/**
 * @example
 * ```typescript
 * await bootstrapServer({
 *   config: { name: "termdesk:cron", version: "0.1.0" },
 *   createServices: () => ({ cron: new CronService(new CrontabCli(runner)) }),
 *   registerTools: registerAllTools,
 * });
 * ```
 */
export async function bootstrapServer<S>(options: ServerBootstrapOptions<S>): Promise<void> {
  const { config, createServices, registerTools, onStartup, onShutdown } = options;

  const services = await createServices();
  const server = new McpServer({ name: config.name, version: config.version });
  registerTools(server, services);

  const onSignal = shutdownHandler({
    name: config.name,
    stop: async () => {
      await onShutdown?.(services);
      await server.close();
    },
  });
  for (const signal of SHUTDOWN_SIGNALS) {
    process.on(signal, (received) => void onSignal(received));
  }

  await onStartup?.(services);

  await server.connect(new StdioServerTransport());
  console.error(startupMessage(config));
}

/**
 * Entry point for package servers; a startup failure exits 1.
 */
export function runServer<S>(options: ServerBootstrapOptions<S>): void {
  bootstrapServer(options).catch((error: unknown) => {
    console.error(`[${options.config.name}] Failed to start: ${errorMessage(error)}`);
    process.exit(1);
  });
}

export { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
