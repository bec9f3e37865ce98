import http from "http";
import { config as loadEnvFile } from "dotenv";
import { Command, CommanderError, Option } from "commander";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  ensureApiKey,
  loadConfig,
  TRANSPORTS,
  type AppConfig,
  type ConfigOverrides,
  type TransportKind,
} from "./config.js";
import { createHttpApp } from "./http/app.js";
import { ConfigError } from "./lib/errors.js";
import { createLogger, setLogLevel, type LogLevel } from "./lib/logger.js";
import { MassiveClient } from "./massive/client.js";
import { createMcpServer, SERVER_VERSION } from "./mcp/server.js";

const log = createLogger("Server");

interface CliOptions {
  transport?: TransportKind;
  host?: string;
  port?: number;
  logLevel?: LogLevel;
}

function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigError(`--port must be an integer between 0 and 65535 (got ${value})`);
  }
  return port;
}

function buildProgram(): Command {
  return new Command()
    .name("massive-options-mcp")
    .description("MCP server for Massive option data")
    .version(SERVER_VERSION)
    .addOption(new Option("--transport <kind>", "MCP transport").choices(TRANSPORTS))
    .option("--host <host>", "bind address for HTTP transports")
    .option("--port <port>", "port for HTTP transports", parsePort)
    .addOption(
      new Option("--log-level <level>", "minimum log level").choices(["debug", "info", "warn", "error"])
    )
    .exitOverride()
    .configureOutput({ writeErr: () => undefined });
}

/**
 * Parse CLI flags into config overrides. Usage errors surface as
 * ConfigError; --help and --version surface as a CommanderError with exit
 * code 0.
 */
export function parseCliArgs(argv: string[]): ConfigOverrides {
  const program = buildProgram();
  try {
    program.parse(argv, { from: "user" });
  } catch (error) {
    if (error instanceof CommanderError && error.exitCode !== 0) {
      throw new ConfigError(error.message.replace(/^error: /, ""));
    }
    throw error;
  }

  const { transport, host, port, logLevel } = program.opts<CliOptions>();
  const overrides: ConfigOverrides = {};
  if (transport !== undefined) overrides.transport = transport;
  if (host !== undefined) overrides.host = host;
  if (port !== undefined) overrides.port = port;
  if (logLevel !== undefined) overrides.logLevel = logLevel;
  return overrides;
}

function onShutdown(close: () => Promise<void>) {
  const shutdown = (signal: string) => {
    log.info(`Received ${signal}, shutting down`);
    close()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        log.error("Shutdown failed", { error: error instanceof Error ? error.message : String(error) });
        process.exit(1);
      });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

async function startStdio(appConfig: AppConfig, massive: MassiveClient) {
  if (!appConfig.apiKey) {
    log.warn("MASSIVE_API_KEY is not set; API-backed tools will return an error");
  }
  const server = createMcpServer({ massive, strictCalendar: appConfig.strictCalendar });
  const transport = new StdioServerTransport();
  onShutdown(() => server.close());
  await server.connect(transport);
  log.info("MCP server running on stdio");
}

async function startHttp(appConfig: AppConfig, massive: MassiveClient) {
  ensureApiKey(appConfig);
  const transport = appConfig.transport === "sse" ? "sse" : "streamable-http";

  const { app, closeAll } = createHttpApp({
    config: appConfig,
    transport,
    createServer: () => createMcpServer({ massive, strictCalendar: appConfig.strictCalendar }),
  });
  const httpServer = http.createServer(app);

  onShutdown(async () => {
    await closeAll();
    await new Promise<void>((resolve, reject) =>
      httpServer.close((err) => (err ? reject(err) : resolve()))
    );
  });

  await new Promise<void>((resolve, reject) => {
    httpServer.once("error", reject);
    httpServer.listen(appConfig.port, appConfig.host, () => resolve());
  });
  const path = transport === "sse" ? "/sse" : "/mcp";
  log.info(`MCP server (${transport}) listening on http://${appConfig.host}:${appConfig.port}${path}`);
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<void> {
  // .env.local first, then .env; values already in the environment win
  loadEnvFile({ path: ".env.local" });
  loadEnvFile();

  const appConfig = loadConfig(process.env, parseCliArgs(argv));
  setLogLevel(appConfig.logLevel);

  const massive = new MassiveClient({ apiKey: appConfig.apiKey, baseUrl: appConfig.baseUrl });

  if (appConfig.transport === "stdio") {
    await startStdio(appConfig, massive);
  } else {
    await startHttp(appConfig, massive);
  }
}

export function run(argv: string[] = process.argv.slice(2)): void {
  main(argv).catch((error: unknown) => {
    if (error instanceof CommanderError && error.exitCode === 0) {
      process.exit(0);
    }
    log.error("Failed to start", { error: error instanceof Error ? error.message : String(error) });
    process.exit(1);
  });
}
