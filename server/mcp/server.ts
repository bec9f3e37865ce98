/**
 * MCP tool surface
 *
 * Composes the OCC codec, the strike ladder and the Massive client into
 * read-only tools. Codec and upstream failures come back as tool results
 * with `isError: true`; they never tear down the session.
 *
 * @module server/mcp/server
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { jsonToCsv } from "../lib/csv.js";
import { describeError } from "../lib/errors.js";
import type { JsonValue } from "../lib/json.js";
import { createLogger } from "../lib/logger.js";
import { buildOccOptionList, parseOccTicker } from "../lib/occ.js";
import { DEFAULT_STRIKE_STEP, generateStrikeLadder } from "../lib/strikeLadder.js";
import type { MassiveClient, MassiveQuery } from "../massive/client.js";

const log = createLogger("MCP");

export const SERVER_NAME = "massive-options";
export const SERVER_VERSION = "0.1.0";

export interface McpServerDeps {
  massive: MassiveClient;
  strictCalendar?: boolean;
}

const TOOL_ANNOTATIONS = {
  readOnlyHint: true,
  destructiveHint: false,
} as const;

// ---------------------------------------------------------------------------
// Shared schemas
// ---------------------------------------------------------------------------

const Underlying = z.string().min(1).describe("Underlying ticker symbol, e.g. 'RZLV'");
const ExpirationDate = z.string().describe("Expiration date, YYYY-MM-DD");
const ContractTypeParam = z
  .string()
  .describe("'call' or 'put' (anything starting with 'c' is a call)");
const OutputFormat = z
  .enum(["csv", "json"])
  .default("csv")
  .describe("Response format; csv flattens nested fields");

const ladderShape = {
  underlying: Underlying,
  expiration_date: ExpirationDate,
  contract_type: ContractTypeParam,
  strike: z.number().optional().describe("Exact strike; overrides the range"),
  strike_gte: z.number().optional().describe("Lowest strike of the ladder (default 0.5)"),
  strike_lte: z.number().optional().describe("Highest strike of the ladder (default 10)"),
  step: z
    .number()
    .optional()
    .describe(`Spacing between strikes (default ${DEFAULT_STRIKE_STEP})`),
};

const chainFilterShape = {
  underlying: Underlying,
  expiration_date: ExpirationDate.optional(),
  contract_type: z.enum(["call", "put"]).optional(),
  strike_gte: z.number().optional(),
  strike_lte: z.number().optional(),
  limit: z.number().int().min(1).max(250).optional(),
  format: OutputFormat,
};

// ---------------------------------------------------------------------------
// Result helpers
// ---------------------------------------------------------------------------

function textResult(text: string): CallToolResult {
  return { content: [{ type: "text", text }] };
}

function dataResult(data: JsonValue, format: "csv" | "json"): CallToolResult {
  return textResult(format === "csv" ? jsonToCsv(data) : JSON.stringify(data, null, 2));
}

function errorResult(tool: string, error: unknown): CallToolResult {
  const message = describeError(error);
  log.warn(`${tool} failed`, { error: message });
  return { content: [{ type: "text", text: message }], isError: true };
}

async function runTool(tool: string, handler: () => Promise<CallToolResult> | CallToolResult) {
  try {
    return await handler();
  } catch (error) {
    return errorResult(tool, error);
  }
}

function buildTickers(
  args: {
    underlying: string;
    expiration_date: string;
    contract_type: string;
    strike?: number;
    strike_gte?: number;
    strike_lte?: number;
    step?: number;
  },
  strictCalendar: boolean
): string[] {
  const strikes = generateStrikeLadder({
    strike: args.strike,
    strikeGte: args.strike_gte,
    strikeLte: args.strike_lte,
    step: args.step,
  });
  return buildOccOptionList(args.underlying, args.expiration_date, args.contract_type, strikes, {
    strictCalendar,
  });
}

function chainFilters(args: {
  expiration_date?: string;
  contract_type?: "call" | "put";
  strike_gte?: number;
  strike_lte?: number;
  limit?: number;
}): MassiveQuery {
  return {
    expiration_date: args.expiration_date,
    contract_type: args.contract_type,
    "strike_price.gte": args.strike_gte,
    "strike_price.lte": args.strike_lte,
    limit: args.limit,
  };
}

/**
 * Build an MCP server exposing the options tools. One instance per
 * connected transport; instances share the Massive client.
 */
export function createMcpServer({ massive, strictCalendar = false }: McpServerDeps): McpServer {
  const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });

  server.registerTool(
    "build_option_tickers",
    {
      description:
        "Build OCC option tickers (O:ROOTyymmddC00000000) for an exact strike or a strike ladder. No API call.",
      inputSchema: ladderShape,
      annotations: TOOL_ANNOTATIONS,
    },
    async (args) =>
      runTool("build_option_tickers", () =>
        textResult(JSON.stringify(buildTickers(args, strictCalendar)))
      )
  );

  server.registerTool(
    "parse_option_ticker",
    {
      description: "Decode an OCC option ticker into underlying, expiration, contract type and strike.",
      inputSchema: { ticker: z.string().describe("OCC ticker, e.g. 'O:RZLV251107C00005500'") },
      annotations: TOOL_ANNOTATIONS,
    },
    async ({ ticker }) =>
      runTool("parse_option_ticker", () => {
        const { underlying, expiration, contractType, strike } = parseOccTicker(ticker);
        return textResult(
          JSON.stringify({ ticker, underlying, expiration, contract_type: contractType, strike })
        );
      })
  );

  server.registerTool(
    "get_option_snapshots",
    {
      description:
        "Snapshot option contracts for one expiration across a strike ladder (or a single strike).",
      inputSchema: { ...ladderShape, format: OutputFormat },
      annotations: { ...TOOL_ANNOTATIONS, openWorldHint: true },
    },
    async (args) =>
      runTool("get_option_snapshots", async () => {
        const tickers = buildTickers(args, strictCalendar);
        log.info("Fetching option snapshots", { underlying: args.underlying, tickers: tickers.length });
        const page = await massive.getOptionSnapshots(tickers);
        return dataResult(page, args.format);
      })
  );

  server.registerTool(
    "get_option_chain",
    {
      description: "Snapshot the option chain of an underlying, optionally filtered.",
      inputSchema: chainFilterShape,
      annotations: { ...TOOL_ANNOTATIONS, openWorldHint: true },
    },
    async (args) =>
      runTool("get_option_chain", async () => {
        const page = await massive.getOptionChain(args.underlying, chainFilters(args));
        return dataResult(page, args.format);
      })
  );

  server.registerTool(
    "list_option_contracts",
    {
      description: "List reference option contracts for an underlying.",
      inputSchema: {
        ...chainFilterShape,
        expired: z.boolean().optional().describe("Include expired contracts"),
      },
      annotations: { ...TOOL_ANNOTATIONS, openWorldHint: true },
    },
    async (args) =>
      runTool("list_option_contracts", async () => {
        const page = await massive.listOptionContracts({
          underlying_ticker: args.underlying.toUpperCase(),
          ...chainFilters(args),
          expired: args.expired,
        });
        return dataResult(page, args.format);
      })
  );

  return server;
}
