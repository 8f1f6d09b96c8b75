#!/usr/bin/env node
/**
 * MCP server exposing the SysEx codec over stdio.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfig } from "./config.js";
import { listDevices } from "./devices/index.js";
import { LogLevel, setLogLevel, shouldLog } from "./logger.js";
import {
  checkDetectResponseSchema,
  convertDumpSchema,
  createRequestSchema,
  inspectDumpSchema,
  renamePatchSchema,
} from "./schemas/sysex.js";
import { executeConvertDump } from "./tools/convert.js";
import { executeCheckDetectResponse } from "./tools/detect.js";
import { executeListDevices } from "./tools/devices.js";
import { executeInspectDump } from "./tools/inspect.js";
import { executeRenamePatch } from "./tools/rename.js";
import { executeCreateRequest } from "./tools/request.js";
import { toolResult } from "./tools/result.js";

declare const PACKAGE_VERSION: string;

function createServer(): McpServer {
  const server = new McpServer({ name: "synth-sysex", version: PACKAGE_VERSION });

  server.tool(
    "list_devices",
    "List the supported synthesizers with their capabilities, banks and timing hints.",
    async () => toolResult("list_devices", () => executeListDevices(listDevices())),
  );

  server.tool(
    "inspect_dump",
    "Decode a patch dump: message kind, patch name, stored location and duplicate-detection fingerprint.",
    inspectDumpSchema,
    async (args) => toolResult("inspect_dump", () => executeInspectDump(args)),
  );

  server.tool(
    "rename_patch",
    "Write a new name into a patch dump and return the re-encoded message.",
    renamePatchSchema,
    async (args) => toolResult("rename_patch", () => executeRenamePatch(args)),
  );

  server.tool(
    "convert_dump",
    "Convert a patch dump into an edit buffer dump or a program dump for a given location.",
    convertDumpSchema,
    async (args) => toolResult("convert_dump", () => executeConvertDump(args)),
  );

  server.tool(
    "create_request",
    "Build a request message: device detection, edit buffer, program or bank select.",
    createRequestSchema,
    async (args) => toolResult("create_request", () => executeCreateRequest(args)),
  );

  server.tool(
    "check_detect_response",
    "Check whether a received message answers device detection, and on which MIDI channel.",
    checkDetectResponseSchema,
    async (args) => toolResult("check_detect_response", () => executeCheckDetectResponse(args)),
  );

  return server;
}

async function main(): Promise<void> {
  setLogLevel(loadConfig().logLevel);
  const server = createServer();
  await server.connect(new StdioServerTransport());
  shouldLog(LogLevel.Info) && console.error(`synth-sysex MCP server ${PACKAGE_VERSION} running on stdio`);
}

main().catch((err: unknown) => {
  console.error("Fatal:", err);
  process.exit(1);
});
