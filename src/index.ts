#!/usr/bin/env node

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { dirname, join } from "path";
import { z } from "zod";
import { loadConfig } from "./config/index.js";
import { Logger } from "./logger.js";
import { createConfigLogger, openNoteStore } from "./notes/factory.js";
import { NoteStore } from "./notes/store.js";
import { TOOLS } from "./tools/definitions.js";
import { handleToolCall } from "./tools/handlers.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packageJson = z
  .object({ version: z.string() })
  .parse(JSON.parse(readFileSync(join(__dirname, "..", "package.json"), "utf-8")));

class NotesServer {
  private server: Server;
  private store: NoteStore;
  private logger: Logger;

  private constructor(store: NoteStore, logger: Logger) {
    this.store = store;
    this.logger = logger;

    this.server = new Server(
      {
        name: "filenotes",
        version: packageJson.version,
      },
      {
        capabilities: {
          tools: {},
        },
      }
    );

    this.setupHandlers();
  }

  static create(): NotesServer {
    const config = loadConfig();
    const logger = createConfigLogger(config);
    // stdin carries the protocol, so consent can only come from the config file
    const store = openNoteStore(config, { interactive: false, logger });
    return new NotesServer(store, logger);
  }

  private setupHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => ({
      tools: TOOLS,
    }));

    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const { name, arguments: args } = request.params;
      this.logger.debug(`Tool call: ${name}`);
      const result = await handleToolCall({ store: this.store }, name, args ?? {});
      if (result.isError) {
        this.logger.warn(`${name} failed: ${result.content[0]?.text ?? ""}`);
      }
      return result;
    });
  }

  async run(): Promise<void> {
    const transport = new StdioServerTransport();
    await this.server.connect(transport);
    this.logger.info("filenotes MCP server running on stdio");
  }
}

Promise.resolve()
  .then(() => NotesServer.create().run())
  .catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  });
