import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { z } from "zod";
import type { ChordUseCases } from "../../bootstrap/chord-use-cases";
import type { BrowserRow } from "../../domain/services/chord-browser";
import type { ErrorHandler } from "../../infrastructure/error/error-handler";
import { Result } from "../../infrastructure/result/result";

const SERVER_NAME = "chord-dictionary-server";
const SERVER_VERSION = "0.1.0";

const chordSchema = z
  .string()
  .max(200, "Chord expressions must stay short, e.g. 'A+E+T'.");

const wordSchema = z
  .string()
  .trim()
  .min(1, "Provide the word to bind.")
  .refine((word) => !/[\r\n]/u.test(word), "Words must fit on one line.");

const searchSchema = z.string().max(200, "Search text must stay concise.");

const limitSchema = z.number().int().min(1).max(500);

interface ChordServerOptions {
  readonly useCases: ChordUseCases;
  readonly errorHandler: ErrorHandler;
  readonly resultLimit: number;
}

interface ToolResponse {
  [key: string]: unknown;
  isError?: boolean;
  content: { type: "text"; text: string }[];
  structuredContent?: Record<string, unknown>;
}

export function createChordServer({
  useCases,
  errorHandler,
  resultLimit,
}: ChordServerOptions): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  server.registerTool(
    "search_chords",
    {
      title: "Search the chord dictionary",
      description:
        "List dictionary rows (rank, word, chord) whose word contains the search text. Matching is case-sensitive; an empty search lists everything.",
      inputSchema: {
        search: searchSchema.describe("Substring to look for in words"),
        limit: limitSchema
          .optional()
          .describe(`Maximum rows to return (default ${resultLimit})`),
      },
    },
    ({ search, limit }) =>
      respond(
        errorHandler.execute(
          () => useCases.search.execute({ search, limit: limit ?? resultLimit }),
          "search_chords",
          { search },
        ),
        (response) => ({
          lines: [response.guidance, ...response.rows.map(formatRow)],
          structured: { ...response },
        }),
      ),
  );

  server.registerTool(
    "lookup_chord",
    {
      title: "Look up a chord",
      description: "Return the word bound to a chord such as 'A+E+T'. Key order and case do not matter.",
      inputSchema: {
        chord: chordSchema.describe("Chord expression, keys joined with '+'"),
      },
    },
    ({ chord }) =>
      respond(
        errorHandler.execute(() => useCases.lookup.execute({ chord }), "lookup_chord", { chord }),
        (response) => ({
          lines: [
            response.word === undefined
              ? `${response.chord} is not bound.`
              : `${response.chord}: ${response.word}`,
          ],
          structured: { ...response },
        }),
      ),
  );

  server.registerTool(
    "bind_chord",
    {
      title: "Bind a chord to a word",
      description: "Bind a chord to a word and save the dictionary. Reports the previous word when the chord was already bound.",
      inputSchema: {
        chord: chordSchema.describe("Chord expression, keys joined with '+'"),
        word: wordSchema.describe("Word the chord should type"),
      },
    },
    ({ chord, word }) =>
      respond(
        errorHandler.execute(() => useCases.bind.execute({ chord, word }), "bind_chord", { chord, word }),
        (response) => ({ lines: [response.guidance], structured: { ...response } }),
      ),
  );

  server.registerTool(
    "unbind_chord",
    {
      title: "Remove a chord binding",
      description: "Remove a chord from the dictionary and save it. Unbound chords are left alone.",
      inputSchema: {
        chord: chordSchema.describe("Chord expression, keys joined with '+'"),
      },
    },
    ({ chord }) =>
      respond(
        errorHandler.execute(() => useCases.unbind.execute({ chord }), "unbind_chord", { chord }),
        (response) => ({ lines: [response.guidance], structured: { ...response } }),
      ),
  );

  return server;
}

export async function startMcpServer(options: ChordServerOptions): Promise<void> {
  const server = createChordServer(options);
  const transport = new StdioServerTransport();
  await server.connect(transport);
}

export function formatRow(row: BrowserRow): string {
  const rank = row.rank === undefined ? "-" : String(row.rank);
  return `${rank}\t${row.word}\t${row.chord || "(unbound)"}`;
}

function respond<T>(
  result: Result<T>,
  render: (data: T) => { lines: string[]; structured: Record<string, unknown> },
): ToolResponse {
  const rendered = Result.map(result, render);
  if (!rendered.success) {
    return {
      isError: true,
      content: [
        {
          type: "text" as const,
          text: rendered.error.message,
        },
      ],
    };
  }

  return {
    content: [
      {
        type: "text" as const,
        text: rendered.data.lines.filter(Boolean).join("\n"),
      },
    ],
    structuredContent: rendered.data.structured,
  };
}
