import { Command, InvalidArgumentError, Option } from "commander";
import { ApiError, createApiClient, type ApiClient } from "./client.js";
import { formatBatch, formatSearch, formatStatus, formatSync } from "./format.js";

export const DEFAULT_API_URL = "http://localhost:8080";

export interface ProgramIO {
  out(line: string): void;
  err(line: string): void;
  setExitCode(code: number): void;
  env: NodeJS.ProcessEnv;
  fetch?: typeof fetch;
}

interface GlobalOptions {
  apiUrl: string;
  token?: string;
}

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError("Not an integer.");
  }
  return parsed;
}

export function describeFailure(err: unknown): string {
  if (err instanceof ApiError) {
    return `Error (${err.status} ${err.errorCode}): ${err.message}`;
  }
  if (err instanceof Error) return `Error: ${err.message}`;
  return `Error: ${String(err)}`;
}

export function createProgram(io: ProgramIO): Command {
  const program = new Command();

  program
    .name("docindex")
    .description("Search and manage the document index")
    .version("0.1.0")
    .option("--api-url <url>", "API base URL", io.env.DOCINDEX_API_URL ?? DEFAULT_API_URL)
    .option("--token <token>", "admin bearer token", io.env.DOCINDEX_ADMIN_TOKEN);

  function client(): ApiClient {
    const opts = program.opts<GlobalOptions>();
    return createApiClient({ baseUrl: opts.apiUrl, token: opts.token, fetch: io.fetch });
  }

  // Resolves false when the command should exit non-zero
  async function run(action: (api: ApiClient) => Promise<boolean | void>): Promise<void> {
    try {
      if ((await action(client())) === false) io.setExitCode(1);
    } catch (err) {
      io.err(describeFailure(err));
      io.setExitCode(1);
    }
  }

  const print = (lines: string[]) => lines.forEach((line) => io.out(line));

  program
    .command("health")
    .description("check that the API is up")
    .action(() =>
      run(async (api) => {
        const health = await api.health();
        io.out(`API is ${health.status} (version ${health.version}, uptime ${health.uptime}s)`);
      }),
    );

  program
    .command("status")
    .description("show store and index statistics")
    .action(() =>
      run(async (api) => {
        print(formatStatus(await api.status()));
      }),
    );

  program
    .command("search <query>")
    .description("search indexed documents")
    .option("-s, --size <n>", "number of results (1-100)", parseInteger, 10)
    .option("-f, --from <n>", "offset of the first result", parseInteger, 0)
    .addOption(
      new Option("--format <format>", "output format").choices(["text", "json"]).default("text"),
    )
    .action((query: string, opts: { size: number; from: number; format: string }) =>
      run(async (api) => {
        if (!query.trim()) {
          io.err("Error: Search query cannot be empty");
          return false;
        }
        const response = await api.search(query, { size: opts.size, from: opts.from });
        if (opts.format === "json") {
          io.out(JSON.stringify(response, null, 2));
        } else {
          print(formatSearch(response));
        }
      }),
    );

  program
    .command("process")
    .description("index every document in the store")
    .option("-c, --concurrency <n>", "documents processed in parallel (1-20)", parseInteger)
    .action((opts: { concurrency?: number }) =>
      run(async (api) => {
        const { concurrency } = opts;
        if (concurrency !== undefined && (concurrency < 1 || concurrency > 20)) {
          io.err("Error: Concurrency must be between 1 and 20");
          return false;
        }
        io.out("Starting document processing...");
        const response = await api.processAll(concurrency);
        print(formatBatch(response.results));
      }),
    );

  program
    .command("sync")
    .description("reconcile the index with the store")
    .action(() =>
      run(async (api) => {
        io.out("Starting synchronization...");
        const response = await api.sync();
        print(formatSync(response.results));
      }),
    );

  program
    .command("process-one <key>")
    .description("index a single document")
    .action((key: string) =>
      run(async (api) => {
        const response = await api.processOne(key);
        if (response.success) {
          io.out(`Successfully processed: ${key}`);
          io.out(`Details: ${response.details}`);
          return true;
        }
        io.err(`Failed to process: ${key}`);
        io.err(`Error: ${response.details}`);
        return false;
      }),
    );

  program
    .command("delete <key>")
    .description("remove a document from the index (the store is untouched)")
    .action((key: string) =>
      run(async (api) => {
        await api.deleteDocument(key);
        io.out(`Deleted from search index: ${key}`);
      }),
    );

  return program;
}
