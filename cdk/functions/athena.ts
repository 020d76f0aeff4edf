// cdk/functions/athena.ts
import {
  AthenaClient,
  GetQueryExecutionCommand,
  type GetQueryExecutionCommandInput,
  type GetQueryExecutionCommandOutput,
  GetQueryResultsCommand,
  type GetQueryResultsCommandInput,
  type GetQueryResultsCommandOutput,
  StartQueryExecutionCommand,
  type StartQueryExecutionCommandInput,
  type StartQueryExecutionCommandOutput,
  StopQueryExecutionCommand,
  type StopQueryExecutionCommandInput,
  type StopQueryExecutionCommandOutput,
} from "@aws-sdk/client-athena";
import { setTimeout as sleep } from "node:timers/promises";

export type QueryRow = Record<string, string | null>;

export interface QueryRunner {
  run(sql: string): Promise<QueryRow[]>;
}

/** The Athena calls the runner needs. */
export interface AthenaApi {
  startQueryExecution(input: StartQueryExecutionCommandInput): Promise<StartQueryExecutionCommandOutput>;
  getQueryExecution(input: GetQueryExecutionCommandInput): Promise<GetQueryExecutionCommandOutput>;
  getQueryResults(input: GetQueryResultsCommandInput): Promise<GetQueryResultsCommandOutput>;
  stopQueryExecution(input: StopQueryExecutionCommandInput): Promise<StopQueryExecutionCommandOutput>;
}

export function athenaApi(client: AthenaClient = new AthenaClient({})): AthenaApi {
  return {
    startQueryExecution: (input) => client.send(new StartQueryExecutionCommand(input)),
    getQueryExecution: (input) => client.send(new GetQueryExecutionCommand(input)),
    getQueryResults: (input) => client.send(new GetQueryResultsCommand(input)),
    stopQueryExecution: (input) => client.send(new StopQueryExecutionCommand(input)),
  };
}

export class QueryExecutionError extends Error {
  constructor(
    message: string,
    readonly queryExecutionId?: string
  ) {
    super(message);
    this.name = "QueryExecutionError";
  }
}

export interface AthenaRunnerOptions {
  workGroup: string;
  database: string;
  pollIntervalMs: number;
  timeoutMs: number;
}

export class AthenaQueryRunner implements QueryRunner {
  constructor(
    private readonly api: AthenaApi,
    private readonly opts: AthenaRunnerOptions
  ) {}

  async run(sql: string): Promise<QueryRow[]> {
    const started = await this.api.startQueryExecution({
      QueryString: sql,
      WorkGroup: this.opts.workGroup,
      QueryExecutionContext: { Database: this.opts.database },
    });
    const id = started.QueryExecutionId;
    if (!id) throw new QueryExecutionError("Athena returned no QueryExecutionId");

    await this.waitFor(id);
    return this.fetchRows(id);
  }

  private async waitFor(id: string): Promise<void> {
    const deadline = Date.now() + this.opts.timeoutMs;
    for (;;) {
      const out = await this.api.getQueryExecution({ QueryExecutionId: id });
      const state = out.QueryExecution?.Status?.State;
      switch (state) {
        case "SUCCEEDED":
          return;
        case "FAILED":
        case "CANCELLED": {
          const reason = out.QueryExecution?.Status?.StateChangeReason ?? "no reason given";
          throw new QueryExecutionError(`query ${id} ${state}: ${reason}`, id);
        }
      }
      if (Date.now() >= deadline) {
        await this.api.stopQueryExecution({ QueryExecutionId: id });
        throw new QueryExecutionError(`query ${id} did not finish within ${this.opts.timeoutMs}ms`, id);
      }
      await sleep(this.opts.pollIntervalMs);
    }
  }

  private async fetchRows(id: string): Promise<QueryRow[]> {
    const rows: QueryRow[] = [];
    let columns: string[] | undefined;
    let nextToken: string | undefined;
    let first = true;
    do {
      const page = await this.api.getQueryResults({ QueryExecutionId: id, NextToken: nextToken });
      columns ??= (page.ResultSet?.ResultSetMetadata?.ColumnInfo ?? []).map((c) =>
        (c.Name ?? "").toLowerCase()
      );
      const data = page.ResultSet?.Rows ?? [];
      // first row of the first page is the header
      for (const row of first ? data.slice(1) : data) {
        const out: QueryRow = {};
        (row.Data ?? []).forEach((cell, i) => {
          const name = columns?.[i];
          if (name) out[name] = cell.VarCharValue ?? null;
        });
        rows.push(out);
      }
      first = false;
      nextToken = page.NextToken;
    } while (nextToken);
    return rows;
  }
}
