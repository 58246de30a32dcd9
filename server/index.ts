#!/usr/bin/env node
import { loadAppConfig, type AppConfig } from "./config/index.js";
import { verifyConnection } from "./db.js";
import { CliUsageError, parseCliArgs, USAGE, type CliArgs } from "./cli/args.js";
import {
  postgresSourceFactory,
  withViewSource,
} from "./connectors/postgres/view-source.js";
import { errorMessage } from "./export/index.js";
import { runAdHocExport, runBatchExport, type BatchDependencies } from "./jobs/batch-export.js";
import { formatBatchSummary, formatOutcome } from "./jobs/summary.js";
import { loggers } from "./utils/index.js";

const logger = loggers.cli;

const EXIT_OK = 0;
const EXIT_ERROR = 1;
const EXIT_PARTIAL = 2;

function missingConnectionFields(config: AppConfig): string[] {
  const missing: string[] = [];
  if (!config.db.host) missing.push("DB_HOST");
  if (!config.db.database) missing.push("DB_NAME");
  if (!config.db.user) missing.push("DB_USER");
  return missing;
}

function requireConnection(config: AppConfig): void {
  const missing = missingConnectionFields(config);
  if (missing.length > 0) {
    throw new CliUsageError(`Connection settings missing: ${missing.join(", ")}`);
  }
}

function batchDependencies(config: AppConfig, schema: string): BatchDependencies {
  return {
    registry: config.views,
    openSource: postgresSourceFactory(config.db),
    templatesRoot: config.templatesFolder,
    outputRoot: config.outputFolder,
    schema,
  };
}

async function runExport(config: AppConfig, args: CliArgs, schema: string): Promise<number> {
  requireConnection(config);

  const viewNames = args.positionals.length > 0 ? args.positionals : config.views.names();
  if (viewNames.length === 0) {
    console.log("No views configured.");
    return EXIT_OK;
  }

  const controller = new AbortController();
  const onSigint = () => {
    logger.warn("Interrupt received, stopping after the current view");
    controller.abort();
  };
  process.once("SIGINT", onSigint);

  try {
    const report = await runBatchExport(viewNames, batchDependencies(config, schema), {
      exportOptions: {
        ...config.exportOptions,
        includeHeaders: args.includeHeaders ?? config.exportOptions.includeHeaders,
      },
      signal: controller.signal,
      onProgress: ({ index, total, viewName, phase }) => {
        if (phase === "started") {
          console.log(`[${index}/${total}] Exporting ${viewName}...`);
        }
      },
    });

    console.log("");
    for (const line of formatBatchSummary(report)) {
      console.log(line);
    }
    return report.status === "clean" ? EXIT_OK : EXIT_PARTIAL;
  } finally {
    process.removeListener("SIGINT", onSigint);
  }
}

async function runExportFile(config: AppConfig, args: CliArgs, schema: string): Promise<number> {
  requireConnection(config);
  if (!args.view || !args.template) {
    throw new CliUsageError("export-file needs --view and --template");
  }

  const outcome = await runAdHocExport(
    {
      viewName: args.view,
      templatePath: args.template,
      outputPath: args.output,
      outputDir: config.outputFolder,
      anchor: { row: config.defaultStartRow, col: config.defaultStartCol },
    },
    { openSource: postgresSourceFactory(config.db), schema },
    {
      exportOptions: {
        ...config.exportOptions,
        includeHeaders: args.includeHeaders ?? config.exportOptions.includeHeaders,
      },
    },
  );

  console.log(formatOutcome(outcome));
  return outcome.status === "failed" ? EXIT_PARTIAL : EXIT_OK;
}

function listConfiguredViews(config: AppConfig): number {
  const entries = config.views.list();
  if (entries.length === 0) {
    console.log("No views configured.");
  }
  for (const entry of entries) {
    console.log(`${entry.viewName} → ${entry.templateName} (anchor ${entry.anchorRow},${entry.anchorCol})`);
  }
  for (const diagnostic of config.views.diagnostics) {
    console.log(`  skipped: ${diagnostic.message}`);
  }
  return EXIT_OK;
}

async function listDatabaseViews(config: AppConfig, schema: string): Promise<number> {
  requireConnection(config);
  const names = await withViewSource(postgresSourceFactory(config.db), (source) => source.listViews(schema));
  for (const name of names) {
    const marker = config.views.has(name) ? "*" : " ";
    console.log(`${marker} ${name}`);
  }
  return EXIT_OK;
}

async function listViewColumns(config: AppConfig, viewName: string, schema: string): Promise<number> {
  requireConnection(config);
  const columns = await withViewSource(postgresSourceFactory(config.db), (source) =>
    source.listColumns(schema, viewName),
  );
  columns.forEach((name, i) => console.log(`${i + 1}. ${name}`));
  return EXIT_OK;
}

async function testConnection(config: AppConfig): Promise<number> {
  requireConnection(config);
  await verifyConnection(config.db);
  console.log(`Connection OK: ${config.db.user}@${config.db.host}:${config.db.port}/${config.db.database}`);
  return EXIT_OK;
}

export async function main(argv: string[]): Promise<number> {
  let args: CliArgs;
  try {
    args = parseCliArgs(argv);
  } catch (err) {
    console.error(errorMessage(err));
    console.error(USAGE);
    return EXIT_ERROR;
  }

  try {
    if (args.command === "help") {
      console.log(USAGE);
      return EXIT_OK;
    }
    const config = loadAppConfig({ envPath: args.configPath });
    const schema = args.schema ?? config.db.schema;

    switch (args.command) {
      case "export":
        return await runExport(config, args, schema);
      case "export-file":
        return await runExportFile(config, args, schema);
      case "views":
        return listConfiguredViews(config);
      case "db-views":
        return await listDatabaseViews(config, schema);
      case "db-columns":
        return await listViewColumns(config, args.positionals[0], schema);
      case "test-connection":
        return await testConnection(config);
    }
  } catch (err) {
    if (err instanceof CliUsageError) {
      console.error(err.message);
    } else {
      logger.error("Command failed", err instanceof Error ? err : new Error(String(err)));
    }
    return EXIT_ERROR;
  }
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error("[server] Fatal:", err);
    process.exitCode = EXIT_ERROR;
  },
);
