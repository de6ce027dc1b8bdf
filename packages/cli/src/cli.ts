#!/usr/bin/env node

/**
 * SQL Catalog CLI entry point
 */

import { Command } from "commander";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { dirname, join } from "node:path";
import { logger, type Row, type ScriptParameters, type TransactionReport } from "@sqlcatalog/sdk";
import { openCliCatalog, createCliEngine, type GlobalOptions } from "./lib/catalog.js";
import { isVerbose } from "./lib/env.js";
import { parseNonNegativeInt, parseParams, parseParamsList } from "./lib/arg.js";
import { resolveBodySource, writeStderr } from "./lib/io.js";
import {
  printJson,
  printLines,
  colorize,
  formatScript,
  formatScripts,
  formatRows,
} from "./lib/render.js";
import { CliError, EXIT_CODE, mapSdkErrorToExitCode, formatCliError } from "./lib/errors.js";
import { emitScriptMetrics, emitTransactionMetrics, withTiming } from "./lib/telemetry.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Read package.json for version
const packageJson: { version: string } = JSON.parse(
  readFileSync(join(__dirname, "../package.json"), "utf-8")
);

interface OutputOptions {
  json?: boolean;
}

interface ParamsOptions extends OutputOptions {
  params?: string;
}

function printRows(rows: Row[], options: OutputOptions): void {
  if (options.json) {
    printJson(rows);
  } else {
    printLines(formatRows(rows));
  }
}

function paramsFrom(options: ParamsOptions): ScriptParameters {
  return options.params === undefined ? {} : parseParams(options.params);
}

function summarizeReport(report: TransactionReport) {
  return {
    success: report.success,
    state: report.state,
    steps: report.steps.map((step) =>
      step.ok
        ? { name: step.name, ok: true, rows: step.rows }
        : { name: step.name, ok: false, error: step.error.message }
    ),
    error: report.error?.message,
    rollbackError: report.rollbackError?.message,
  };
}

const program = new Command();

// Configure error output with color
program
  .configureOutput({
    writeErr: (str) => process.stderr.write(colorize(str, "red", process.stderr)),
  })
  .exitOverride((err) => {
    if (err.code !== "commander.help" && err.code !== "commander.version") {
      console.error(`\nError: ${err.message}`);
      process.exit(err.exitCode);
    }
    throw err;
  });

// Global options
program
  .name("sqlcatalog")
  .description("SQL Catalog - named, categorized SQL scripts with transactional execution")
  .version(packageJson.version)
  .option("--root <path>", "Catalog root directory")
  .option("--metadata-file <path>", "Metadata file (relative to the root)")
  .option("--database <descriptor>", "SQLite database path or sqlite: URL")
  .option("--strict", "Rethrow the triggering error of a rolled back transaction")
  .option("--verbose", "Verbose diagnostics");

// Logging goes to stdout/stderr, so it stays off unless asked for
program.hook("preAction", () => {
  if (program.opts<GlobalOptions>().verbose) {
    process.env.SQLCATALOG_CLI_DEBUG = "1";
  }
  logger.setEnabled(isVerbose());
});

// Add command
program
  .command("add")
  .description("Add a SQL script to the catalog")
  .requiredOption("-n, --name <name>", "Script name")
  .requiredOption("-c, --category <category>", "Script category")
  .option("-d, --description <text>", "Script description", "")
  .option("--content <sql>", "Script body")
  .option("-f, --file <path>", "Read the body from a SQL file")
  .option("--register", "Catalog --file where it is instead of copying it")
  .option("--inline", "Keep the body in the metadata file")
  .option("--json", "Output the new record as JSON")
  .action(
    async (options: {
      name: string;
      category: string;
      description: string;
      content?: string;
      file?: string;
      register?: boolean;
      inline?: boolean;
      json?: boolean;
    }) => {
      await withTiming("cli.add", async () => {
        const body = await resolveBodySource(options);
        const catalog = await openCliCatalog(program.opts<GlobalOptions>());
        const record = await catalog.addScript({
          name: options.name,
          category: options.category,
          description: options.description,
          content: body.content,
          sourceFile: body.sourceFile,
          inline: options.inline,
        });

        if (options.json) {
          printJson(record);
        } else {
          console.log(`Added script "${record.name}" to category "${record.category}"`);
        }
      });
    }
  );

// Show command
program
  .command("show <name>")
  .description("Show a script and its body")
  .option("--json", "Output as JSON")
  .action(async (name: string, options: OutputOptions) => {
    await withTiming("cli.show", async () => {
      const catalog = await openCliCatalog(program.opts<GlobalOptions>());
      const { record, content } = await catalog.getScript(name);

      if (options.json) {
        printJson({ ...record, content });
      } else {
        printLines(formatScript(record, content));
      }
    });
  });

// Find-category command
program
  .command("find-category <category>")
  .description("Show every script of a category")
  .option("--json", "Output as JSON")
  .action(async (category: string, options: OutputOptions) => {
    await withTiming("cli.find_category", async () => {
      const catalog = await openCliCatalog(program.opts<GlobalOptions>());
      const scripts = await catalog.findByCategory(category);

      if (scripts.length === 0) {
        throw new CliError(`No scripts found in category "${category}"`, {
          exitCode: EXIT_CODE.NOT_FOUND,
        });
      }

      if (options.json) {
        printJson(scripts.map(({ record, content }) => ({ ...record, content })));
      } else {
        printLines(formatScripts(scripts));
      }
    });
  });

// List command
program
  .command("ls")
  .description("List all scripts")
  .option("--json", "Output as JSON")
  .action(async (options: OutputOptions) => {
    await withTiming("cli.ls", async () => {
      const catalog = await openCliCatalog(program.opts<GlobalOptions>());
      const records = catalog.listScripts();

      if (options.json) {
        printJson(records);
      } else if (records.length === 0) {
        console.log("No scripts found.");
      } else {
        printLines(formatScripts(records.map((record) => ({ record }))));
      }
    });
  });

// Categories command
program
  .command("categories")
  .description("List all categories")
  .option("--json", "Output as JSON")
  .action(async (options: OutputOptions) => {
    await withTiming("cli.categories", async () => {
      const catalog = await openCliCatalog(program.opts<GlobalOptions>());
      const categories = catalog.listCategories();

      if (options.json) {
        printJson(categories);
      } else if (categories.length === 0) {
        console.log("No categories found.");
      } else {
        printLines(categories.map((category) => `- ${category}`));
      }
    });
  });

// Remove command
program
  .command("rm <name>")
  .description("Remove a script from the catalog")
  .option("--delete-file", "Also delete the body file")
  .option("--json", "Output the removal report as JSON")
  .action(async (name: string, options: { deleteFile?: boolean; json?: boolean }) => {
    await withTiming("cli.rm", async () => {
      const catalog = await openCliCatalog(program.opts<GlobalOptions>());
      const report = await catalog.removeScript(name, { deleteFile: options.deleteFile });
      const body = report.body;

      if (options.json) {
        printJson({
          name: report.record.name,
          body: body.status === "failed" ? { ...body, error: body.error.message } : body,
        });
      } else {
        console.log(`Removed script "${report.record.name}"`);
        if (body.status === "deleted") {
          console.log(`Deleted body file ${body.path}`);
        } else if (body.status === "missing") {
          writeStderr(colorize(`Body file was already absent: ${body.path}\n`, "yellow", process.stderr));
        }
      }

      // The record is gone either way; a failed body deletion still fails the command
      if (body.status === "failed") {
        throw new CliError(`Removed "${name}" but could not delete ${body.path}`, {
          cause: body.error,
        });
      }
    });
  });

// Exec command
program
  .command("exec <name>")
  .description("Execute a cataloged script")
  .option("--params <json>", "Placeholder values as a JSON object, or an array for ? placeholders")
  .option("--json", "Output rows as JSON")
  .action(async (name: string, options: ParamsOptions) => {
    await withTiming("cli.exec", async () => {
      const params = paramsFrom(options);
      const opts = program.opts<GlobalOptions>();
      const catalog = await openCliCatalog(opts);
      const engine = createCliEngine(catalog, opts);

      try {
        printRows(await engine.executeByName(name, params), options);
      } finally {
        emitScriptMetrics([name]);
      }
    });
  });

// Exec-category command
program
  .command("exec-category <category>")
  .description("Execute the n-th script of a category")
  .option("--index <n>", "Position within the category", "0")
  .option("--params <json>", "Placeholder values as a JSON object, or an array for ? placeholders")
  .option("--json", "Output rows as JSON")
  .action(async (category: string, options: ParamsOptions & { index: string }) => {
    await withTiming("cli.exec_category", async () => {
      const index = parseNonNegativeInt(options.index, "--index");
      const params = paramsFrom(options);
      const opts = program.opts<GlobalOptions>();
      const catalog = await openCliCatalog(opts);
      const engine = createCliEngine(catalog, opts);

      printRows(await engine.executeFromCategory(category, index, params), options);
    });
  });

// Transaction command
program
  .command("txn <names...>")
  .description("Execute several scripts in one transaction")
  .option("--params <json-array>", "One JSON object (or value array) of placeholder values per script")
  .option("--strict", "Rethrow the triggering error after rollback")
  .option("--json", "Output the transaction report as JSON")
  .action(
    async (names: string[], options: { params?: string; strict?: boolean; json?: boolean }) => {
      await withTiming("cli.txn", async () => {
        const params = options.params === undefined ? undefined : parseParamsList(options.params);
        const opts = program.opts<GlobalOptions>();
        const catalog = await openCliCatalog(opts);
        const engine = createCliEngine(catalog, opts, { strict: options.strict });

        const report = await engine.runTransaction(names, params);
        emitScriptMetrics(names);
        emitTransactionMetrics();

        if (options.json) {
          printJson(summarizeReport(report));
        } else if (report.success) {
          console.log(`Committed ${report.steps.length} script(s)`);
          const last = report.steps[report.steps.length - 1];
          if (last?.ok && last.rows.length > 0) {
            printLines(formatRows(last.rows));
          }
        }

        if (report.success) {
          return;
        }

        // A failed rollback names the triggering error, strict or not
        if (report.rollbackError) {
          throw report.rollbackError;
        }
        if (engine.strict && report.error) {
          throw report.error;
        }
        throw new CliError(`Transaction rolled back: ${report.error?.message ?? "unknown error"}`, {
          exitCode: EXIT_CODE.ROLLED_BACK,
          cause: report.error,
        });
      });
    }
  );

// SQL command
program
  .command("sql <statement>")
  .description("Execute ad-hoc SQL")
  .option("--params <json>", "Placeholder values as a JSON object, or an array for ? placeholders")
  .option("--json", "Output rows as JSON")
  .action(async (statement: string, options: ParamsOptions) => {
    await withTiming("cli.sql", async () => {
      const params = paramsFrom(options);
      const opts = program.opts<GlobalOptions>();
      const catalog = await openCliCatalog(opts);
      const engine = createCliEngine(catalog, opts);

      printRows(await engine.executeSql(statement, params), options);
    });
  });

// Top-level error handler
async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    const exitCode = mapSdkErrorToExitCode(err);
    const message = formatCliError(err, isVerbose());

    console.error(`Error: ${message}`);

    process.exit(exitCode);
  }
}

void main();
