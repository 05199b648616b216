#!/usr/bin/env tsx

import chalk from "chalk";
import { Command } from "commander";
import { resolve } from "path";
import { DEFAULT_CACHE_FILE } from "./cache";
import { validateEventCoverage } from "./cli/validate";
import { loadConfig, type PipelineConfig } from "./config";
import { createCountryResolver } from "./countries";
import { groupByCountry } from "./dedupe";
import { errorMessage } from "./errors";
import { startOperation } from "./log";
import { writeEvents, writeOutputs, type OutputFormat } from "./output";
import { runPipeline } from "./pipeline";
import { fetchMedalEvents, fetchMedalTotals } from "./scraper";
import type { JsonEvent, ProgressCallback } from "./types";

interface CommonOptions {
  config?: string;
  countries?: string;
  cacheFile: string;
  logDir: string;
  json?: boolean;
}

interface OutputOptions extends CommonOptions {
  output: string;
  format: string;
}

interface ScoreOptions extends OutputOptions {
  roster: string;
  validate?: boolean;
}

const program = new Command()
  .name("medal-draft")
  .version("1.0.0")
  .description("Fantasy Olympics medal draft leaderboard");

// Machine-readable events for wrappers that drive the CLI
function jsonEvent(event: JsonEvent) {
  console.log(JSON.stringify(event));
}

function progressReporter(isJson: boolean): ProgressCallback {
  return (msg) => {
    if (isJson) {
      jsonEvent({ type: "progress", message: msg });
    } else if (msg.startsWith("Warning:")) {
      console.log(chalk.yellow(msg));
    } else {
      console.log(chalk.gray(msg));
    }
  };
}

function fail(error: unknown, isJson: boolean): never {
  const msg = errorMessage(error);
  if (isJson) {
    jsonEvent({ type: "error", message: msg });
  } else {
    console.error(chalk.red(`Error: ${msg}`));
  }
  process.exit(1);
}

function parseFormat(value: string): OutputFormat {
  if (value === "csv" || value === "json") return value;
  throw new Error(`Unknown format "${value}" (expected csv or json)`);
}

function withCommonOptions(command: Command): Command {
  return command
    .option("--config <file>", "Pipeline configuration (JSON)")
    .option("--countries <file>", "Country name -> NOC table (JSON)")
    .option("--cache-file <file>", "Medal totals cache", DEFAULT_CACHE_FILE)
    .option("--log-dir <dir>", "Log directory", "./logs")
    .option("--json", "Output JSON events");
}

async function configFrom(opts: CommonOptions): Promise<PipelineConfig> {
  return loadConfig({
    configFile: opts.config,
    countriesFile: opts.countries,
  });
}

withCommonOptions(
  program.command("medals").description("Fetch the medal table (cache fallback)"),
).action(async (opts: CommonOptions) => {
  const isJson = Boolean(opts.json);
  const run = startOperation("medals", opts.logDir, progressReporter(isJson));

  try {
    const config = await configFrom(opts);
    const result = await fetchMedalTotals(config.totalsSources, {
      resolver: createCountryResolver(config.countries),
      cacheFile: resolve(opts.cacheFile),
      timeoutMs: config.timeoutMs,
      onProgress: run.onProgress,
    });

    await run.finish({
      countries: result.totals.length,
      source: result.source,
      usedCache: result.usedCache,
    });

    if (isJson) {
      jsonEvent({ type: "complete", data: result });
      return;
    }

    console.log(chalk.bold(`\n${result.totals.length} countries:\n`));
    for (const entry of result.totals) {
      console.log(
        `  ${chalk.cyan(entry.countryCode)} ${entry.countryName.padEnd(28)} ` +
          `🥇${entry.gold} 🥈${entry.silver} 🥉${entry.bronze}  total ${entry.total}`,
      );
    }
    if (result.usedCache) {
      console.log(chalk.yellow(`\n⚠ Using cached data from ${result.source}`));
    }
  } catch (error) {
    fail(error, isJson);
  }
});

withCommonOptions(
  program
    .command("events")
    .description("Fetch medal events and write them per country")
    .option("-o, --output <dir>", "Output directory", "./output")
    .option("-f, --format <type>", "Output format (csv|json)", "csv"),
).action(async (opts: OutputOptions) => {
  const isJson = Boolean(opts.json);
  const run = startOperation("events", opts.logDir, progressReporter(isJson));

  try {
    const format = parseFormat(opts.format);
    const config = await configFrom(opts);
    const records = await fetchMedalEvents(config.eventSources, {
      resolver: createCountryResolver(config.countries),
      sportMapping: config.sportMapping,
      timeoutMs: config.timeoutMs,
      delayMs: config.delayMs,
      onProgress: run.onProgress,
    });
    const eventsByCountry = groupByCountry(records);
    const outputPath = await writeEvents(eventsByCountry, opts.output, format);

    await run.finish({
      records: records.length,
      countries: eventsByCountry.size,
      format,
      outputPath,
    });

    if (isJson) {
      jsonEvent({
        type: "complete",
        data: { outputPath, records: records.length, countries: eventsByCountry.size },
      });
      return;
    }

    for (const [countryCode, list] of eventsByCountry) {
      const count = (medal: string) => list.filter((r) => r.medal === medal).length;
      console.log(
        `  ${chalk.cyan(countryCode)} ${count("gold")}G ${count("silver")}S ${count("bronze")}B`,
      );
    }
    console.log(
      chalk.green(
        `\n✓ ${records.length} medal records for ${eventsByCountry.size} countries`,
      ),
    );
    console.log(chalk.gray(`  Output: ${outputPath}`));
    console.log(chalk.gray(`  Log: ${run.logFile}`));
  } catch (error) {
    fail(error, isJson);
  }
});

withCommonOptions(
  program
    .command("score")
    .description("Build the leaderboard from roster, medal table and events")
    .option("-r, --roster <file>", "Friends roster CSV", "./data/friends.csv")
    .option("-o, --output <dir>", "Output directory", "./output")
    .option("-f, --format <type>", "Output format (csv|json)", "csv")
    .option("--validate", "Compare event medals with the medal table"),
).action(async (opts: ScoreOptions) => {
  const isJson = Boolean(opts.json);
  const run = startOperation("score", opts.logDir, progressReporter(isJson));

  try {
    const format = parseFormat(opts.format);
    const config = await configFrom(opts);
    const result = await runPipeline(config, {
      rosterFile: resolve(opts.roster),
      cacheFile: resolve(opts.cacheFile),
      onProgress: run.onProgress,
    });
    const outputPaths = await writeOutputs(result, opts.output, format);
    const validation = validateEventCoverage(result.totals, result.eventsByCountry);

    await run.finish({
      entries: result.leaderboard.length,
      countries: result.totals.length,
      eventCountries: result.eventsByCountry.size,
      usedCache: result.usedCache,
      totalsSource: result.totalsSource,
      validationWarnings: validation.allWarnings.length,
      format,
      outputPaths,
    });

    if (isJson) {
      jsonEvent({
        type: "complete",
        data: {
          outputPaths,
          leaderboard: result.leaderboard,
          usedCache: result.usedCache,
        },
      });
      return;
    }

    console.log(chalk.bold("\nLeaderboard:\n"));
    for (const entry of result.leaderboard) {
      const picks = [entry.countryCode1, entry.countryCode2]
        .filter(Boolean)
        .join(" + ");
      const bonus = entry.dailyDoubleBonus
        ? chalk.magenta(` (+${entry.dailyDoubleBonus} daily double)`)
        : "";
      console.log(
        `  ${String(entry.rank).padStart(2)}. ${entry.displayName.padEnd(20)} ` +
          `${chalk.cyan(picks.padEnd(10))} ${chalk.bold(String(entry.pointsTotal))} pts${bonus}`,
      );
    }

    for (const [name, records] of result.dailyDoubles) {
      const podium = records
        .map((r) => `${r.medal} ${r.countryCode}`)
        .join(", ");
      console.log(chalk.gray(`  ${name}: ${podium || "scheduled for later"}`));
    }

    if (opts.validate) {
      if (validation.allWarnings.length === 0) {
        console.log(
          chalk.green(
            `\n✓ Validation: ${validation.totalCountries} countries match the medal table`,
          ),
        );
      } else {
        console.log(
          chalk.yellow(
            `\n⚠ Validation: ${validation.countriesWithWarnings}/${validation.totalCountries} countries have warnings`,
          ),
        );
        for (const warning of validation.allWarnings.slice(0, 20)) {
          console.log(chalk.gray(`    ${warning.message}`));
        }
        if (validation.allWarnings.length > 20) {
          console.log(
            chalk.gray(`    ... and ${validation.allWarnings.length - 20} more`),
          );
        }
      }
    }

    if (result.usedCache) {
      console.log(chalk.yellow(`\n⚠ Medal totals from cache: ${result.totalsSource}`));
    }
    console.log(chalk.green(`\n✓ Scored ${result.leaderboard.length} entries`));
    console.log(chalk.gray(`  Output: ${outputPaths.join(", ")}`));
    console.log(chalk.gray(`  Log: ${run.logFile}`));
  } catch (error) {
    fail(error, isJson);
  }
});

await program.parseAsync();
