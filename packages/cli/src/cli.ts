#!/usr/bin/env node
/**
 * histsync CLI - Main entry point
 */

import { Command } from "commander";
import * as path from "path";
import * as fs from "fs/promises";
import { config } from "dotenv";
import * as cron from "node-cron";
import { loadConfigFile } from "./parser.js";
import { describeRun, prepareCollections, runCollections, runCollectionsFromFile } from "./runner.js";

// Load environment variables from .env file if it exists
config();

interface RunOptions {
  config: string;
  collections?: string[];
}

interface ConfigOptions {
  config: string;
}

/**
 * Resolve the config path and exit when the file is missing.
 */
async function resolveConfigPath(configOption: string): Promise<string> {
  const configPath = path.resolve(configOption);
  try {
    await fs.access(configPath);
  } catch {
    console.error(`Error: Configuration file not found: ${configPath}`);
    process.exit(1);
  }
  return configPath;
}

const program = new Command();

program
  .name("histsync")
  .description("Keep local record collections in step with a remote collection service")
  .version("0.1.0");

program
  .command("run")
  .description("Run one sync pass for each collection")
  .option("-c, --config <path>", "Path to JSONC configuration file", "histsync.jsonc")
  .option("-C, --collections <ids...>", "Specific collection IDs to run (default: all)")
  .action(async (options: RunOptions) => {
    try {
      const configPath = await resolveConfigPath(options.config);
      const runs = await runCollectionsFromFile(configPath, options.collections);

      for (const run of runs) {
        console.log(`${run.id}: ${describeRun(run)}`);
      }
      console.log(`\nCompleted ${runs.length} collection(s)`);

      // Exit with error code if any pass failed
      const hasFailures = runs.some((run) => run.result.status === "failed");
      process.exit(hasFailures ? 1 : 0);
    } catch (error) {
      console.error("Error running collections:", error);
      process.exit(1);
    }
  });

program
  .command("schedule")
  .description("Run sync passes on each collection's configured schedule")
  .option("-c, --config <path>", "Path to JSONC configuration file", "histsync.jsonc")
  .action(async (options: ConfigOptions) => {
    try {
      const configPath = await resolveConfigPath(options.config);
      const config = await loadConfigFile(configPath);

      console.log(`Starting scheduled sync from ${configPath}`);
      console.log(`Found ${config.collections.length} collection(s)\n`);

      // Collaborators live for the whole process so cursors carry over between passes.
      const prepared = await prepareCollections(config, configPath);
      const scheduled = new Map<string, cron.ScheduledTask>();

      for (const [id, collection] of prepared) {
        const schedule = collection.config.schedule;
        if (!schedule) {
          console.log(`Collection '${id}' has no schedule (manual/CLI-only)`);
          continue;
        }
        if (!cron.validate(schedule)) {
          console.error(`Invalid cron expression for collection '${id}': ${schedule}`);
          continue;
        }

        const task = cron.schedule(
          schedule,
          async () => {
            console.log(`[${new Date().toISOString()}] Running scheduled pass: ${id}`);
            const [run] = await runCollections(new Map([[id, collection]]));
            console.log(`[${new Date().toISOString()}] ${id}: ${describeRun(run)}`);
          },
          { scheduled: true, timezone: "UTC" }
        );
        scheduled.set(id, task);
        console.log(`Scheduled collection '${id}' with cron: ${schedule}`);
      }

      if (scheduled.size === 0) {
        console.log("\nNo collections with schedules found. Use 'histsync run' to sync manually.");
        process.exit(0);
      }

      console.log(`\n${scheduled.size} collection(s) scheduled. Press Ctrl+C to stop.`);

      process.on("SIGINT", () => {
        console.log("\nShutting down...");
        for (const [id, task] of scheduled) {
          task.stop();
          console.log(`Stopped schedule for collection '${id}'`);
        }
        process.exit(0);
      });
    } catch (error) {
      console.error("Error starting scheduled sync:", error);
      process.exit(1);
    }
  });

program
  .command("validate")
  .description("Validate a configuration file without syncing")
  .option("-c, --config <path>", "Path to JSONC configuration file", "histsync.jsonc")
  .action(async (options: ConfigOptions) => {
    try {
      const configPath = await resolveConfigPath(options.config);
      const config = await loadConfigFile(configPath);

      console.log(`✓ Configuration file is valid: ${configPath}`);
      console.log(`  Scratchpad: ${config.scratchpad.driver}`);
      console.log(`  Collections: ${config.collections.length}`);

      for (const collection of config.collections) {
        const schedule = collection.schedule ? ` (schedule: ${collection.schedule})` : " (manual)";
        const disabled = collection.enabled === false ? " [disabled]" : "";
        console.log(`    - ${collection.id}${schedule}${disabled}`);
      }

      process.exit(0);
    } catch (error) {
      console.error("Configuration validation failed:", error);
      process.exit(1);
    }
  });

program.parseAsync().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
