#!/usr/bin/env node

import "dotenv/config";
import { Command } from "commander";

const DEFAULT_CONFIG_PATH = "parley.json";

const program = new Command();

program
  .name("parley")
  .description("Parley — conversation memory for chat agents")
  .version("0.1.0");

async function setup(configPath: string) {
  const { loadConfig } = await import("./config/loader.js");
  const { setLogLevel } = await import("./infra/logger.js");
  const { SessionStore } = await import("./sessions/store.js");

  const config = await loadConfig(configPath);
  setLogLevel(config.logging.level);
  return { config, store: new SessionStore(config.memory.sessionDir) };
}

// --- parley init ---
program
  .command("init")
  .description("Create a parley.json config file with default settings")
  .option("-c, --config <path>", "Path to config file", DEFAULT_CONFIG_PATH)
  .action(async (options: { config: string }) => {
    const { existsSync } = await import("node:fs");
    const { initializeConfig } = await import("./config/loader.js");

    if (existsSync(options.config)) {
      console.error(`Config file already exists: ${options.config}`);
      process.exit(1);
    }

    const config = await initializeConfig(options.config);
    console.log(`Created ${options.config} (permissions: 0600)`);
    console.log(`  Token budget: ${config.memory.tokenBudget}`);
    console.log(`  Sessions: ${config.memory.sessionDir}`);
  });

// --- parley sessions ---
program
  .command("sessions")
  .description("List saved sessions")
  .option("-c, --config <path>", "Path to config file", DEFAULT_CONFIG_PATH)
  .action(async (options: { config: string }) => {
    const { formatSessionList } = await import("./cli/commands.js");
    const { store } = await setup(options.config);
    console.log(formatSessionList(store.list(), store.directory));
  });

// --- parley inspect ---
program
  .command("inspect <name>")
  .description("Show statistics for a saved session")
  .option("-c, --config <path>", "Path to config file", DEFAULT_CONFIG_PATH)
  .action(async (name: string, options: { config: string }) => {
    const { formatStats, inspectSession } = await import("./cli/commands.js");
    const { store } = await setup(options.config);
    console.log(formatStats(inspectSession(store, name)));
  });

// --- parley recall ---
program
  .command("recall <name> <query...>")
  .description("Recall earlier messages from a saved session")
  .option("-c, --config <path>", "Path to config file", DEFAULT_CONFIG_PATH)
  .action(async (name: string, query: string[], options: { config: string }) => {
    const { formatRecall, recallFromSession } = await import("./cli/commands.js");
    const { config, store } = await setup(options.config);
    console.log(formatRecall(recallFromSession(store, name, query.join(" "), config.memory)));
  });

// --- parley config show ---
program
  .command("config")
  .command("show")
  .description("Display the effective config (file, environment and defaults)")
  .option("-c, --config <path>", "Path to config file", DEFAULT_CONFIG_PATH)
  .action(async (options: { config: string }) => {
    const { config } = await setup(options.config);
    console.log(JSON.stringify(config, null, 2));
  });

// --- parley doctor ---
program
  .command("doctor")
  .description("Check the config and saved sessions")
  .option("-c, --config <path>", "Path to config file", DEFAULT_CONFIG_PATH)
  .action(async (options: { config: string }) => {
    const { runDoctorChecks, formatDoctorResults } = await import(
      "./cli/doctor.js"
    );

    const report = await runDoctorChecks(options.config);
    console.log(formatDoctorResults(report));

    if (!report.ok) {
      process.exit(1);
    }
  });

program.parseAsync().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
