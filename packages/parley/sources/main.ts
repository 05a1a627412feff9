#!/usr/bin/env node
import { readFileSync } from "node:fs";
import { Command } from "commander";
import { z } from "zod";
import { askCommand } from "./commands/ask.js";
import { modelsCommand } from "./commands/models.js";
import { profilesCommand } from "./commands/profiles.js";
import { initLogging } from "./log.js";
import { DEFAULT_SETTINGS_PATH } from "./settings.js";

const pkg = z.object({ version: z.string() }).parse(JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8")));

const program = new Command();

initLogging();

program.name("parley").description("Conversation exchange engine").version(pkg.version);

program
    .command("ask")
    .description("Send one message and print the reply")
    .argument("<text>", "Message text")
    .option("-s, --settings <path>", "Path to settings file", DEFAULT_SETTINGS_PATH)
    .option("-m, --model <model>", "Model name, e.g. gpt-4o-mini or openrouter:<id>")
    .option("-i, --image <path...>", "Attach image files")
    .option("-p, --profile <name>", "Apply a profile before sending")
    .option("-o, --output <dir>", "Directory for generated images")
    .action(askCommand);

program
    .command("models")
    .description("List catalog models, optionally filtered")
    .argument("[query]", "Substring of the model id or name")
    .option("-s, --settings <path>", "Path to settings file", DEFAULT_SETTINGS_PATH)
    .option("-c, --case-sensitive", "Match the query case-sensitively")
    .action(modelsCommand);

program
    .command("profiles")
    .description("List available profiles")
    .option("-s, --settings <path>", "Path to settings file", DEFAULT_SETTINGS_PATH)
    .action(profilesCommand);

if (process.argv.length <= 2) {
    program.outputHelp();
    process.exit(0);
}

await program.parseAsync(process.argv);
