#!/usr/bin/env node

import dotenv from "dotenv";

// Silence dotenv 17+ console output
process.env.DOTENV_CONFIG_SILENT = "true";
dotenv.config();

import { Command } from "commander";
import {
    checkCommand,
    enforceCommand,
    evaluateCommand,
    optimizeCommand,
    verifyCommand,
} from "./commands/index.js";
import { DEFAULT_CATALOG, DEFAULT_COUNT, DEFAULT_DEMAND, DEFAULT_SEED_FALLBACK } from "./commands/shared.js";

const program = new Command();

program
    .name("alloc-lab")
    .description("LLM-driven machine allocation with deterministic verification")
    .version("1.0.0");

/** Options every command that builds a problem accepts. */
function withProblemOptions(command: Command): Command {
    return command
        .option("--catalog <path>", "Machine catalog CSV", DEFAULT_CATALOG)
        .option("--demand <units>", "Product demand in units", DEFAULT_DEMAND)
        .option("--count <n>", "Number of machines drawn at random", DEFAULT_COUNT)
        .option("--machines <ids>", "Comma-separated tool ids, e.g. 2,6,13,25 (overrides --count)")
        .option("--seed-fallback <ids>", "Tool ids used when a random pick lacks capacity", DEFAULT_SEED_FALLBACK)
        .option("--config <path>", "JSON file with optimizer settings");
}

function withModelOptions(command: Command): Command {
    return command
        .option("--provider <provider>", "LLM provider override (openai|google|anthropic)")
        .option("--model <model>", "LLM model override");
}

withModelOptions(withProblemOptions(
    program
        .command("optimize")
        .description("Run the iterative allocation loop with a review panel and write reports"),
))
    .option("--mode <mode>", "Review panel: panel (five experts) or strategist")
    .option("--no-report", "Skip writing report files")
    .option("-y, --yes", "Skip the confirmation prompt")
    .action(optimizeCommand);

withModelOptions(withProblemOptions(
    program
        .command("enforce")
        .description("Single allocation with the cost calculator tool, verified by the router"),
)).action(enforceCommand);

withModelOptions(withProblemOptions(
    program
        .command("evaluate")
        .description("Single allocation evaluated against the exhaustive optimum"),
)).action(evaluateCommand);

withProblemOptions(
    program
        .command("verify")
        .description("Benchmark an allocation against greedy heuristics and the exhaustive optimum"),
)
    .requiredOption("--allocation <pairs>", "Allocation as Tool_6=1600,Tool_13=1400")
    .action(verifyCommand);

withProblemOptions(
    program
        .command("check")
        .description("Feasibility analysis of a machine selection, no model needed"),
).action(checkCommand);

program.parse(process.argv);
