/**
 * Helpers shared by the CLI commands: option parsing, problem loading and rendering.
 */
import * as p from "@clack/prompts";
import chalk from "chalk";
import fs from "fs/promises";
import path from "path";
import {
    InfeasibleProblemError,
    LLMClient,
    OptimizerConfig,
    apiKeyVariable,
    buildProblem,
    formatCurrency,
    formatUnits,
    loadMachineCatalog,
    machineIdFor,
    pickFeasibleMachines,
    resolveLanguageModel,
    selectMachines,
} from "../../index.js";
import type { Allocation, CostBreakdown, Problem } from "../../index.js";

export const DEFAULT_CATALOG = "input/allocation_tools.csv";
export const DEFAULT_DEMAND = "3000";
export const DEFAULT_COUNT = "4";
export const DEFAULT_SEED_FALLBACK = "2,6,13,25";

export interface ProblemOptions {
    catalog?: string;
    demand?: string;
    count?: string;
    machines?: string;
    seedFallback?: string;
}

export interface ModelOptions {
    provider?: string;
    model?: string;
    config?: string;
}

export function parseInteger(value: string, flag: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed)) {
        throw new Error(`Invalid ${flag} value: ${value}`);
    }
    return parsed;
}

export function parseIdList(value: string): string[] {
    return value.split(",").map((id) => id.trim()).filter((id) => id !== "");
}

/** `Tool_6=1600,Tool_13=1400` (or `6=1600,13=1400`) → allocation. */
export function parseAllocationArg(value: string): Allocation {
    const allocation: Allocation = {};
    for (const pair of parseIdList(value)) {
        const [id, units] = pair.split("=").map((part) => part.trim());
        if (!id || units === undefined) {
            throw new Error(`Invalid allocation entry "${pair}", expected <tool>=<units>`);
        }
        const machineId = machineIdFor(id);
        allocation[machineId] = (allocation[machineId] ?? 0) + parseInteger(units, `--allocation ${machineId}`);
    }
    return allocation;
}

/** Load the catalog and build the problem from `--machines` or a random `--count`. */
export async function loadProblem(options: ProblemOptions): Promise<Problem> {
    const catalogPath = path.resolve(process.cwd(), options.catalog ?? DEFAULT_CATALOG);
    const catalog = await loadMachineCatalog(catalogPath);
    const demand = parseInteger(options.demand ?? DEFAULT_DEMAND, "--demand");
    p.log.info(`Loaded ${chalk.cyan(String(catalog.length))} machines from ${chalk.dim(catalogPath)}`);

    if (options.machines) {
        return buildProblem(selectMachines(catalog, parseIdList(options.machines)), demand);
    }

    const selection = pickFeasibleMachines(catalog, {
        count: parseInteger(options.count ?? DEFAULT_COUNT, "--count"),
        demand,
        fallbackIds: parseIdList(options.seedFallback ?? DEFAULT_SEED_FALLBACK),
    });
    if (selection.usedFallback) {
        p.log.warn("Random selection could not cover demand; using the fallback machines.");
    }
    return buildProblem(selection.machines, demand);
}

export async function loadConfig(configPath?: string): Promise<Partial<OptimizerConfig>> {
    if (!configPath) return {};
    const content = await fs.readFile(path.resolve(process.cwd(), configPath), "utf-8");
    return OptimizerConfig.partial().parse(JSON.parse(content));
}

export function createClient(options: ModelOptions): LLMClient {
    const variable = apiKeyVariable(options.provider);
    if (!process.env[variable]) {
        throw new Error(`No LLM API key detected. Set ${variable} or pass another --provider.`);
    }
    return new LLMClient(resolveLanguageModel(options.provider, options.model));
}

export function renderProblem(problem: Problem): void {
    const rows = problem.machines.map((machine) =>
        `${chalk.cyan(machine.id.padEnd(8))} capacity ${formatUnits(machine.capacity).padStart(6)}`
        + `  variable ${formatCurrency(machine.variableCost).padStart(8)}`
        + `  fixed ${formatCurrency(machine.fixedCost).padStart(10)}`,
    );
    p.note(rows.join("\n"), `Demand: ${formatUnits(problem.demand)} units`);
}

export function renderCost(cost: CostBreakdown, title: string): void {
    const rows = cost.lines.map((line) =>
        `${chalk.cyan(line.machineId.padEnd(8))} ${formatUnits(line.units).padStart(6)} units  ${formatCurrency(line.total).padStart(12)}`,
    );
    rows.push("");
    rows.push(`Variable ${formatCurrency(cost.totalVariableCost)}  Fixed ${formatCurrency(cost.totalFixedCost)}`);
    rows.push(chalk.bold(`Total    ${formatCurrency(cost.totalCost)}`));
    p.note(rows.join("\n"), title);
}

/** Exit code 2 marks an infeasible problem; everything else is 1. */
export function fail(err: unknown): never {
    p.log.error(chalk.red(err instanceof Error ? err.message : String(err)));
    process.exit(err instanceof InfeasibleProblemError ? 2 : 1);
}
