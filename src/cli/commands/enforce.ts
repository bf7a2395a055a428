import * as p from "@clack/prompts";
import chalk from "chalk";
import ora from "ora";
import { OptimizerConfig, formatCurrency, runToolEnforcedAllocation } from "../../index.js";
import type { ToolEnforcedResult } from "../../index.js";
import { createClient, fail, loadConfig, loadProblem, renderCost, renderProblem } from "./shared.js";
import type { ModelOptions, ProblemOptions } from "./shared.js";

export function renderEnforcement(result: ToolEnforcedResult): void {
    const toolLine = result.toolUsed
        ? chalk.green(`Calculator used (${result.toolCalls.length} tool call(s))`)
        : chalk.yellow("Calculator NOT used - cost computed by the router");
    p.log.message(toolLine);

    if (result.error) {
        p.log.warn(`Agent reply unusable, greedy fallback used: ${result.error}`);
    }
    if (result.adjustments.length > 0) {
        p.log.warn(`Allocation repaired:\n${result.adjustments.map((line) => `  ${line}`).join("\n")}`);
    }

    renderCost(result.cost, result.strategyName ?? "Allocation");

    if (result.reportedCost !== null) {
        const verdict = result.costsMatch ? chalk.green("match") : chalk.red("mismatch");
        p.log.info(
            `Reported ${formatCurrency(result.reportedCost)} vs verified ${formatCurrency(result.cost.totalCost)}: ${verdict}`,
        );
    }
}

export async function enforceCommand(options: ProblemOptions & ModelOptions) {
    p.intro(chalk.bgBlue.black(" alloc-lab - Tool Enforcement "));

    try {
        const config = OptimizerConfig.parse(await loadConfig(options.config));
        const problem = await loadProblem(options);
        renderProblem(problem);

        const spinner = ora("Asking the structured allocator...").start();
        const result = await runToolEnforcedAllocation({
            problem,
            client: createClient(options),
            config,
            onPhaseChange: (phase) => {
                spinner.text = phase;
            },
        });
        spinner.succeed(result.enforced ? "Allocation enforced." : "Allocation accepted.");

        renderEnforcement(result);
        p.outro("Done.");
    } catch (err) {
        fail(err);
    }
}
