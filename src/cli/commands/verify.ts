import * as p from "@clack/prompts";
import chalk from "chalk";
import {
    OptimizerConfig,
    formatAllocation,
    formatCurrency,
    verifyAllocation,
} from "../../index.js";
import { DEFAULT_SEED_FALLBACK, fail, loadConfig, loadProblem, parseAllocationArg, renderProblem } from "./shared.js";
import type { ProblemOptions } from "./shared.js";

interface VerifyOptions extends ProblemOptions {
    allocation: string;
    config?: string;
}

export async function verifyCommand(options: VerifyOptions) {
    p.intro(chalk.bgGreen.black(" alloc-lab - Verify "));

    try {
        const config = OptimizerConfig.parse(await loadConfig(options.config));
        const problem = await loadProblem({ ...options, machines: options.machines ?? DEFAULT_SEED_FALLBACK });
        renderProblem(problem);

        const report = verifyAllocation(problem, parseAllocationArg(options.allocation), {
            maxMachines: config.exact_search_max_machines,
        });

        const rows = [
            `Proposed              ${formatCurrency(report.proposal.totalCost)}  ${formatAllocation(report.proposal.allocation)}`,
            `Greedy (variable)     ${formatCurrency(report.greedyByVariableCost.totalCost)}`,
            `Greedy (unit cost)    ${formatCurrency(report.greedyByUnitCost.totalCost)}`,
            report.optimum
                ? `Exhaustive optimum    ${formatCurrency(report.optimum.totalCost)}  ${formatAllocation(report.optimum.allocation)}`
                : "Exhaustive optimum    not computed (too many machines)",
        ];
        p.note(rows.join("\n"), "Benchmarks");

        if (!report.proposal.valid) {
            p.log.error(chalk.red(report.proposal.violation ?? "Allocation is invalid."));
            process.exit(1);
        }

        p.log.message(report.noWorseThanGreedy
            ? chalk.green("No worse than the greedy heuristics.")
            : chalk.yellow("Worse than a greedy heuristic."));

        if (report.optimal === true) {
            p.log.success("Optimal: matches the exhaustive optimum.");
        } else if (report.optimal === false) {
            p.log.warn(`Not optimal: ${formatCurrency(report.savingsAvailable ?? 0)} could still be saved.`);
        } else {
            p.log.info("Optimality unknown: exhaustive search was skipped.");
        }

        p.outro("Done.");
    } catch (err) {
        fail(err);
    }
}
