import * as p from "@clack/prompts";
import chalk from "chalk";
import {
    InfeasibleProblemError,
    OptimizerConfig,
    checkFeasibility,
    formatAllocation,
    formatCurrency,
    formatUnits,
    greedyByVariableCost,
    solveExact,
    SearchSpaceTooLargeError,
} from "../../index.js";
import { fail, loadConfig, loadProblem, renderProblem } from "./shared.js";
import type { ProblemOptions } from "./shared.js";

export async function checkCommand(options: ProblemOptions & { config?: string }) {
    p.intro(chalk.bgGreen.black(" alloc-lab - Feasibility Check "));

    try {
        const config = OptimizerConfig.parse(await loadConfig(options.config));
        const problem = await loadProblem(options);
        renderProblem(problem);

        const report = checkFeasibility(problem);
        p.log.info(`Total capacity ${formatUnits(report.totalCapacity)} for demand ${formatUnits(report.demand)}`);

        switch (report.status) {
            case "infeasible":
                throw new InfeasibleProblemError(report.totalCapacity, report.demand);
            case "trivial":
                p.log.warn("Capacity exactly matches demand: every machine must run at capacity.");
                p.log.message(`Forced allocation ${formatAllocation(report.forcedAllocation)} -> ${formatCurrency(report.forcedCost)}`);
                break;
            case "solvable": {
                p.log.success(`Solvable with ${formatUnits(report.excessCapacity)} units of excess capacity.`);
                const greedy = greedyByVariableCost(problem);
                p.log.message(`Greedy by variable cost: ${formatCurrency(greedy.totalCost)}`);
                try {
                    const optimum = solveExact(problem, { maxMachines: config.exact_search_max_machines });
                    p.log.message(`Exhaustive optimum: ${formatAllocation(optimum.allocation)} -> ${formatCurrency(optimum.totalCost)}`);
                } catch (err) {
                    if (!(err instanceof SearchSpaceTooLargeError)) throw err;
                    p.log.info(err.message);
                }
                break;
            }
        }

        p.outro("Done.");
    } catch (err) {
        fail(err);
    }
}
