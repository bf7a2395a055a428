import * as p from "@clack/prompts";
import chalk from "chalk";
import ora from "ora";
import { OptimizerConfig, runEvaluatedAllocation } from "../../index.js";
import { createClient, fail, loadConfig, loadProblem, renderProblem } from "./shared.js";
import type { ModelOptions, ProblemOptions } from "./shared.js";
import { renderEnforcement } from "./enforce.js";

export async function evaluateCommand(options: ProblemOptions & ModelOptions) {
    p.intro(chalk.bgBlue.black(" alloc-lab - Evaluate "));

    try {
        const config = OptimizerConfig.parse(await loadConfig(options.config));
        const problem = await loadProblem(options);
        renderProblem(problem);

        const spinner = ora("Allocating...").start();
        const result = await runEvaluatedAllocation({
            problem,
            client: createClient(options),
            config,
            onPhaseChange: (phase) => {
                spinner.text = phase;
            },
            onAgentError: (agent, err) => {
                spinner.warn(`${agent} failed: ${err instanceof Error ? err.message : String(err)}`);
                spinner.start();
            },
        });
        spinner.succeed("Evaluation complete.");

        renderEnforcement(result);
        if (!result.oracleUsed) {
            p.log.warn("Evaluator did not call the exact optimiser; evaluation built from the exhaustive optimum.");
        }
        p.note(result.evaluation, "Evaluation");
        p.outro("Done.");
    } catch (err) {
        fail(err);
    }
}
