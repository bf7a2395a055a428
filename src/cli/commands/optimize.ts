import * as p from "@clack/prompts";
import chalk from "chalk";
import {
    AllocatorAgent,
    OptimizerConfig,
    PanelMode,
    ReporterAgent,
    buildReviewPanel,
    describeReason,
    formatCurrency,
    loadKnowledgeBase,
    runOptimization,
    tryWriteReports,
} from "../../index.js";
import { createClient, fail, loadConfig, loadProblem, renderCost, renderProblem } from "./shared.js";
import type { ModelOptions, ProblemOptions } from "./shared.js";

interface OptimizeOptions extends ProblemOptions, ModelOptions {
    mode?: string;
    report: boolean;
    yes?: boolean;
}

export async function optimizeCommand(options: OptimizeOptions) {
    p.intro(chalk.bgCyan.black(" alloc-lab - Optimize "));

    try {
        const fileConfig = await loadConfig(options.config);
        const config = OptimizerConfig.parse({
            ...fileConfig,
            ...(options.mode ? { panel_mode: PanelMode.parse(options.mode) } : {}),
        });

        const problem = await loadProblem(options);
        renderProblem(problem);

        const llmClient = createClient(options);
        const knowledgeBase = config.panel_mode === "strategist" ? await loadKnowledgeBase() : undefined;
        const reviewers = buildReviewPanel(config.panel_mode, llmClient, knowledgeBase);
        p.log.step(`Review panel: ${reviewers.map((reviewer) => chalk.cyan(reviewer.name)).join(", ")}`);

        if (!options.yes) {
            const start = await p.confirm({ message: "Start the optimisation loop?" });
            if (p.isCancel(start) || !start) {
                p.outro("Optimisation aborted.");
                return;
            }
        }

        const spinner = p.spinner();
        spinner.start("Optimisation in progress...");

        const result = await runOptimization({
            problem,
            allocator: new AllocatorAgent(llmClient),
            reviewers,
            config,
            onPhaseChange: (phase) => spinner.message(phase),
            onIterationComplete: (record) => {
                const tag = record.source === "fallback" ? chalk.yellow(" (fallback)") : "";
                p.log.message(
                    `${chalk.bold(`Iteration ${record.iteration}`)}${tag}: ${formatCurrency(record.cost.totalCost)}`
                    + ` - approvals ${record.approvals}/${record.feedback.length} - ${chalk.dim(record.decision.reason)}`,
                );
            },
            onAdjustment: (iteration, adjustments) => {
                p.log.warn(`Iteration ${iteration} repaired:\n${adjustments.map((line) => `  ${line}`).join("\n")}`);
            },
            onAgentError: (agent, err) => {
                p.log.warn(`${chalk.magenta(agent)} failed, using fallback: ${err instanceof Error ? err.message : String(err)}`);
            },
        });

        spinner.stop(chalk.green(`Converged: ${describeReason(result.convergenceReason)}`));
        renderCost(result.finalCost, `Best allocation (iteration ${result.bestIteration})`);
        p.log.info(
            `Iterations ${result.totalIterations} - improvement ${result.improvementPercent.toFixed(2)}%`
            + ` - tokens ${result.tokenUsage}`,
        );

        if (options.report) {
            const outcome = await tryWriteReports(result, problem, {
                reportsDir: config.reports_dir,
                reporter: new ReporterAgent(llmClient),
            });
            if (!outcome.ok) {
                p.log.warn(`Reports not written: ${outcome.error}`);
            } else {
                const written = outcome.written;
                p.log.success(`Summary written to ${chalk.cyan(written.summaryPath)}`);
                if (written.reportPath) {
                    p.log.success(`Report written to ${chalk.cyan(written.reportPath)}`);
                }
                if (written.narrativeError) {
                    p.log.warn(`Narrative report skipped: ${written.narrativeError}`);
                }
            }
        }

        p.outro("Optimisation finished.");
    } catch (err) {
        fail(err);
    }
}
