/**
 * Report Writer — Puts the summary and the narrative report on disk.
 */
import fs from "fs/promises";
import path from "path";
import type { ReporterAgent } from "../agents/reporter.js";
import { describeProblem } from "../agents/context.js";
import type { OptimizationResult } from "../orchestrator.js";
import type { Problem } from "../schemas/machine.js";
import { toAllocationEntries } from "../schemas/agents.js";
import { fileTimestamp, formatAllocation } from "../core/format.js";
import { buildSummaryReport } from "./summary.js";

export interface WriteReportsOptions {
    reportsDir: string;
    /** Without a reporter only the summary is written. */
    reporter?: ReporterAgent;
    now?: Date;
}

export interface WrittenReports {
    summaryPath: string;
    /** Null when no reporter was given or the reporter failed. */
    reportPath: string | null;
    /** Why the narrative report is missing, when the reporter failed. */
    narrativeError?: string;
}

/** What the reporter agent is shown about a run. */
export function reporterContext(result: OptimizationResult, problem: Problem) {
    return {
        ...describeProblem(problem),
        result: {
            final_allocation: toAllocationEntries(result.finalAllocation),
            total_variable_cost: result.finalCost.totalVariableCost,
            total_fixed_cost: result.finalCost.totalFixedCost,
            total_cost: result.finalCost.totalCost,
            best_iteration: result.bestIteration,
            total_iterations: result.totalIterations,
            improvement_percent: Number(result.improvementPercent.toFixed(2)),
            convergence_reason: result.convergenceReason,
        },
        history: result.history.map((record) => ({
            iteration: record.iteration,
            source: record.source,
            allocation: formatAllocation(record.allocation),
            total_cost: record.cost.totalCost,
            approvals: record.approvals,
            reviewers: record.feedback.length,
        })),
    };
}

export async function writeReports(
    result: OptimizationResult,
    problem: Problem,
    options: WriteReportsOptions,
): Promise<WrittenReports> {
    const now = options.now ?? new Date();
    const stamp = fileTimestamp(now);
    await fs.mkdir(options.reportsDir, { recursive: true });

    const summaryPath = path.join(options.reportsDir, `optimization_summary_${stamp}.md`);
    await fs.writeFile(summaryPath, buildSummaryReport(result, problem, now), "utf-8");

    if (!options.reporter) {
        return { summaryPath, reportPath: null };
    }

    try {
        const { markdown } = await options.reporter.write(reporterContext(result, problem));
        const reportPath = path.join(options.reportsDir, `optimization_report_${stamp}.md`);
        await fs.writeFile(reportPath, markdown.endsWith("\n") ? markdown : `${markdown}\n`, "utf-8");
        return { summaryPath, reportPath };
    } catch (err) {
        return {
            summaryPath,
            reportPath: null,
            narrativeError: err instanceof Error ? err.message : String(err),
        };
    }
}

export type ReportOutcome =
    | { ok: true; written: WrittenReports }
    | { ok: false; error: string };

/**
 * {@link writeReports} for callers that already hold a finished result:
 * a disk failure comes back as an outcome instead of an exception.
 */
export async function tryWriteReports(
    result: OptimizationResult,
    problem: Problem,
    options: WriteReportsOptions,
): Promise<ReportOutcome> {
    try {
        return { ok: true, written: await writeReports(result, problem, options) };
    } catch (err) {
        return { ok: false, error: err instanceof Error ? err.message : String(err) };
    }
}
