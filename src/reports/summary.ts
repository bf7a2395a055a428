/**
 * Summary Report — Deterministic markdown built from a finished run.
 *
 * Needs no model: every figure comes from the result and the problem.
 */
import type { OptimizationResult, IterationRecord } from "../orchestrator.js";
import type { Problem } from "../schemas/machine.js";
import { roundCurrency } from "../core/cost.js";
import { displayTimestamp, formatAllocation, formatCurrency, formatUnits } from "../core/format.js";

/** Active machines below this share of capacity are flagged in the recommendations. */
const LOW_UTILIZATION = 0.5;

export function describeReason(reason: string): string {
    return reason.replace(/_/g, " ");
}

function utilization(units: number, capacity: number): string {
    if (capacity <= 0) return "n/a";
    return `${((units / capacity) * 100).toFixed(1)}%`;
}

/** `Initial`, `$1,400.00 saved`, `$200.00 more` or `no change`. */
export function describeChange(previous: IterationRecord | undefined, current: IterationRecord): string {
    if (!previous) return "Initial";
    const delta = roundCurrency(previous.cost.totalCost - current.cost.totalCost);
    if (delta > 0) return `${formatCurrency(delta)} saved`;
    if (delta < 0) return `${formatCurrency(-delta)} more`;
    return "no change";
}

function allocationTable(result: OptimizationResult, problem: Problem): string[] {
    const linesById = new Map(result.finalCost.lines.map((line) => [line.machineId, line]));
    const rows = [
        "| Machine | Units | Capacity | Utilization | Variable Cost | Fixed Cost | Total |",
        "|---|---|---|---|---|---|---|",
    ];

    let units = 0;
    for (const machine of problem.machines) {
        const line = linesById.get(machine.id);
        const allocated = result.finalAllocation[machine.id] ?? 0;
        units += allocated;
        rows.push(
            `| ${machine.id} | ${formatUnits(allocated)} | ${formatUnits(machine.capacity)} `
            + `| ${utilization(allocated, machine.capacity)} `
            + `| ${formatCurrency(line?.variableCost ?? 0)} | ${formatCurrency(line?.fixedCost ?? 0)} `
            + `| ${formatCurrency(line?.total ?? 0)} |`,
        );
    }
    rows.push(
        `| **Total** | **${formatUnits(units)}** | | | ${formatCurrency(result.finalCost.totalVariableCost)} `
        + `| ${formatCurrency(result.finalCost.totalFixedCost)} | **${formatCurrency(result.finalCost.totalCost)}** |`,
    );
    return rows;
}

function journeyTable(history: readonly IterationRecord[]): string[] {
    if (history.length === 0) {
        return ["No iterations ran: total capacity exactly matches demand, so every machine runs at full capacity."];
    }

    const rows = [
        "| Iteration | Source | Allocation | Total Cost | Change | Approvals |",
        "|---|---|---|---|---|---|",
    ];
    history.forEach((record, i) => {
        rows.push(
            `| ${record.iteration} | ${record.source} | ${formatAllocation(record.allocation)} `
            + `| ${formatCurrency(record.cost.totalCost)} | ${describeChange(history[i - 1], record)} `
            + `| ${record.approvals}/${record.feedback.length} |`,
        );
    });
    return rows;
}

export function buildRecommendations(result: OptimizationResult, problem: Problem): string[] {
    const recommendations: string[] = [];

    if (result.convergenceReason === "exact_capacity_match") {
        recommendations.push("Capacity exactly matches demand; adding machines would leave room to reduce cost.");
    }
    if (result.convergenceReason === "max_iterations_reached") {
        recommendations.push("The iteration cap was reached before the reviewers agreed; consider raising max_iterations.");
    }

    for (const machine of problem.machines) {
        const units = result.finalAllocation[machine.id] ?? 0;
        if (units > 0 && machine.capacity > 0 && units / machine.capacity < LOW_UTILIZATION) {
            recommendations.push(
                `${machine.id} runs at ${utilization(units, machine.capacity)} of capacity; moving its units to an `
                + `active machine would save its ${formatCurrency(machine.fixedCost)} fixed cost.`,
            );
        }
    }

    const last = result.history[result.history.length - 1];
    if (last) {
        const suggestions = [...new Set(
            last.feedback.filter((entry) => !entry.failed).flatMap((entry) => entry.key_recommendations),
        )].slice(0, 3);
        for (const suggestion of suggestions) {
            recommendations.push(`Reviewer suggestion: ${suggestion}`);
        }
    }

    if (recommendations.length === 0) recommendations.push("No further changes recommended.");
    return recommendations;
}

export function buildSummaryReport(result: OptimizationResult, problem: Problem, now: Date = new Date()): string {
    const active = result.finalCost.lines.length;
    const bestIteration = result.bestIteration > 0
        ? `${result.bestIteration} of ${result.totalIterations}`
        : "none (no iterations ran)";

    return [
        "# Manufacturing Optimization Summary",
        "",
        `Generated: ${displayTimestamp(now)}`,
        `Run ID: ${result.runId}`,
        "",
        "## Executive Summary",
        "",
        `- **Product demand:** ${formatUnits(problem.demand)} units`,
        `- **Machines considered:** ${problem.machines.length} (${problem.machines.map((machine) => machine.id).join(", ")})`,
        `- **Final total cost:** ${formatCurrency(result.finalCost.totalCost)}`,
        `- **Best iteration:** ${bestIteration}`,
        `- **Improvement over first allocation:** ${result.improvementPercent.toFixed(2)}%`,
        `- **Convergence reason:** ${describeReason(result.convergenceReason)}`,
        "",
        "## Final Allocation",
        "",
        ...allocationTable(result, problem),
        "",
        "## Cost Analysis",
        "",
        `- Total variable cost: ${formatCurrency(result.finalCost.totalVariableCost)}`,
        `- Total fixed cost: ${formatCurrency(result.finalCost.totalFixedCost)}`,
        `- Total cost: ${formatCurrency(result.finalCost.totalCost)}`,
        `- Active machines: ${active} of ${problem.machines.length}`,
        "",
        "## Optimization Journey",
        "",
        ...journeyTable(result.history),
        "",
        "## Recommendations",
        "",
        ...buildRecommendations(result, problem).map((line) => `- ${line}`),
        "",
    ].join("\n");
}
