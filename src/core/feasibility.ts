/**
 * Feasibility Pre-check — Gates whether the optimisation loop runs at all.
 */
import type { Allocation, Problem } from "../schemas/machine.js";
import { computeCost, totalCapacity } from "./cost.js";

interface FeasibilityBase {
    totalCapacity: number;
    demand: number;
}

/** Total capacity is below demand; nothing can be done. */
export interface InfeasibleReport extends FeasibilityBase {
    status: "infeasible";
    shortfall: number;
}

/** Total capacity equals demand; every machine must run at capacity. */
export interface TrivialReport extends FeasibilityBase {
    status: "trivial";
    forcedAllocation: Allocation;
    forcedCost: number;
}

/** Excess capacity exists, so there is a choice to optimise. */
export interface SolvableReport extends FeasibilityBase {
    status: "solvable";
    excessCapacity: number;
}

export type FeasibilityReport = InfeasibleReport | TrivialReport | SolvableReport;

export function checkFeasibility(problem: Problem): FeasibilityReport {
    const capacity = totalCapacity(problem.machines);
    const { demand } = problem;

    if (capacity < demand) {
        return { status: "infeasible", totalCapacity: capacity, demand, shortfall: demand - capacity };
    }

    if (capacity === demand) {
        const forcedAllocation: Allocation = Object.fromEntries(
            problem.machines.map((machine) => [machine.id, machine.capacity]),
        );
        return {
            status: "trivial",
            totalCapacity: capacity,
            demand,
            forcedAllocation,
            forcedCost: computeCost(problem.machines, forcedAllocation),
        };
    }

    return { status: "solvable", totalCapacity: capacity, demand, excessCapacity: capacity - demand };
}
