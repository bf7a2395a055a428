/**
 * Shared test fixtures.
 *
 * Four machines and a demand of 3000 units. Both greedy heuristics land on
 * Tool_2=800, Tool_6=1600, Tool_13=600 at $20,700; the true optimum is
 * Tool_6=1600, Tool_13=1400 at $19,300.
 */
import type { Machine, Problem } from "../../schemas/machine.js";

export const MACHINES: Machine[] = [
    { id: "Tool_2", capacity: 800, variableCost: 3, fixedCost: 3000 },
    { id: "Tool_6", capacity: 1600, variableCost: 3, fixedCost: 3000 },
    { id: "Tool_13", capacity: 2000, variableCost: 5, fixedCost: 4500 },
    { id: "Tool_25", capacity: 600, variableCost: 7, fixedCost: 2500 },
];

export function makeProblem(demand = 3000): Problem {
    return { machines: MACHINES.map((machine) => ({ ...machine })), demand };
}

export const GREEDY_ALLOCATION = { Tool_2: 800, Tool_6: 1600, Tool_13: 600, Tool_25: 0 };
export const GREEDY_COST = 20700;

export const OPTIMAL_ALLOCATION = { Tool_2: 0, Tool_6: 1600, Tool_13: 1400, Tool_25: 0 };
export const OPTIMAL_COST = 19300;

export const FIXED_CLOCK = () => new Date("2026-01-15T10:30:00");
