import { describe, it, expect } from "vitest";
import { fullLoadUnitCost, greedyByUnitCost, greedyByVariableCost, solveExact } from "../solvers.js";
import { verifyAllocation } from "../verification.js";
import { InfeasibleProblemError, SearchSpaceTooLargeError } from "../../errors/index.js";
import {
    GREEDY_ALLOCATION,
    GREEDY_COST,
    MACHINES,
    OPTIMAL_ALLOCATION,
    OPTIMAL_COST,
    makeProblem,
} from "../../__tests__/helpers/fixtures.js";

describe("greedy heuristics", () => {
    it("fills by variable cost", () => {
        expect(greedyByVariableCost(makeProblem())).toEqual({ allocation: GREEDY_ALLOCATION, totalCost: GREEDY_COST });
    });

    it("fills by full-load unit cost", () => {
        expect(greedyByUnitCost(makeProblem())).toEqual({ allocation: GREEDY_ALLOCATION, totalCost: GREEDY_COST });
    });

    it("orders by full-load unit cost", () => {
        expect(MACHINES.map(fullLoadUnitCost).slice(0, 3)).toEqual([6.75, 4.875, 7.25]);
    });

    it("throws on an infeasible problem", () => {
        expect(() => greedyByVariableCost(makeProblem(6000))).toThrow(InfeasibleProblemError);
    });
});

describe("solveExact", () => {
    it("finds the optimum the heuristics miss", () => {
        expect(solveExact(makeProblem())).toEqual({ allocation: OPTIMAL_ALLOCATION, totalCost: OPTIMAL_COST });
    });

    it("prefers a single machine when it covers the demand", () => {
        const result = solveExact(makeProblem(1500));
        expect(result.allocation).toEqual({ Tool_2: 0, Tool_6: 1500, Tool_13: 0, Tool_25: 0 });
        expect(result.totalCost).toBe(7500);
    });

    it("refuses machine sets above the limit", () => {
        expect(() => solveExact(makeProblem(), { maxMachines: 3 })).toThrow(SearchSpaceTooLargeError);
    });

    it("caps the limit at what a subset mask can hold", () => {
        const machines = Array.from({ length: 31 }, (_, i) => ({
            id: `Tool_${i + 1}`,
            capacity: 100,
            variableCost: 1,
            fixedCost: 10,
        }));
        expect(() => solveExact({ machines, demand: 500 }, { maxMachines: 64 }))
            .toThrow("Exact search refused: 31 machines exceeds the limit of 30.");
    });

    it("throws on an infeasible problem", () => {
        expect(() => solveExact(makeProblem(6000))).toThrow(InfeasibleProblemError);
    });
});

describe("verifyAllocation", () => {
    it("does not call a greedy-matching allocation optimal", () => {
        const report = verifyAllocation(makeProblem(), GREEDY_ALLOCATION);
        expect(report.proposal.valid).toBe(true);
        expect(report.noWorseThanGreedy).toBe(true);
        expect(report.optimal).toBe(false);
        expect(report.savingsAvailable).toBe(1400);
    });

    it("confirms the optimum", () => {
        const report = verifyAllocation(makeProblem(), { Tool_6: 1600, Tool_13: 1400 });
        expect(report.optimal).toBe(true);
        expect(report.savingsAvailable).toBe(0);
        expect(report.optimum?.totalCost).toBe(OPTIMAL_COST);
    });

    it("reports an invalid proposal", () => {
        const report = verifyAllocation(makeProblem(), { Tool_6: 1600 });
        expect(report.proposal).toEqual({
            allocation: { Tool_6: 1600 },
            totalCost: 7800,
            valid: false,
            violation: "Invalid allocation: allocation supplies 1600 units but demand is 3000",
        });
        expect(report.noWorseThanGreedy).toBe(false);
        expect(report.optimal).toBe(false);
    });

    it("leaves optimality unknown when the search is refused", () => {
        const report = verifyAllocation(makeProblem(), OPTIMAL_ALLOCATION, { maxMachines: 3 });
        expect(report.optimum).toBeNull();
        expect(report.optimal).toBeNull();
        expect(report.savingsAvailable).toBeNull();
        expect(report.noWorseThanGreedy).toBe(true);
    });
});
