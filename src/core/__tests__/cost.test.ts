import { describe, it, expect } from "vitest";
import { costBreakdown, evaluateCost, findViolation, roundCurrency, totalCapacity } from "../cost.js";
import { InvalidAllocationError } from "../../errors/index.js";
import { MACHINES, OPTIMAL_ALLOCATION, makeProblem } from "../../__tests__/helpers/fixtures.js";

describe("evaluateCost", () => {
    it("prices a valid allocation line by line", () => {
        const cost = evaluateCost(makeProblem(), OPTIMAL_ALLOCATION);

        expect(cost.totalVariableCost).toBe(11800);
        expect(cost.totalFixedCost).toBe(7500);
        expect(cost.totalCost).toBe(19300);
        expect(cost.lines).toEqual([
            { machineId: "Tool_6", units: 1600, variableCost: 4800, fixedCost: 3000, total: 7800 },
            { machineId: "Tool_13", units: 1400, variableCost: 7000, fixedCost: 4500, total: 11500 },
        ]);
    });

    it("charges no fixed cost for idle machines", () => {
        const cost = evaluateCost(makeProblem(600), { Tool_25: 600, Tool_2: 0 });
        expect(cost.totalCost).toBe(7 * 600 + 2500);
    });

    it("throws on a capacity violation", () => {
        expect(() => evaluateCost(makeProblem(), { Tool_6: 2000, Tool_13: 1000 })).toThrow(InvalidAllocationError);
    });
});

describe("findViolation", () => {
    const problem = makeProblem();

    it("returns null for a valid allocation", () => {
        expect(findViolation(problem, OPTIMAL_ALLOCATION)).toBeNull();
    });

    it("reports unknown machines first", () => {
        const violation = findViolation(problem, { Tool_99: 3000 });
        expect(violation?.machineId).toBe("Tool_99");
        expect(violation?.message).toBe('Invalid allocation: unknown machine "Tool_99"');
    });

    it("reports capacity before demand", () => {
        const violation = findViolation(problem, { Tool_25: 700 });
        expect(violation?.message).toBe("Invalid allocation: machine Tool_25 allocated 700 units but capacity is only 600");
    });

    it("rejects fractional units", () => {
        const violation = findViolation(problem, { Tool_6: 1600, Tool_13: 1399.5, Tool_2: 0.5 });
        expect(violation?.machineId).toBe("Tool_13");
    });

    it("reports a demand mismatch", () => {
        const violation = findViolation(problem, { Tool_6: 1600 });
        expect(violation?.message).toBe("Invalid allocation: allocation supplies 1600 units but demand is 3000");
        expect(violation?.machineId).toBeUndefined();
    });
});

describe("helpers", () => {
    it("sums capacity", () => {
        expect(totalCapacity(MACHINES)).toBe(5000);
    });

    it("rounds to cents", () => {
        expect(roundCurrency(10.005 + 0.001)).toBe(10.01);
        expect(roundCurrency(0.1 + 0.2)).toBe(0.3);
    });

    it("ignores machines it does not know when unchecked", () => {
        expect(costBreakdown(MACHINES, { Tool_99: 5, Tool_2: 10 }).totalCost).toBe(3030);
    });
});
