import { describe, it, expect } from "vitest";
import { checkFeasibility } from "../feasibility.js";
import { makeProblem } from "../../__tests__/helpers/fixtures.js";

describe("checkFeasibility", () => {
    it("is solvable when capacity exceeds demand", () => {
        expect(checkFeasibility(makeProblem(3000))).toEqual({
            status: "solvable",
            totalCapacity: 5000,
            demand: 3000,
            excessCapacity: 2000,
        });
    });

    it("forces every machine to capacity on an exact match", () => {
        const report = checkFeasibility(makeProblem(5000));
        expect(report.status).toBe("trivial");
        if (report.status !== "trivial") return;
        expect(report.forcedAllocation).toEqual({ Tool_2: 800, Tool_6: 1600, Tool_13: 2000, Tool_25: 600 });
        expect(report.forcedCost).toBe(34400);
    });

    it("is infeasible when capacity falls short", () => {
        expect(checkFeasibility(makeProblem(5001))).toEqual({
            status: "infeasible",
            totalCapacity: 5000,
            demand: 5001,
            shortfall: 1,
        });
    });

    describe("against a demand of 3000", () => {
        const machine = (id: string, capacity: number) => ({ id, capacity, variableCost: 4, fixedCost: 1000 });

        it("is infeasible at a capacity of 2900", () => {
            const report = checkFeasibility({ machines: [machine("A", 1000), machine("B", 1900)], demand: 3000 });
            expect(report).toEqual({ status: "infeasible", totalCapacity: 2900, demand: 3000, shortfall: 100 });
        });

        it("is trivial at a capacity of 3000", () => {
            const report = checkFeasibility({ machines: [machine("A", 1000), machine("B", 2000)], demand: 3000 });
            expect(report.status).toBe("trivial");
            if (report.status !== "trivial") return;
            expect(report.forcedAllocation).toEqual({ A: 1000, B: 2000 });
            expect(report.forcedCost).toBe(4 * 3000 + 2000);
        });

        it("is solvable at a capacity of 3800", () => {
            const report = checkFeasibility({
                machines: [machine("A", 1000), machine("B", 2000), machine("C", 800)],
                demand: 3000,
            });
            expect(report).toEqual({ status: "solvable", totalCapacity: 3800, demand: 3000, excessCapacity: 800 });
        });
    });
});
