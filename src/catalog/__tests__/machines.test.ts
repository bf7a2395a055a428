import { describe, it, expect } from "vitest";
import { fileURLToPath } from "url";
import {
    buildProblem,
    loadMachineCatalog,
    machineIdFor,
    parseMachineCatalog,
    pickFeasibleMachines,
    selectMachines,
} from "../machines.js";
import { CatalogFormatError, MachineSelectionError } from "../../errors/index.js";
import { MACHINES } from "../../__tests__/helpers/fixtures.js";

const HEADER = "Tool_ID,fixed_cost,variable_cost,capacity";

describe("parseMachineCatalog", () => {
    it("parses rows into machines and skips blank lines", () => {
        const machines = parseMachineCatalog(`${HEADER}\n6,3000,3,1600\n\n13,4500,5,2000\n`);
        expect(machines).toEqual([
            { id: "Tool_6", capacity: 1600, variableCost: 3, fixedCost: 3000 },
            { id: "Tool_13", capacity: 2000, variableCost: 5, fixedCost: 4500 },
        ]);
    });

    it("accepts columns in any order", () => {
        const machines = parseMachineCatalog("capacity,Tool_ID,variable_cost,fixed_cost\r\n800,2,3,3000");
        expect(machines).toEqual([{ id: "Tool_2", capacity: 800, variableCost: 3, fixedCost: 3000 }]);
    });

    it("rejects a missing column", () => {
        expect(() => parseMachineCatalog("Tool_ID,fixed_cost,variable_cost\n6,3000,3"))
            .toThrow('Machine catalog line 1: missing column "capacity"');
    });

    it("rejects an empty cell with its file line", () => {
        expect(() => parseMachineCatalog(`${HEADER}\n6,3000,3,1600\n13,,5,2000`))
            .toThrow('Machine catalog line 3: empty value for "fixed_cost"');
    });

    it("rejects a value that is not a number", () => {
        expect(() => parseMachineCatalog(`${HEADER}\n6,abc,3,1600`)).toThrow(CatalogFormatError);
        expect(() => parseMachineCatalog(`${HEADER}\n6,abc,3,1600`)).toThrow("Machine catalog line 2: fixed_cost");
    });

    it("rejects duplicate ids", () => {
        expect(() => parseMachineCatalog(`${HEADER}\n6,3000,3,1600\n6,1,1,1`))
            .toThrow("Machine catalog line 3: duplicate tool id 6");
    });

    it("rejects an empty file", () => {
        expect(() => parseMachineCatalog("\n\n")).toThrow(CatalogFormatError);
    });
});

describe("loadMachineCatalog", () => {
    it("loads the bundled catalog", async () => {
        const catalogPath = fileURLToPath(new URL("../../../input/allocation_tools.csv", import.meta.url));
        const machines = await loadMachineCatalog(catalogPath);
        expect(machines).toHaveLength(30);
        expect(machines.find((machine) => machine.id === "Tool_13")).toEqual(
            { id: "Tool_13", capacity: 2000, variableCost: 5, fixedCost: 4500 },
        );
    });
});

describe("machineIdFor", () => {
    it("prefixes bare ids only", () => {
        expect(machineIdFor(6)).toBe("Tool_6");
        expect(machineIdFor(" 6 ")).toBe("Tool_6");
        expect(machineIdFor("Tool_6")).toBe("Tool_6");
    });
});

describe("selectMachines", () => {
    it("keeps catalog order for an id list and ignores unknown ids", () => {
        const picked = selectMachines(MACHINES, [13, "Tool_2", 99]);
        expect(picked.map((machine) => machine.id)).toEqual(["Tool_2", "Tool_13"]);
    });

    it("fails when no id matches", () => {
        expect(() => selectMachines(MACHINES, [99])).toThrow("Machine selection failed: no machines found with ids: 99");
    });

    it("requires a count greater than 2 and within the catalog", () => {
        expect(() => selectMachines(MACHINES, 2)).toThrow(MachineSelectionError);
        expect(() => selectMachines(MACHINES, 5)).toThrow("cannot select 5 machines, only 4 available");
    });

    it("draws a sample with the given random source", () => {
        expect(selectMachines(MACHINES, 3, () => 0).map((machine) => machine.id))
            .toEqual(["Tool_2", "Tool_6", "Tool_13"]);
        expect(selectMachines(MACHINES, 3, () => 0.99).map((machine) => machine.id))
            .toEqual(["Tool_25", "Tool_2", "Tool_6"]);
    });
});

describe("pickFeasibleMachines", () => {
    it("keeps a random pick that covers the demand", () => {
        const selection = pickFeasibleMachines(MACHINES, { count: 3, demand: 3000, fallbackIds: [2, 6], random: () => 0 });
        expect(selection.usedFallback).toBe(false);
        expect(selection.machines).toHaveLength(3);
    });

    it("uses the fallback ids when the pick lacks capacity", () => {
        const selection = pickFeasibleMachines(MACHINES, {
            count: 3,
            demand: 4500,
            fallbackIds: [2, 6, 13, 25],
            random: () => 0,
        });
        expect(selection.usedFallback).toBe(true);
        expect(selection.machines.map((machine) => machine.id)).toEqual(["Tool_2", "Tool_6", "Tool_13", "Tool_25"]);
    });
});

describe("buildProblem", () => {
    it("validates the demand", () => {
        expect(buildProblem(MACHINES, 3000).demand).toBe(3000);
        expect(() => buildProblem(MACHINES, 0)).toThrow();
    });
});
