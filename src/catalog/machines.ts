/**
 * Machine Catalog — Loads the machine table and picks the machines for a run.
 *
 * The catalog is a CSV with one row per machine:
 *
 *   Tool_ID,fixed_cost,variable_cost,capacity
 *   6,3000,3,1600
 *
 * Column order is free; rows become machines named `Tool_<Tool_ID>`.
 */
import fs from "fs/promises";
import { z } from "zod/v4";
import { Machine, Problem } from "../schemas/machine.js";
import { CatalogFormatError, MachineSelectionError } from "../errors/index.js";

const REQUIRED_COLUMNS = ["Tool_ID", "fixed_cost", "variable_cost", "capacity"] as const;

const CatalogRow = z.object({
    Tool_ID: z.string().min(1),
    fixed_cost: z.coerce.number().min(0),
    variable_cost: z.coerce.number().min(0),
    capacity: z.coerce.number().int().min(0),
});

/** Either explicit tool ids (`[2, 6]`, `["Tool_13"]`) or a random sample size. */
export type MachineSelection = ReadonlyArray<string | number> | number;

export function machineIdFor(toolId: string | number): string {
    const text = String(toolId).trim();
    return text.startsWith("Tool_") ? text : `Tool_${text}`;
}

export function parseMachineCatalog(csv: string): Machine[] {
    const lines = csv.split(/\r?\n/);
    const headerIndex = lines.findIndex((line) => line.trim() !== "");
    if (headerIndex === -1) throw new CatalogFormatError(1, "catalog is empty");

    const header = lines[headerIndex].split(",").map((cell) => cell.trim());
    const columns = new Map(header.map((name, i) => [name, i]));
    for (const column of REQUIRED_COLUMNS) {
        if (!columns.has(column)) {
            throw new CatalogFormatError(headerIndex + 1, `missing column "${column}"`);
        }
    }

    const machines: Machine[] = [];
    const seen = new Set<string>();

    for (let i = headerIndex + 1; i < lines.length; i++) {
        const line = lines[i].trim();
        if (line === "") continue;
        const lineNumber = i + 1;
        const cells = line.split(",").map((cell) => cell.trim());

        const raw: Record<string, string> = {};
        for (const column of REQUIRED_COLUMNS) {
            const value = cells[columns.get(column) ?? -1];
            if (value === undefined || value === "") {
                throw new CatalogFormatError(lineNumber, `empty value for "${column}"`);
            }
            raw[column] = value;
        }

        const parsed = CatalogRow.safeParse(raw);
        if (!parsed.success) {
            const issue = parsed.error.issues[0];
            throw new CatalogFormatError(lineNumber, `${issue.path.join(".")}: ${issue.message}`);
        }

        const id = machineIdFor(parsed.data.Tool_ID);
        if (seen.has(id)) throw new CatalogFormatError(lineNumber, `duplicate tool id ${parsed.data.Tool_ID}`);
        seen.add(id);

        machines.push(Machine.parse({
            id,
            capacity: parsed.data.capacity,
            variableCost: parsed.data.variable_cost,
            fixedCost: parsed.data.fixed_cost,
        }));
    }

    return machines;
}

export async function loadMachineCatalog(filePath: string): Promise<Machine[]> {
    const content = await fs.readFile(filePath, "utf-8");
    return parseMachineCatalog(content);
}

/**
 * Pick machines from the catalog.
 *
 * An id list keeps catalog order and fails only if nothing matches. A count
 * draws that many distinct machines at random; it must be greater than 2.
 */
export function selectMachines(
    catalog: readonly Machine[],
    selection: MachineSelection,
    random: () => number = Math.random,
): Machine[] {
    if (typeof selection !== "number") {
        const wanted = new Set(selection.map(machineIdFor));
        const picked = catalog.filter((machine) => wanted.has(machine.id));
        if (picked.length === 0) {
            throw new MachineSelectionError(`no machines found with ids: ${selection.join(", ")}`);
        }
        return picked;
    }

    if (!Number.isInteger(selection) || selection <= 2) {
        throw new MachineSelectionError("selection must be a list of tool ids or an integer greater than 2");
    }
    if (selection > catalog.length) {
        throw new MachineSelectionError(`cannot select ${selection} machines, only ${catalog.length} available`);
    }

    // Partial Fisher–Yates: the first `selection` slots end up a uniform sample.
    const pool = [...catalog];
    for (let i = 0; i < selection; i++) {
        const j = i + Math.floor(random() * (pool.length - i));
        [pool[i], pool[j]] = [pool[j], pool[i]];
    }
    return pool.slice(0, selection);
}

export function buildProblem(machines: readonly Machine[], demand: number): Problem {
    return Problem.parse({ machines, demand });
}

export interface FeasibleSelection {
    machines: Machine[];
    /** The random pick lacked capacity and the fallback ids were used. */
    usedFallback: boolean;
}

/**
 * Draw `count` machines at random; if together they cannot cover the demand,
 * use the fallback ids instead.
 */
export function pickFeasibleMachines(
    catalog: readonly Machine[],
    options: { count: number; demand: number; fallbackIds: ReadonlyArray<string | number>; random?: () => number },
): FeasibleSelection {
    const machines = selectMachines(catalog, options.count, options.random);
    const capacity = machines.reduce((sum, machine) => sum + machine.capacity, 0);
    if (capacity >= options.demand || options.fallbackIds.length === 0) {
        return { machines, usedFallback: false };
    }
    return { machines: selectMachines(catalog, options.fallbackIds), usedFallback: true };
}
