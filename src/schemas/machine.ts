/**
 * Problem Schemas — Machines, demand and allocations.
 * @see README.md §Cost model
 */
import { z } from "zod/v4";

/**
 * A production machine. Immutable for the duration of a run.
 * The fixed cost is incurred once, and only when the machine is allocated any units.
 */
export const Machine = z.object({
    id: z.string().min(1),
    /** Maximum units this machine can produce. */
    capacity: z.number().int().min(0),
    /** Currency per unit produced. */
    variableCost: z.number().min(0),
    /** Activation cost, paid once if the machine runs at all. */
    fixedCost: z.number().min(0),
});
export type Machine = z.infer<typeof Machine>;

/**
 * Units per machine id. A valid allocation sums exactly to the demand
 * and never exceeds a machine's capacity; see `evaluateCost()`.
 */
export const Allocation = z.record(z.string(), z.number().int().min(0));
export type Allocation = z.infer<typeof Allocation>;

/** A machine set plus the demand it must cover. */
export const Problem = z.object({
    machines: z.array(Machine).min(1)
        .superRefine((machines, ctx) => {
            const seen = new Set<string>();
            machines.forEach((machine, i) => {
                if (seen.has(machine.id)) {
                    ctx.addIssue({
                        code: "custom",
                        message: `Duplicate machine id: ${machine.id}`,
                        path: [i, "id"],
                    });
                }
                seen.add(machine.id);
            });
        }),
    demand: z.number().int().positive(),
});
export type Problem = z.infer<typeof Problem>;
