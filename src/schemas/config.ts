/**
 * Optimizer Configuration — All tunable parameters in one place.
 */
import { z } from "zod/v4";

export const PanelMode = z.enum(["panel", "strategist"]);
export type PanelMode = z.infer<typeof PanelMode>;

/**
 * The single configuration object controlling the optimisation loop.
 * Callers pass this to `runOptimization()`; the CLI builds it from `--config`.
 */
export const OptimizerConfig = z.object({
    // --- Convergence ---
    /** Hard stop: iterations never exceed this. */
    max_iterations: z.number().int().min(1).default(5),
    /** Iterations always run before cost or approval criteria may stop the loop. */
    min_iterations: z.number().int().min(1).default(2),
    /** Stop when (previous - current) / previous falls below this. */
    cost_improvement_threshold: z.number().min(0).default(0.02),
    /** Stop when at least this many reviewers rate the allocation good or optimal. */
    approval_threshold: z.number().int().min(1).default(3),

    // --- Review panel ---
    /** "panel" runs five experts, "strategist" a single knowledge-based reviewer. */
    panel_mode: PanelMode.default("panel"),
    /** Reviewers evaluated at once. 1 reproduces a strictly sequential panel. */
    max_concurrency: z.number().int().min(1).default(5),

    // --- Tools & benchmarks ---
    /** Exhaustive search is refused above this many machines. */
    exact_search_max_machines: z.number().int().min(1).max(24).default(16),
    /** Model/tool round-trips allowed for a tool-using agent. */
    tool_max_steps: z.number().int().min(1).default(5),

    // --- Output ---
    reports_dir: z.string().default("reports"),
});
export type OptimizerConfig = z.infer<typeof OptimizerConfig>;
