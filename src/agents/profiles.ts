/**
 * Agent Profiles — The role, goal and instructions of every agent, as data.
 *
 * Each profile is a plain record handed to the agent class that uses it.
 * Nothing here is interpreted at run time beyond being placed in the system
 * prompt; which schema an agent answers in is fixed by its class.
 */
import fs from "fs/promises";
import { fileURLToPath } from "url";

export type ExpertId =
    | "cost_expert"
    | "efficiency_expert"
    | "variable_cost_expert"
    | "fixed_cost_expert"
    | "batch_optimization_expert";

export type AgentId =
    | "allocator"
    | ExpertId
    | "optimization_strategist"
    | "structured_allocator"
    | "evaluator"
    | "reporter";

export interface AgentProfile {
    id: AgentId;
    /** Display name, also used as the reviewer name in feedback. */
    role: string;
    goal: string;
    instructions: string;
    temperature: number;
}

const REVIEW_INSTRUCTIONS =
    "Review the proposed allocation against the machine data. Rate it poor, acceptable, good or optimal. "
    + "Only rate it optimal if you cannot find any cheaper feasible allocation. "
    + "Give at most three concrete recommendations that name machines and unit counts.";

export const AGENT_PROFILES = {
    allocator: {
        id: "allocator",
        role: "Production Allocator",
        goal: "Allocate the full product demand across the available machines at the lowest total cost.",
        instructions:
            "Reason step by step. Total cost is the sum over machines with units > 0 of "
            + "(variable_cost × units + fixed_cost). The allocation must sum exactly to the demand and no machine "
            + "may exceed its capacity. Learn from previous attempts and reviewer feedback; never repeat an "
            + "allocation that was already tried unless the feedback says it is optimal.",
        temperature: 0.4,
    },
    cost_expert: {
        id: "cost_expert",
        role: "Cost Expert",
        goal: "Minimise the total cost of the allocation.",
        instructions: `Focus on the total cost and the cheapest feasible alternative you can find. ${REVIEW_INSTRUCTIONS}`,
        temperature: 0.3,
    },
    efficiency_expert: {
        id: "efficiency_expert",
        role: "Efficiency Expert",
        goal: "Maximise machine utilisation and avoid idle paid capacity.",
        instructions: `Focus on machines that are activated but lightly loaded. ${REVIEW_INSTRUCTIONS}`,
        temperature: 0.3,
    },
    variable_cost_expert: {
        id: "variable_cost_expert",
        role: "Variable Cost Expert",
        goal: "Minimise the per-unit production cost.",
        instructions: `Focus on whether units sit on machines with a higher variable cost than necessary. ${REVIEW_INSTRUCTIONS}`,
        temperature: 0.3,
    },
    fixed_cost_expert: {
        id: "fixed_cost_expert",
        role: "Fixed Cost Expert",
        goal: "Minimise activation costs by running as few machines as possible.",
        instructions: `Focus on whether any activated machine could be switched off entirely. ${REVIEW_INSTRUCTIONS}`,
        temperature: 0.3,
    },
    batch_optimization_expert: {
        id: "batch_optimization_expert",
        role: "Batch Optimization Expert",
        goal: "Balance batch sizes against setup costs.",
        instructions: `Focus on small remainders that pay a full setup cost for a short run. ${REVIEW_INSTRUCTIONS}`,
        temperature: 0.3,
    },
    optimization_strategist: {
        id: "optimization_strategist",
        role: "Optimization Strategist",
        goal: "Judge allocations with a knowledge base of proven optimisation strategies.",
        instructions:
            "Apply the strategies in your knowledge base and list the ones you used in applied_strategies. "
            + REVIEW_INSTRUCTIONS,
        temperature: 0.3,
    },
    structured_allocator: {
        id: "structured_allocator",
        role: "Structured Output Allocator",
        goal: "Produce one allocation with an exact cost breakdown.",
        instructions:
            "You MUST use the manufacturing_cost_calculator tool for every cost figure you report. "
            + "Do not calculate costs yourself. Report the tool's totals unchanged.",
        temperature: 0.2,
    },
    evaluator: {
        id: "evaluator",
        role: "Allocation Evaluator",
        goal: "Compare an allocation with the mathematically optimal one.",
        instructions:
            "Call the exact_optimizer tool to obtain the optimal allocation, and the manufacturing_cost_calculator "
            + "tool to check the proposed allocation's cost. Report both costs, the gap, and concrete changes.",
        temperature: 0.2,
    },
    reporter: {
        id: "reporter",
        role: "Optimization Reporter",
        goal: "Explain an optimisation run to a plant manager.",
        instructions:
            "Write a markdown report with an executive summary, the final allocation as a table, a cost analysis, "
            + "the optimisation journey iteration by iteration, why the run stopped, and recommendations. "
            + "Use only the figures provided; do not invent numbers.",
        temperature: 0.5,
    },
} as const satisfies Record<AgentId, AgentProfile>;

export const PANEL_EXPERTS: readonly ExpertId[] = [
    "cost_expert",
    "efficiency_expert",
    "variable_cost_expert",
    "fixed_cost_expert",
    "batch_optimization_expert",
];

/** Role, goal and instructions as one system prompt, plus any extra sections. */
export function systemPromptFor(profile: AgentProfile, ...sections: string[]): string {
    return [
        `You are the ${profile.role}.`,
        `Goal: ${profile.goal}`,
        profile.instructions,
        ...sections.filter((section) => section.trim() !== ""),
    ].join("\n\n");
}

export const DEFAULT_KNOWLEDGE_BASE_PATH = fileURLToPath(
    new URL("../../knowledge/optimization-strategies.md", import.meta.url),
);

/** Read the strategist's knowledge base. */
export async function loadKnowledgeBase(filePath: string = DEFAULT_KNOWLEDGE_BASE_PATH): Promise<string> {
    return fs.readFile(filePath, "utf-8");
}
