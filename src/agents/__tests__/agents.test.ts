import { describe, it, expect } from "vitest";
import { AllocatorAgent } from "../allocator.js";
import { buildReviewPanel } from "../reviewer.js";
import { StructuredAllocatorAgent } from "../structured-allocator.js";
import { EvaluatorAgent } from "../evaluator.js";
import { ReporterAgent } from "../reporter.js";
import { CALCULATOR_TOOL, ORACLE_TOOL } from "../tools.js";
import { loadKnowledgeBase } from "../profiles.js";
import { StructuredOutputError } from "../../errors/index.js";
import { ScriptedClient } from "../../__tests__/helpers/scripted-client.js";
import { OPTIMAL_ALLOCATION, makeProblem } from "../../__tests__/helpers/fixtures.js";

const problem = makeProblem();

describe("AllocatorAgent", () => {
    it("folds the proposal into an allocation and sends the run context", async () => {
        const client = new ScriptedClient().enqueue("Production Allocator", {
            value: {
                allocations: [
                    { machine_id: "Tool_6", units: 1000 },
                    { machine_id: "Tool_13", units: 1400 },
                    { machine_id: "Tool_6", units: 600 },
                ],
                total_cost: 19300,
                reasoning: "Two machines cover the demand.",
            },
            tokenUsage: 42,
        });

        const result = await new AllocatorAgent(client).propose(problem, {
            iteration: 2,
            previousAttempts: "Attempt 1: Tool_2=800 -> Cost: $5,400.00",
            reviewerFeedback: "No reviewer feedback available yet.",
        });

        expect(result.allocation).toEqual({ Tool_6: 1600, Tool_13: 1400 });
        expect(result.proposal.total_cost).toBe(19300);
        expect(result.tokenUsage).toBe(42);

        const [call] = client.calls;
        expect(call.method).toBe("generateObject");
        expect(call.temperature).toBe(0.4);
        expect(call.system.startsWith("You are the Production Allocator.")).toBe(true);
        const prompt = JSON.parse(call.prompt);
        expect(prompt.iteration).toBe(2);
        expect(prompt.previous_attempts).toBe("Attempt 1: Tool_2=800 -> Cost: $5,400.00");
        expect(prompt.machines).toHaveLength(4);
    });

    it("rejects a reply that breaks the schema", async () => {
        const client = new ScriptedClient().enqueue("Production Allocator", {
            value: { allocations: [{ machine_id: "Tool_6", units: -5 }], total_cost: 0, reasoning: "" },
        });
        await expect(new AllocatorAgent(client).propose(problem, {
            iteration: 1,
            previousAttempts: "No previous attempts",
            reviewerFeedback: "No reviewer feedback available yet.",
        })).rejects.toThrow(StructuredOutputError);
    });
});

describe("buildReviewPanel", () => {
    it("builds the five experts in panel mode", () => {
        const panel = buildReviewPanel("panel", new ScriptedClient());
        expect(panel.map((reviewer) => reviewer.name)).toEqual([
            "Cost Expert",
            "Efficiency Expert",
            "Variable Cost Expert",
            "Fixed Cost Expert",
            "Batch Optimization Expert",
        ]);
    });

    it("gives the strategist its knowledge base", async () => {
        const client = new ScriptedClient().enqueue("Optimization Strategist", {
            value: {
                assessment_rating: "optimal",
                key_recommendations: [],
                concerns: [],
                applied_strategies: ["Compare active sets"],
            },
        });
        const panel = buildReviewPanel("strategist", client, "Strategy A: switch machines off.");
        expect(panel).toHaveLength(1);

        const review = await panel[0].review(problem, {
            allocation: OPTIMAL_ALLOCATION,
            totalCost: 19300,
            reasoning: "Two machines.",
        });

        expect(review.feedback.assessment_rating).toBe("optimal");
        const [call] = client.calls;
        expect(call.system).toContain("Your knowledge base:\n\nStrategy A: switch machines off.");
        const prompt = JSON.parse(call.prompt);
        expect(prompt.total_cost).toBe(19300);
        expect(prompt.allocator_reasoning).toBe("Two machines.");
        expect(prompt.allocation).toContainEqual({ machine_id: "Tool_13", units: 1400 });
    });

    it("loads the bundled knowledge base", async () => {
        const knowledge = await loadKnowledgeBase();
        expect(knowledge.startsWith("# Manufacturing Allocation Strategies")).toBe(true);
    });
});

describe("StructuredAllocatorAgent", () => {
    it("offers the calculator and reports the tools it used", async () => {
        const client = new ScriptedClient().enqueue("Structured Output Allocator", {
            value: {
                strategy_name: "Two machines",
                machine_allocations: [
                    { machine_id: "Tool_6", units: 1600 },
                    { machine_id: "Tool_13", units: 1400 },
                ],
                total_variable_cost: 11800,
                total_fixed_cost: 7500,
                total_cost: 19300,
                reasoning: "Priced with the calculator.",
            },
            toolCalls: [CALCULATOR_TOOL],
        });

        const result = await new StructuredAllocatorAgent(client).solve(problem, { maxSteps: 3 });

        expect(result.allocation).toEqual({ Tool_6: 1600, Tool_13: 1400 });
        expect(result.toolCalls).toEqual([CALCULATOR_TOOL]);
        expect(client.calls[0].tools).toEqual([CALCULATOR_TOOL]);
        expect(client.calls[0].maxSteps).toBe(3);
    });
});

describe("EvaluatorAgent", () => {
    it("offers the optimiser and the calculator", async () => {
        const client = new ScriptedClient().enqueue("Allocation Evaluator", {
            value: "The allocation is optimal.",
            toolCalls: [ORACLE_TOOL],
        });

        const result = await new EvaluatorAgent(client).evaluate(problem, OPTIMAL_ALLOCATION);

        expect(result.text).toBe("The allocation is optimal.");
        expect(result.toolCalls).toEqual([ORACLE_TOOL]);
        expect(client.calls[0].tools).toEqual([ORACLE_TOOL, CALCULATOR_TOOL]);
        expect(JSON.parse(client.calls[0].prompt).proposed_allocation).toHaveLength(4);
    });
});

describe("ReporterAgent", () => {
    it("returns the model's markdown", async () => {
        const client = new ScriptedClient().enqueue("Optimization Reporter", { value: "# Report", tokenUsage: 7 });
        const result = await new ReporterAgent(client).write({ total_cost: 19300 });
        expect(result).toEqual({ markdown: "# Report", tokenUsage: 7 });
        expect(client.calls[0].prompt).toBe('{"total_cost":19300}');
    });
});
