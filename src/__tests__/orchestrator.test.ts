import { describe, it, expect, vi } from "vitest";
import { runOptimization, FALLBACK_REASONING, bestRecord, improvementPercent } from "../orchestrator.js";
import { AllocatorAgent } from "../agents/allocator.js";
import { buildReviewPanel } from "../agents/reviewer.js";
import { InfeasibleProblemError } from "../errors/index.js";
import type { AssessmentRating } from "../schemas/agents.js";
import { ScriptedClient } from "./helpers/scripted-client.js";
import type { ScriptedReply } from "./helpers/scripted-client.js";
import { FIXED_CLOCK, GREEDY_ALLOCATION, OPTIMAL_ALLOCATION, makeProblem } from "./helpers/fixtures.js";

const PANEL = [
    "Cost Expert",
    "Efficiency Expert",
    "Variable Cost Expert",
    "Fixed Cost Expert",
    "Batch Optimization Expert",
];

function proposal(allocation: Record<string, number>, totalCost: number): ScriptedReply {
    return {
        value: {
            allocations: Object.entries(allocation).map(([machine_id, units]) => ({ machine_id, units })),
            total_cost: totalCost,
            reasoning: `Proposed at ${totalCost}`,
        },
    };
}

function rating(assessment_rating: AssessmentRating, recommendation = "Keep Tool_6 full"): ScriptedReply {
    return {
        value: {
            assessment_rating,
            key_recommendations: [recommendation],
            concerns: [],
            applied_strategies: [],
        },
    };
}

describe("runOptimization", () => {
    it("iterates until the panel approves and keeps the cheapest allocation", async () => {
        const client = new ScriptedClient()
            .enqueue("Production Allocator", proposal(GREEDY_ALLOCATION, 20700), proposal(OPTIMAL_ALLOCATION, 19300));
        const secondRound: AssessmentRating[] = ["good", "good", "optimal", "acceptable", "acceptable"];
        PANEL.forEach((role, i) => client.enqueue(role, rating("acceptable"), rating(secondRound[i])));

        const iterations: number[] = [];
        const result = await runOptimization({
            problem: makeProblem(),
            allocator: new AllocatorAgent(client),
            reviewers: buildReviewPanel("panel", client),
            now: FIXED_CLOCK,
            onIterationComplete: (record) => iterations.push(record.iteration),
        });

        expect(iterations).toEqual([1, 2]);
        expect(result.convergenceReason).toBe("approval_threshold_reached");
        expect(result.totalIterations).toBe(2);
        expect(result.bestIteration).toBe(2);
        expect(result.finalAllocation).toEqual(OPTIMAL_ALLOCATION);
        expect(result.finalCost.totalCost).toBe(19300);
        expect(result.improvementPercent).toBeCloseTo((1400 / 20700) * 100, 10);
        expect(result.tokenUsage).toBe(120);
        expect(result.durationMs).toBe(0);
        expect(result.runId).toMatch(/^[0-9a-f-]{36}$/);

        const [first, second] = result.history;
        expect(first.decision.reason).toBe("minimum_iterations");
        expect(first.approvals).toBe(0);
        expect(second.approvals).toBe(3);
        expect(second.feedback.map((entry) => entry.reviewer)).toEqual(PANEL);

        const secondPrompt = JSON.parse(client.callsFor("Production Allocator")[1].prompt);
        expect(secondPrompt.previous_attempts)
            .toBe("Attempt 1: Tool_2=800, Tool_6=1600, Tool_13=600, Tool_25=0 -> Cost: $20,700.00");
        expect(secondPrompt.reviewer_feedback.split("\n")).toHaveLength(5);
        expect(secondPrompt.reviewer_feedback.split("\n")[0])
            .toBe("Cost Expert says: acceptable - RECOMMENDS: Keep Tool_6 full");
    });

    it("falls back to the greedy allocation when the allocator fails", async () => {
        const client = new ScriptedClient()
            .enqueue("Production Allocator", { error: new Error("rate limited") })
            .enqueue("Optimization Strategist", rating("good"));
        const onAgentError = vi.fn();

        const result = await runOptimization({
            problem: makeProblem(),
            allocator: new AllocatorAgent(client),
            reviewers: buildReviewPanel("strategist", client, "Knowledge"),
            config: { max_iterations: 1 },
            now: FIXED_CLOCK,
            onAgentError,
        });

        expect(onAgentError).toHaveBeenCalledTimes(1);
        expect(onAgentError.mock.calls[0][0]).toBe("allocator");
        expect(result.convergenceReason).toBe("max_iterations_reached");

        const [record] = result.history;
        expect(record.source).toBe("fallback");
        expect(record.proposedAllocation).toBeNull();
        expect(record.reportedCost).toBeNull();
        expect(record.reasoning).toBe(FALLBACK_REASONING);
        expect(record.allocation).toEqual(GREEDY_ALLOCATION);
        expect(record.cost.totalCost).toBe(20700);
    });

    it("lets a single strategist approve on its own", async () => {
        const client = new ScriptedClient()
            .enqueue("Production Allocator", proposal(GREEDY_ALLOCATION, 20700), proposal(OPTIMAL_ALLOCATION, 19300))
            .enqueue("Optimization Strategist", rating("poor"), rating("optimal"));

        const result = await runOptimization({
            problem: makeProblem(),
            allocator: new AllocatorAgent(client),
            reviewers: buildReviewPanel("strategist", client, "Knowledge"),
            now: FIXED_CLOCK,
        });

        expect(result.convergenceReason).toBe("approval_threshold_reached");
        expect(result.history.map((record) => record.approvals)).toEqual([0, 1]);
    });

    it("stands in neutral feedback for a failing reviewer", async () => {
        const client = new ScriptedClient()
            .enqueue("Production Allocator", proposal(OPTIMAL_ALLOCATION, 19300));
        PANEL.slice(0, 4).forEach((role) => client.enqueue(role, rating("good")));
        const failed: string[] = [];

        const result = await runOptimization({
            problem: makeProblem(),
            allocator: new AllocatorAgent(client),
            reviewers: buildReviewPanel("panel", client),
            config: { max_iterations: 1 },
            now: FIXED_CLOCK,
            onAgentError: (agent) => failed.push(agent),
        });

        expect(failed).toEqual(["Batch Optimization Expert"]);
        const feedback = result.history[0].feedback;
        expect(feedback[4]).toEqual({
            reviewer: "Batch Optimization Expert",
            assessment_rating: "acceptable",
            key_recommendations: ["Review allocation"],
            concerns: ["Expert evaluation failed"],
            applied_strategies: [],
            failed: true,
        });
        expect(result.history[0].approvals).toBe(4);
    });

    it("repairs proposals and reports the adjustments", async () => {
        const client = new ScriptedClient()
            .enqueue("Production Allocator", proposal({ Tool_6: 2000, Tool_13: 1400 }, 18000))
            .enqueue("Optimization Strategist", rating("acceptable"));
        const adjustments: Array<[number, string[]]> = [];

        const result = await runOptimization({
            problem: makeProblem(),
            allocator: new AllocatorAgent(client),
            reviewers: buildReviewPanel("strategist", client, "Knowledge"),
            config: { max_iterations: 1 },
            now: FIXED_CLOCK,
            onAdjustment: (iteration, lines) => adjustments.push([iteration, lines]),
        });

        expect(adjustments).toEqual([[1, ["Tool_6: 2000 > 1600 (capacity), clamped"]]]);
        const [record] = result.history;
        expect(record.proposedAllocation).toEqual({ Tool_6: 2000, Tool_13: 1400 });
        expect(record.reportedCost).toBe(18000);
        expect(record.allocation).toEqual(OPTIMAL_ALLOCATION);
        expect(record.cost.totalCost).toBe(19300);
    });

    it("does not blame the allocator when the adjustment observer throws", async () => {
        const client = new ScriptedClient()
            .enqueue("Production Allocator", proposal({ Tool_6: 2000, Tool_13: 1400 }, 18000))
            .enqueue("Optimization Strategist", rating("acceptable"));
        const failed: string[] = [];

        await expect(runOptimization({
            problem: makeProblem(),
            allocator: new AllocatorAgent(client),
            reviewers: buildReviewPanel("strategist", client, "Knowledge"),
            config: { max_iterations: 1 },
            now: FIXED_CLOCK,
            onAdjustment: () => {
                throw new Error("display failed");
            },
            onAgentError: (agent) => failed.push(agent),
        })).rejects.toThrow("display failed");

        expect(failed).toEqual([]);
        expect(client.callsFor("Production Allocator")).toHaveLength(1);
    });

    it("stops on a cost plateau and prefers the earliest best iteration", async () => {
        const client = new ScriptedClient()
            .enqueue("Production Allocator", proposal(OPTIMAL_ALLOCATION, 19300), proposal({ Tool_13: 1400, Tool_6: 1600 }, 19300))
            .enqueue("Optimization Strategist", rating("acceptable"), rating("acceptable"));

        const result = await runOptimization({
            problem: makeProblem(),
            allocator: new AllocatorAgent(client),
            reviewers: buildReviewPanel("strategist", client, "Knowledge"),
            now: FIXED_CLOCK,
        });

        expect(result.convergenceReason).toBe("cost_improvement_below_threshold");
        expect(result.bestIteration).toBe(1);
        expect(result.improvementPercent).toBe(0);
    });

    it("throws on an infeasible problem without calling the model", async () => {
        const client = new ScriptedClient();
        await expect(runOptimization({
            problem: makeProblem(5001),
            allocator: new AllocatorAgent(client),
            reviewers: buildReviewPanel("panel", client),
        })).rejects.toThrow(InfeasibleProblemError);
        expect(client.calls).toHaveLength(0);
    });

    it("answers an exact capacity match without iterating", async () => {
        const client = new ScriptedClient();
        const phases: string[] = [];
        const result = await runOptimization({
            problem: makeProblem(5000),
            allocator: new AllocatorAgent(client),
            reviewers: buildReviewPanel("panel", client),
            now: FIXED_CLOCK,
            onPhaseChange: (phase) => phases.push(phase),
        });

        expect(result.convergenceReason).toBe("exact_capacity_match");
        expect(result.totalIterations).toBe(0);
        expect(result.bestIteration).toBe(0);
        expect(result.finalCost.totalCost).toBe(34400);
        expect(result.history).toEqual([]);
        expect(client.calls).toHaveLength(0);
        expect(phases[0]).toBe("Feasibility check");
    });
});

describe("helpers", () => {
    it("computes the improvement percentage", () => {
        expect(improvementPercent(20000, 15000)).toBe(25);
        expect(improvementPercent(0, 0)).toBe(0);
    });

    it("finds no best record in an empty history", () => {
        expect(bestRecord([])).toBeUndefined();
    });
});
