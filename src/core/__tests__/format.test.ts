import { describe, it, expect } from "vitest";
import { displayTimestamp, fileTimestamp, formatAllocation, formatCurrency, formatUnits } from "../format.js";

describe("format", () => {
    it("formats currency with cents", () => {
        expect(formatCurrency(19300)).toBe("$19,300.00");
        expect(formatCurrency(0.5)).toBe("$0.50");
    });

    it("formats units with separators", () => {
        expect(formatUnits(3000)).toBe("3,000");
    });

    it("formats allocations in insertion order", () => {
        expect(formatAllocation({ Tool_6: 1600, Tool_2: 0 })).toBe("Tool_6=1600, Tool_2=0");
        expect(formatAllocation({})).toBe("(empty)");
    });

    it("formats timestamps in local time", () => {
        const date = new Date(2026, 0, 5, 9, 3, 7);
        expect(fileTimestamp(date)).toBe("20260105_090307");
        expect(displayTimestamp(date)).toBe("2026-01-05 09:03:07");
    });
});
