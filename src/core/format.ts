/**
 * Formatting helpers shared by agent prompts, reports and the CLI.
 */
import type { Allocation } from "../schemas/machine.js";

const currency = new Intl.NumberFormat("en-US", {
    style: "currency",
    currency: "USD",
    minimumFractionDigits: 2,
    maximumFractionDigits: 2,
});

const integer = new Intl.NumberFormat("en-US", { maximumFractionDigits: 0 });

/** `19300` → `$19,300.00` */
export function formatCurrency(value: number): string {
    return currency.format(value);
}

/** `3000` → `3,000` */
export function formatUnits(value: number): string {
    return integer.format(value);
}

/** `{ Tool_6: 1600, Tool_2: 0 }` → `Tool_6=1600, Tool_2=0` */
export function formatAllocation(allocation: Allocation): string {
    const entries = Object.entries(allocation);
    if (entries.length === 0) return "(empty)";
    return entries.map(([machineId, units]) => `${machineId}=${units}`).join(", ");
}

function pad(value: number): string {
    return String(value).padStart(2, "0");
}

/** Local time as `YYYYMMDD_HHMMSS`, for file names. */
export function fileTimestamp(date: Date): string {
    return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`
        + `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}

/** Local time as `YYYY-MM-DD HH:MM:SS`, for report headers. */
export function displayTimestamp(date: Date): string {
    return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`
        + ` ${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}
