/**
 * Shared arithmetic for the optimization engine
 */

export function roundTo(value: number, decimals: number): number {
    const factor = Math.pow(10, decimals);
    return Math.round(value * factor) / factor;
}

/**
 * Scale an amount observed over `days` to a 30-day month
 */
export function toMonthly(periodAmount: number, days: number): number {
    return days > 0 ? (periodAmount * 30) / days : 0;
}

/**
 * Map key for an (agent, model) group
 */
export function groupKey(agentName: string, model: string): string {
    return `${agentName}::${model}`;
}
