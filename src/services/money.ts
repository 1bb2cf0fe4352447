//cent rounding shared by the store, the oracle and the grader

export const round2 = (n: number): number => Math.round(n * 100) / 100;

//smallest cent amount not below n, tolerant of float noise (125.00000000001 → 125)
export const ceil2 = (n: number): number => Math.ceil(n * 100 - 1e-6) / 100;

export const formatMoney = (n: number): string => `$${n.toFixed(2)}`;

export const formatPercent = (ratio: number): string => `${(ratio * 100).toFixed(1)}%`;
