export const isoNow = (): string => new Date().toISOString();

/** Current wall-clock time in whole unix seconds. */
export const unixNow = (): number => Math.floor(Date.now() / 1000);

export type Clock = () => number;
