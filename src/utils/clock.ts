/** Millisecond time source; injected where tests need to move time */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();
