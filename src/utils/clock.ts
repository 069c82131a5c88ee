/**
 * Time source injected wherever behavior depends on elapsed time, so tests
 * can drive it.
 */
export interface Clock {
    now() : number;
}

export type Sleep = (ms : number) => Promise<void>;

export const systemClock : Clock = {
    now : () => Date.now(),
};

export const sleep : Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));
