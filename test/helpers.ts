import { Candidate, Winner } from "../src/types";
import { isTie } from "../src/utils/tally";

// Tied winners come back in tally order; sort them so tests can compare directly.
export function tied<C extends Candidate>(winner: Winner<C>): C[] {
    if (!isTie(winner)) throw new Error(`Expected a tie but got ${String(winner)}`);
    return [...winner].sort();
}

// Yields the items a single time, like a stream that cannot be rewound.
export function* once<T>(items: Iterable<T>): Generator<T> {
    yield* items;
}

export function repeat<T>(value: T, times: number): T[] {
    return Array.from({ length: times }, () => value);
}
