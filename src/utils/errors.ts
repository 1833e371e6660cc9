/**
 * Thrown when a counter or constructor is called with a parameter outside its domain,
 * e.g. a Borda starting point other than 0 or 1.
 */
export class InvalidArgumentError extends Error {
    public readonly code = "invalid-argument";

    constructor(message: string) {
        super(message);
        this.name = "InvalidArgumentError";
    }
}

/** Thrown when a counter needs at least one ballot (or one score) and got none. */
export class EmptyInputError extends Error {
    public readonly code = "empty-input";

    constructor(message: string) {
        super(message);
        this.name = "EmptyInputError";
    }
}
