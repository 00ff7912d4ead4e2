/**
 * Base class for every rule violation raised by the engine.
 * `code` is a stable machine-readable identifier; `message` is for the GM.
 */
export class GameError extends Error {
    constructor(public code: string, message: string) {
        super(message);
        this.name = 'GameError';
    }
}

/** Regulation or roster does not fit together (e.g. player count mismatch). */
export class ConfigurationError extends GameError {
    constructor(code: string, message: string) {
        super(code, message);
        this.name = 'ConfigurationError';
    }
}

/** Operation is not allowed in the current state of the game. */
export class InvalidStateError extends GameError {
    constructor(code: string, message: string) {
        super(code, message);
        this.name = 'InvalidStateError';
    }
}

export class InvalidTransitionError extends GameError {
    constructor(code: string, message: string) {
        super(code, message);
        this.name = 'InvalidTransitionError';
    }
}

export class NotFoundError extends GameError {
    constructor(code: string, message: string) {
        super(code, message);
        this.name = 'NotFoundError';
    }
}
