/**
 * Errors raised by the player library. None of them is fatal: callers log and skip the affected operation.
 */
export class PlayerError extends Error {
    public constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

/**
 * Network failure, timeout or a response that is not JSON.
 */
export class TransportError extends PlayerError {
    public constructor(
        message: string,
        public readonly response?: unknown,
    ) {
        super(message);
    }
}

/**
 * Push notification body which is not base64 encoded JSON.
 */
export class DecodeError extends PlayerError {}

/**
 * Unknown playlist, bad schedule time or missing command argument.
 */
export class ValidationError extends PlayerError {}

/**
 * Command accepted by the adapter but not backed by the Volumio API.
 */
export class UnsupportedCommandError extends PlayerError {}
