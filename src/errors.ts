/**
 * Errors whose message is safe to show to the user as-is.
 * Anything else reaching the tool handler is reported as an internal error.
 */
export class ClientError extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = new.target.name;
    }
}

export class ValidationError extends ClientError {}

export class NotFoundError extends ClientError {
    constructor(readonly itemId: string) {
        super(`Item not found: ${itemId}`);
    }
}

export class PersistenceError extends ClientError {
    constructor(message: string, readonly path: string, options?: ErrorOptions) {
        super(message, options);
    }
}
