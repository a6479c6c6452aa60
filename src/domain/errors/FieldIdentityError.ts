/**
 * Base class for every error thrown by the field identity library.
 * `code` is stable and meant for programmatic checks; `message` is for humans.
 */
export class FieldIdentityError extends Error {
    readonly code: string;

    constructor(code: string, message: string) {
        super(message);
        this.code = code;
        this.name = this.constructor.name;
    }
}
