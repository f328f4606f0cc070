import _ = require("lodash");

export class ErrorUtil {
    static customize(e: Error | string | null | undefined, message: string): Error {
        if (!e) {
            return new Error(message);
        } else if (_.isString(e)) {
            return new Error(message + "\n" + e);
        } else {
            e.message = message + "\n" + e.message;
            return e;
        }
    }

    /**
     * Normalizes whatever was thrown into an Error.
     *
     * @param thrown
     * @returns {Error}
     */
    static toError(thrown: unknown): Error {
        if (thrown instanceof Error) {
            return thrown;
        } else if (_.isString(thrown)) {
            return new Error(thrown);
        } else {
            return new Error("Unknown Error: " + String(thrown));
        }
    }
}
