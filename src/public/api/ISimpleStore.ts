import _ = require("lodash");

/**
 * A namespaced key-value store. Keys are paths separated by `:`, e.g. `github:credentials:ssh`.
 */
export interface ISimpleStore {

    namespace: string;

    exists(key: string): boolean;

    get(key: string): unknown;

    /**
     * Returns the value if it is a string, or a number rendered as one. Anything else gives undefined.
     */
    getString(key: string): string | undefined;

    /**
     * Returns the value if it is a plain object, otherwise an empty object.
     */
    getObject(key: string): _.Dictionary<unknown>;

    /**
     * Returns an array of values given by the key. If the value is not an array, returns an array with a single item
     * of the value.
     */
    getAsArray(key: string): Array<unknown>;

    set(key: string, value: unknown): void;

    asObject(): unknown;
}
