import _ = require("lodash");
import nconf = require("nconf");
import {ISimpleStore} from "../public/api/ISimpleStore";

export class SimpleStore implements ISimpleStore {

    namespace: string;

    constructor(namespace: string) {
        this.namespace = namespace;
    }

    /**
     * Checks if a value exists.
     *
     * @param {string} key
     * @returns {boolean}
     */
    exists(key: string): boolean {
        return !_.isNil(this.get(key));
    }

    /**
     * Gets a value from the key.
     *
     * @param {string} key
     * @returns {unknown}
     */
    get(key: string): unknown {
        return nconf.get(this.namespace + ":" + key);
    }

    getString(key: string): string | undefined {
        const value: unknown = this.get(key);
        if (_.isString(value)) {
            return value;
        } else if (_.isNumber(value)) {
            return String(value);
        } else {
            return undefined;
        }
    }

    getObject(key: string): _.Dictionary<unknown> {
        const value: unknown = this.get(key);
        return _.isObject(value) && _.isPlainObject(value) ? _.fromPairs(_.toPairs(value)) : {};
    }

    /**
     * Returns the entire store as an object.
     *
     * @returns {unknown}
     */
    asObject(): unknown {
        return nconf.get(this.namespace);
    }

    /**
     * Returns an array of values given by the key. If the value is not an array, returns an array with a single item
     * of the value.
     *
     * @param {string} key
     * @returns {Array<unknown>}
     */
    getAsArray(key: string): Array<unknown> {
        const someVal: unknown = this.get(key);
        if (_.isArray(someVal)) {
            return someVal;
        } else if (someVal !== undefined && someVal !== null) {
            return [someVal];
        } else {
            return [];
        }
    }

    /**
     * Sets the key and value.
     *
     * @param {string} key
     * @param {unknown} value
     */
    set(key: string, value: unknown): void {
        nconf.set(this.namespace + ":" + key, value);
    }
}
