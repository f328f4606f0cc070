import _ = require("lodash");

export class ObjectUtil {

    /**
     * Freezes the object and everything reachable from it.
     */
    static freezeDeep<T>(obj: T): T {
        if (_.isObject(obj) && !Object.isFrozen(obj)) {
            Object.freeze(obj);
            _.forEach(Object.getOwnPropertyNames(obj), (name: string) => {
                ObjectUtil.freezeDeep(Reflect.get(obj, name));
            });
        }

        return obj;
    }

    /**
     * Returns the trimmed value, or throws when it is missing or blank.
     */
    static required(value: string | null | undefined, key: string, owner: string): string {
        const trimmed: string = _.trim(value || "");
        if (!trimmed) {
            throw new Error("Missing required option " + key + " for " + owner + ".");
        }

        return trimmed;
    }
}
