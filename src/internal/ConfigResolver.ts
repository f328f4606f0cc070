import _ = require("lodash");
import async = require("async");
import {ISimpleStore} from "../public/api/ISimpleStore";
import {ErrorUtil} from "../public/utils/ErrorUtil";

/**
 * Replaces `${section:key}` references in the string values of the given sections with the values they point at.
 *
 * A string that is nothing but a reference takes the referenced value whatever its type, so `remotes: ${x:remotes}`
 * copies a list. Otherwise the referenced value must be a string, number or boolean.
 */
export function resolveConfigVars(store: ISimpleStore, sections: string[], callback: async.ErrorCallback<Error>): void {
    try {
        _.forEach(sections, (section: string) => resolve(store, section, {}));
    } catch (e) {
        callback(ErrorUtil.toError(e));
        return;
    }

    callback(null);
}

function resolve(store: ISimpleStore, path: string, resolving: _.Dictionary<boolean>): void {
    const value: unknown = store.get(path);
    if (_.isString(value)) {
        evalValue(store, path, value, resolving);
    } else if (_.isObject(value)) {
        // arrays too: nconf addresses items as path:index
        _.forEach(_.keys(value), (key: string) => resolve(store, path + ":" + key, resolving));
    }
}

function evalValue(store: ISimpleStore, path: string, value: string, resolving: _.Dictionary<boolean>): unknown {
    if (resolving[path]) {
        throw new Error("Circular dependency detected (variable " + path + ").");
    }

    const deps: string[] = getAllConfigVarDependencies(value);
    if (deps.length === 0) {
        return value;
    }

    const nowResolving: _.Dictionary<boolean> = _.assign({}, resolving, {[path]: true});
    let strValue: string = value;

    for (const dep of deps) {
        const reference: string = "${" + dep + "}";
        const depValue: unknown = evalDependency(store, dep, nowResolving);

        if (_.isNil(depValue)) {
            throw new Error("The variable " + reference + " used in " + path + " cannot be resolved.");
        } else if (_.isString(depValue) || _.isNumber(depValue) || _.isBoolean(depValue)) {
            strValue = strValue.split(reference).join(String(depValue));
        } else if (value === reference) {
            store.set(path, depValue);
            return depValue;
        } else {
            throw new Error("The variable " + reference + " used in " + path +
                " is not a plain value and cannot be embedded in a string.");
        }
    }

    store.set(path, strValue);
    return strValue;
}

function evalDependency(store: ISimpleStore, dep: string, resolving: _.Dictionary<boolean>): unknown {
    const value: unknown = store.get(dep);
    if (_.isString(value)) {
        return evalValue(store, dep, value, resolving);
    } else if (_.isObject(value)) {
        if (resolving[dep]) {
            throw new Error("Circular dependency detected (variable " + dep + ").");
        }
        resolve(store, dep, _.assign({}, resolving, {[dep]: true}));
        return store.get(dep);
    } else {
        return value;
    }
}

export function getAllConfigVarDependencies(value: string): string[] {
    if (!value) {
        return [];
    }

    const vars: string[] = [];
    let inside: boolean = false;
    let lastIndex: number = 0;

    for (let i: number = 0; i < value.length; i++) {
        if (inside) {
            if (value.charAt(i) === "}") {
                vars.push(value.substring(lastIndex, i));
                inside = false;
            }
        } else if (value.charAt(i) === "$" && (i + 1) < value.length && value.charAt(i + 1) === "{") {
            lastIndex = i + 2;
            inside = true;
        }
    }

    return _.uniq(vars);
}
