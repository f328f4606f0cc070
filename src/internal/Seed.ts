import _ = require("lodash");
import async = require("async");
import {IConfig} from "../public/api/IConfig";
import {IJobOptions} from "../public/options/IJobOptions";
import {IJobPlugin, IJobPluginInstance} from "../public/plugins/IJobPlugin";
import {IJobSpec, ISeedDescriptor} from "../public/model/IJobSpec";
import {EOutputFormat} from "../public/options/EOutputFormat";
import {DslWriter} from "../public/dsl/DslWriter";
import {ErrorUtil} from "../public/utils/ErrorUtil";
import {PluginManager} from "./PluginManager";
import {assertValidJobSpec} from "./SpecValidator";

/**
 * The set of jobs a seed script declares, planned from the manifest's `jobs` section in declaration order.
 */
export class Seed {
    jobs: Array<IJobPluginInstance> = [];
    config: IConfig;

    constructor(config: IConfig) {
        this.config = config;
    }

    build(callback: async.ErrorCallback<Error>): void {
        const entries: _.Dictionary<unknown> = this.config.options.getObject("jobs");
        if (_.size(entries) === 0) {
            const error: Error = new Error(
                "I don't know what to do. You need to define the jobs to generate under jobs.");
            this.config.logger.error(error.message);
            callback(error);
            return;
        }

        const jobs: Array<IJobPluginInstance> = [];
        try {
            _.forEach(entries, (value: unknown, key: string) => {
                const options: IJobOptions = readJobOptions(key, value);
                const plugin: IJobPlugin | undefined = PluginManager.plugins.job[options.type];
                if (!plugin) {
                    throw new Error("There is no job plugin for type " + options.type + " (job " + key +
                        "). Known types: " + _.keys(PluginManager.plugins.job).join(", ") + ".");
                }

                const instance: IJobPluginInstance = plugin({
                    key: key,
                    options: options,
                    config: this.config
                }, this.config.logger);

                assertValidJobSpec(instance.spec);
                jobs.push(instance);
            });
        } catch (e) {
            const error: Error = ErrorUtil.toError(e);
            this.config.logger.error(error.message);
            callback(error);
            return;
        }

        const duplicates: string[] = _.keys(_.pickBy(
            _.countBy(jobs, (job: IJobPluginInstance) => job.spec.name), (count: number) => count > 1));
        if (duplicates.length > 0) {
            const error: Error = new Error(
                "Job names must be unique. Declared more than once: " + duplicates.join(", ") + ".");
            this.config.logger.error(error.message);
            callback(error);
            return;
        }

        this.jobs = jobs;
        _.forEach(this.jobs, (job: IJobPluginInstance) =>
            this.config.logger.info("Planned " + job.spec.type + " job " + job.spec.name));
        callback(null);
    }

    specs(): IJobSpec[] {
        return _.map(this.jobs, (job: IJobPluginInstance) => job.spec);
    }

    /**
     * Renders the seed. The output only depends on the planned specs.
     *
     * @param {EOutputFormat} format
     * @returns {string}
     */
    emit(format: EOutputFormat): string {
        if (format === EOutputFormat.json) {
            const descriptor: ISeedDescriptor = {jobs: this.specs()};
            return JSON.stringify(descriptor, null, 2) + "\n";
        }

        const writer: DslWriter = new DslWriter();
        _.forEach(this.jobs, (job: IJobPluginInstance, index: number) => {
            if (index > 0) {
                writer.blankLine();
            }
            job.emit(writer);
        });

        return writer.toString();
    }
}

export function readJobOptions(key: string, value: unknown): IJobOptions {
    if (!_.isObject(value) || !_.isPlainObject(value)) {
        throw new Error("The job " + key + " must be an object with at least a type.");
    }

    const entry: object = value;

    const optionalString = (name: string): string | undefined => {
        const option: unknown = Reflect.get(entry, name);
        if (_.isNil(option)) {
            return undefined;
        } else if (_.isString(option) || _.isNumber(option)) {
            return String(option);
        }

        throw new Error("The option jobs:" + key + ":" + name + " must be a string.");
    };

    const type: string | undefined = optionalString("type");
    if (!type) {
        throw new Error("The job " + key + " has no type. Set jobs:" + key + ":type.");
    }

    const credentials: unknown = Reflect.get(entry, "credentials");
    if (!_.isNil(credentials) && !_.isPlainObject(credentials)) {
        throw new Error("The option jobs:" + key + ":credentials must be an object with api and ssh.");
    }

    return {
        type: type,
        name: optionalString("name"),
        owner: optionalString("owner"),
        repository: optionalString("repository"),
        credentials: _.isObject(credentials) ? {
            api: readCredential(credentials, "api", key),
            ssh: readCredential(credentials, "ssh", key)
        } : undefined,
        "script-path": optionalString("script-path"),
        "infrastructure-owner": optionalString("infrastructure-owner"),
        "infrastructure-repository": optionalString("infrastructure-repository")
    };
}

function readCredential(credentials: object, name: string, key: string): string | undefined {
    const credential: unknown = Reflect.get(credentials, name);
    if (_.isNil(credential)) {
        return undefined;
    } else if (_.isString(credential)) {
        return credential;
    }

    throw new Error("The option jobs:" + key + ":credentials:" + name + " must be a string.");
}
