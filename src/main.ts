#!/usr/bin/env node

import _ = require("lodash");
import async = require("async");
import yaml = require("js-yaml");
import yargs = require("yargs");
import fs = require("fs");
import path = require("path");
import nconf = require("nconf");
import uuid = require("uuid");
import {PathUtils} from "./public/utils/PathUtils";
import {ErrorUtil} from "./public/utils/ErrorUtil";
import {Config} from "./internal/Config";
import {PluginManager} from "./internal/PluginManager";
import {ISeedResult} from "./public/api/ISeedResult";

export {IManifest} from "./public/IManifest";
export {ISeedResult} from "./public/api/ISeedResult";
export {IJobSpec, ISeedDescriptor} from "./public/model/IJobSpec";
export {IBuildJobSpec} from "./public/model/IBuildJobSpec";
export {IDeployJobSpec} from "./public/model/IDeployJobSpec";
export {EJobType} from "./public/model/EJobType";
export {EOutputFormat} from "./public/options/EOutputFormat";
export {IBuildJobOptions} from "./public/options/IBuildJobOptions";
export {IDeployJobOptions} from "./public/options/IDeployJobOptions";
export {IPluginIndex} from "./public/plugins/IPluginIndex";
export {DslWriter} from "./public/dsl/DslWriter";
export {createBuildJobSpec, emitBuildJob} from "./plugins/jobseed-multibranch-pipeline/index";
export {createDeployJobSpec, emitDeployJob} from "./plugins/jobseed-pipeline/index";
export {validateJobSpec, assertValidJobSpec} from "./internal/SpecValidator";

export const MANIFEST_FILE_NAME: string = "jobseed.yaml";

// initialize default OOTB plugins.
PluginManager.initDefault();

export function catchUncaughtExceptions(): void {
    process.on("uncaughtException", (thrown: unknown): void => {
        const error: Error = ErrorUtil.toError(thrown);

        // tslint:disable-next-line
        console.error("Uncaught error:\n" + error.name + ": " + error.message + "\n" + error.stack);
        process.exitCode = 1;
    });
}

export default class Jobseed {
    private config: Config;

    static create(workingDirPath: string): Jobseed {
        nconf.use("memory");
        return new Jobseed(uuid.v4(), workingDirPath);
    }

    /**
     * Plans every job of the manifest, validates it and emits the seed.
     *
     * Make sure you have loaded all configurations necessary using the load* functions before calling this function.
     *
     * @param {AsyncResultCallback<ISeedResult, Error>} callback
     */
    execute(callback: async.AsyncResultCallback<ISeedResult, Error>): void {
        // the logger is closed whatever the outcome
        const done = (err?: Error | null, result?: ISeedResult): void => {
            this.config.close(() => callback(err, result));
        };

        async.series([
            this.config.build.bind(this.config)
        ], (err?: Error | null) => {
            if (err) {
                done(err);
                return;
            }

            this.config.execute(done);
        });
    }

    /**
     * Loads `section:key` overrides from the command line arguments, e.g. `--output:path jenkins/dsl.groovy`.
     *
     * @param {string[]} argv
     * @returns {Jobseed}
     */
    loadArgs(argv: string[] = process.argv.slice(2)): Jobseed {
        const args: _.Dictionary<unknown> = _.omit(parseArgs(argv), ["_", "$0", "conf"]);
        _.forEach(args, (value: unknown, key: string) => {
            this.config.options.set(key, value);
        });
        return this;
    }

    /**
     * Loads a configuration from a JSON file.
     *
     * @param {string} filePath
     * @returns {Jobseed}
     */
    loadJsonFile(filePath: string): Jobseed {
        const absolutePath: string = PathUtils.getAsAbsolutePath(filePath, this.config.workingDir) || filePath;
        const json: unknown = JSON.parse(fs.readFileSync(absolutePath, "utf8"));
        this.loadObject(json);
        this.config.confFilePath = absolutePath;
        return this;
    }

    /**
     * Loads a configuration from a Yaml file.
     *
     * @param {string} filePath
     * @returns {Jobseed}
     */
    loadYamlFile(filePath: string): Jobseed {
        const absolutePath: string = PathUtils.getAsAbsolutePath(filePath, this.config.workingDir) || filePath;
        const json: unknown = yaml.load(fs.readFileSync(absolutePath, "utf8"));
        this.loadObject(json);
        this.config.confFilePath = absolutePath;
        return this;
    }

    /**
     * Loads a configuration from an object. Top level keys replace whatever was loaded before under the same key.
     *
     * @param {unknown} conf
     * @returns {Jobseed}
     */
    loadObject(conf: unknown): Jobseed {
        if (!_.isPlainObject(conf) || !_.isObject(conf)) {
            throw new Error("A configuration must be an object, found " + typeof conf + ".");
        }

        // values get resolved in place, so the store keeps its own copy
        _.forEach(_.toPairs(_.cloneDeep(conf)), ([key, value]: [string, unknown]) => {
            this.config.options.set(key, value);
        });
        return this;
    }

    private constructor(namespace: string, workingDir: string) {
        this.config = new Config(namespace, workingDir);
    }
}

function parseArgs(argv: string[]): _.Dictionary<unknown> {
    return yargs(argv)
        .help(false)
        .version(false)
        .parserConfiguration({"camel-case-expansion": false, "dot-notation": false})
        .parseSync();
}

/**
 * Finds the manifest: --conf if given, otherwise jobseed.yaml in the current directory or one of its parents.
 */
export function findManifest(conf: unknown, cwd: string): string {
    let confFilePath: string | null = _.isString(conf) && conf ? conf : null;
    if (!confFilePath) {
        confFilePath = PathUtils.searchForPath(cwd, MANIFEST_FILE_NAME);

        // still can't find it
        if (!confFilePath) {
            throw new Error(
                "No configuration file provided or found. Please provide a configuration file using the --conf argument.");
        }
    }

    return PathUtils.getAsAbsolutePath(confFilePath, cwd) || confFilePath;
}

if (require.main === module) {
    catchUncaughtExceptions();

    // the manifest is loaded first so that command line arguments override it.
    const argv: string[] = process.argv.slice(2);
    const confFilePath: string = findManifest(parseArgs(argv)["conf"], process.cwd());
    const jobseed: Jobseed = Jobseed.create(path.parse(confFilePath).dir);

    if (path.parse(confFilePath).ext === ".json") {
        jobseed.loadJsonFile(confFilePath);
    } else {
        jobseed.loadYamlFile(confFilePath);
    }

    jobseed.loadArgs(argv).execute((err?: Error | null, result?: ISeedResult) => {
        if (err) {
            // tslint:disable-next-line
            console.error(err.message);
            process.exitCode = 1;
            return;
        }

        if (result && !result.path) {
            process.stdout.write(result.output);
        }
    });
}
