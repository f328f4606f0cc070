import _ = require("lodash");
import async = require("async");
import fs = require("fs");
import * as path from "path";
import * as Winston from "winston";
import TransportStream = require("winston-transport");
import {mkdirp} from "mkdirp";
import {SimpleStore} from "./SimpleStore";
import {Project} from "./Project";
import {Seed} from "./Seed";
import {PluginManager} from "./PluginManager";
import {resolveConfigVars} from "./ConfigResolver";
import {IConfig} from "../public/api/IConfig";
import {ILogger} from "../public/api/ILogger";
import {IProject} from "../public/api/IProject";
import {ISeedResult} from "../public/api/ISeedResult";
import {ILogPlugin} from "../public/plugins/ILogPlugin";
import {ELogLevel} from "../public/options/logging/ELogLevel";
import {EOutputFormat} from "../public/options/EOutputFormat";
import {PathUtils} from "../public/utils/PathUtils";
import {ErrorUtil} from "../public/utils/ErrorUtil";

export class Config implements IConfig {
    static SECTIONS: string[] = ["plugins", "project", "github", "jobs", "output", "log"];

    /**
     * Stores the configuration.
     */
    options: SimpleStore;

    /**
     * This is the directory which we resolve all other relative paths with.
     */
    workingDir: string;

    /**
     * The configuration file that was used to load this config. Null if the config was loaded programmatically.
     */
    confFilePath: string | null = null;

    private builtProject: Project | null = null;
    private builtLogger: Winston.Logger | null = null;
    private builtSeed: Seed | null = null;

    constructor(namespace: string, workingDir: string) {
        this.options = new SimpleStore(namespace);
        this.workingDir = workingDir;
    }

    get project(): IProject {
        return Config.built(this.builtProject, "project");
    }

    get logger(): ILogger {
        return Config.built(this.builtLogger, "logger");
    }

    get seed(): Seed {
        return Config.built(this.builtSeed, "seed");
    }

    build(callback: async.ErrorCallback<Error>): void {
        async.series([
            this.resolveVars.bind(this),
            this.requirePlugins.bind(this),
            this.initializeProject.bind(this),
            this.createLogger.bind(this),
            this.logManifest.bind(this),
            this.buildSeed.bind(this)
        ], (err?: Error | null) => callback(err));
    }

    /**
     * Emits the seed and writes it to output:path, if there is one.
     */
    execute(callback: async.AsyncResultCallback<ISeedResult, Error>): void {
        let result: ISeedResult;
        try {
            const format: EOutputFormat = this.outputFormat();
            result = {
                format: format,
                jobs: _.map(this.seed.specs(), "name"),
                output: this.seed.emit(format),
                path: PathUtils.getAsAbsolutePath(this.options.getString("output:path"), this.workingDir)
            };
        } catch (e) {
            const error: Error = ErrorUtil.toError(e);
            this.logger.error(error.message);
            callback(error);
            return;
        }

        const outputPath: string | null = result.path;
        if (!outputPath) {
            callback(null, result);
            return;
        }

        mkdirp(path.dirname(outputPath)).then(() => {
            fs.writeFile(outputPath, result.output, {encoding: "utf8"}, (err: NodeJS.ErrnoException | null) => {
                if (err) {
                    const error: Error = ErrorUtil.customize(err, "Cannot write the seed to " + outputPath + ".");
                    this.logger.error(error.message);
                    callback(error);
                    return;
                }

                this.logger.info("Wrote " + result.jobs.length + " job(s) to " + outputPath);
                callback(null, result);
            });
        }, (err: unknown) => {
            const error: Error = ErrorUtil.customize(
                ErrorUtil.toError(err), "Cannot create the directory of " + outputPath + ".");
            this.logger.error(error.message);
            callback(error);
        });
    }

    /**
     * Ends the logger once everything logged so far has gone through. Ending it closes its transports, file
     * transports included. The logger is unavailable afterwards.
     */
    close(callback: async.ErrorCallback<Error>): void {
        const logger: Winston.Logger | null = this.builtLogger;
        if (!logger) {
            callback(null);
            return;
        }

        this.builtLogger = null;
        logger.once("finish", () => callback(null));
        logger.end();
    }

    private static built<T>(value: T | null, what: string): T {
        if (value === null) {
            throw new Error("The " + what + " is not available. Build the configuration first.");
        }

        return value;
    }

    private outputFormat(): EOutputFormat {
        const format: string | undefined = this.options.getString("output:format");
        if (!format) {
            return EOutputFormat.groovy;
        }

        const known: EOutputFormat | undefined = _.find(_.values(EOutputFormat), (value: string) => value === format);
        if (!known) {
            throw new Error("Unknown output:format " + format + ". Use one of " +
                _.values(EOutputFormat).join(", ") + ".");
        }

        return known;
    }

    private resolveVars(callback: async.ErrorCallback<Error>): void {
        resolveConfigVars(this.options, Config.SECTIONS, callback);
    }

    private requirePlugins(callback: async.ErrorCallback<Error>): void {
        try {
            _.forEach(this.options.getAsArray("plugins"), (pluginName: unknown) => {
                if (!_.isString(pluginName) || !pluginName) {
                    throw new Error("The plugins option must list module names, found " + String(pluginName) + ".");
                }

                // relative module paths are relative to the manifest, not to jobseed
                PluginManager.load(pluginName.startsWith(".")
                    ? path.resolve(this.workingDir, pluginName)
                    : pluginName);
            });
        } catch (e) {
            callback(ErrorUtil.toError(e));
            return;
        }

        callback(null);
    }

    private initializeProject(callback: async.ErrorCallback<Error>): void {
        try {
            this.builtProject = new Project(this.options);
        } catch (e) {
            callback(ErrorUtil.toError(e));
            return;
        }

        callback(null);
    }

    private createLogger(callback: async.ErrorCallback<Error>): void {
        const label: string = this.project.slug;
        const loggerOptions: _.Dictionary<unknown> = this.options.getObject("log");
        const transports: TransportStream[] = [];
        const fns: Array<async.AsyncVoidFunction<Error>> = [];

        _.forEach(loggerOptions, (value: unknown, key: string) => {
            const logPlugin: ILogPlugin | undefined = PluginManager.plugins.log[key];
            if (!logPlugin) {
                fns.push((innerCallback: async.ErrorCallback<Error>) => innerCallback(new Error(
                    "There is no log plugin named " + key + ". Known plugins: " +
                    _.keys(PluginManager.plugins.log).join(", ") + ".")));
                return;
            }

            fns.push((innerCallback: async.ErrorCallback<Error>) => logPlugin(
                {
                    config: this,
                    label: label,
                    options: _.isObject(value) ? value : {}
                },
                (err?: Error | null, result?: TransportStream[]) => {
                    if (err) {
                        innerCallback(ErrorUtil.customize(err, "Cannot create the " + key + " logger."));
                        return;
                    }

                    transports.push(...(result || []));
                    innerCallback(null);
                }
            ));
        });

        // we always want to attach a console logger
        if (!loggerOptions["console"]) {
            fns.push((innerCallback: async.ErrorCallback<Error>) => PluginManager.plugins.log["console"](
                {
                    config: this,
                    label: label,
                    options: {level: ELogLevel.info}
                },
                (err?: Error | null, result?: TransportStream[]) => {
                    transports.push(...(result || []));
                    innerCallback(err);
                }
            ));
        }

        async.series(fns, (err?: Error | null) => {
            if (err) {
                callback(err);
                return;
            }

            this.builtLogger = Winston.createLogger({transports: transports});
            callback(null);
        });
    }

    private logManifest(callback: async.ErrorCallback<Error>): void {
        this.logger.info(this.confFilePath
            ? "Loaded the manifest " + this.confFilePath
            : "Loaded the manifest from an object");
        callback(null);
    }

    private buildSeed(callback: async.ErrorCallback<Error>): void {
        const seed: Seed = new Seed(this);
        seed.build((err?: Error | null) => {
            if (!err) {
                this.builtSeed = seed;
            }
            callback(err);
        });
    }
}
