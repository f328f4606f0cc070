import _ = require("lodash");
import {Plugins} from "./Plugins";
import {IPluginRegistry} from "../public/plugins/PluginType";
import {IPluginIndex} from "../public/plugins/IPluginIndex";
import {ErrorUtil} from "../public/utils/ErrorUtil";
import multibranchPipeline = require("../plugins/jobseed-multibranch-pipeline/index");
import pipeline = require("../plugins/jobseed-pipeline/index");
import logConsole = require("../plugins/jobseed-log-console/index");
import logFiles = require("../plugins/jobseed-log-files/index");

/**
 * Plugin manager allows you to add plugins to extend the functionality of jobseed.
 */
export class PluginManager {

    /**
     * A plugin module is the NPM package that contains one or more jobseed plugins.
     */
    static pluginModules: _.Dictionary<boolean> = {};

    /**
     * A jobseed plugin describes a kind of job, or a way of logging.
     */
    static plugins: IPluginRegistry = Plugins;

    private static alreadyInitialized: boolean = false;

    /**
     * Adds the plugins that come with jobseed. These are plugins you don't have to declare in IManifest#plugins.
     */
    static initDefault(): void {
        if (this.alreadyInitialized) {
            return;
        }

        this.alreadyInitialized = true;

        PluginManager.register("jobseed-multibranch-pipeline", multibranchPipeline.default);
        PluginManager.register("jobseed-pipeline", pipeline.default);

        PluginManager.register("jobseed-log-console", logConsole.default);
        PluginManager.register("jobseed-log-files", logFiles.default);
    }

    static register(moduleName: string, index: IPluginIndex): void {
        PluginManager.pluginModules[moduleName] = true;
        index(PluginManager.plugins);
    }

    /**
     * Requires a plugin module by name (or path) and registers the plugins it exports. Modules that were already
     * loaded are skipped.
     *
     * @param {string} moduleName
     */
    static load(moduleName: string): void {
        if (PluginManager.pluginModules[moduleName]) {
            return;
        }

        let pluginModule: unknown;
        try {
            pluginModule = require(moduleName);
        } catch (e) {
            throw ErrorUtil.customize(ErrorUtil.toError(e), "Cannot find plugin module " + moduleName +
                ". Are you sure you have added it to the package.json file?");
        }

        const index: unknown = _.isObject(pluginModule) && !_.isFunction(pluginModule)
            ? Reflect.get(pluginModule, "default")
            : pluginModule;

        if (!_.isFunction(index)) {
            throw new Error("Can't figure out how to load plugin module " + moduleName +
                ". The module should export a default function that accepts the plugin registry. " +
                "See IPluginIndex for more details.");
        }

        PluginManager.register(moduleName, (registry: IPluginRegistry): void => {
            index(registry);
        });
    }
}
