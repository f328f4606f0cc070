import _ = require("lodash");
import {IJobPlugin} from "./IJobPlugin";
import {ILogPlugin} from "./ILogPlugin";

export type PluginType = IJobPlugin | ILogPlugin;

/**
 * Plugins by the configuration path they serve, e.g. job:pipeline or log:console.
 */
export interface IPluginRegistry {
    job: _.Dictionary<IJobPlugin>;
    log: _.Dictionary<ILogPlugin>;
}
