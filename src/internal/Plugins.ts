import {IPluginRegistry} from "../public/plugins/PluginType";

/**
 * Separated from PluginManager to avoid circular dependencies for the plugins shipped with jobseed.
 */
// tslint:disable-next-line
export const Plugins: IPluginRegistry = {
    job: {},
    log: {}
};
