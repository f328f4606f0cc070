import {IPluginRegistry} from "./PluginType";

/**
 * What a plugin module exports: a function adding its plugins to the registry.
 */
export type IPluginIndex = (registry: IPluginRegistry) => void;
