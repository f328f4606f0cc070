import {IPluginIndex} from "../../public/plugins/IPluginIndex";
import {IPluginRegistry} from "../../public/plugins/PluginType";
import {consoleLogger} from "./ConsoleLogger";

const fn: IPluginIndex = (registry: IPluginRegistry): void => {
    registry.log["console"] = consoleLogger;
};

export default fn;
