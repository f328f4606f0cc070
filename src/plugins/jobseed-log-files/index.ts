import {IPluginIndex} from "../../public/plugins/IPluginIndex";
import {IPluginRegistry} from "../../public/plugins/PluginType";
import {fileLogger} from "./FileLogger";

const fn: IPluginIndex = (registry: IPluginRegistry): void => {
    registry.log["file"] = fileLogger;
};

export default fn;
