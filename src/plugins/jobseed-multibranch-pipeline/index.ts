import {IPluginIndex} from "../../public/plugins/IPluginIndex";
import {IPluginRegistry} from "../../public/plugins/PluginType";
import {EJobType} from "../../public/model/EJobType";
import {createMultibranchPipelinePlugin} from "./internal/MultibranchPipelinePlugin";

export {createBuildJobSpec} from "./internal/BuildJobSpecFactory";
export {emitBuildJob} from "./internal/MultibranchEmitter";

const fn: IPluginIndex = (registry: IPluginRegistry): void => {
    registry.job[EJobType.multibranchPipeline] = createMultibranchPipelinePlugin;
};

export default fn;
