import {IPluginIndex} from "../../public/plugins/IPluginIndex";
import {IPluginRegistry} from "../../public/plugins/PluginType";
import {EJobType} from "../../public/model/EJobType";
import {createPipelinePlugin} from "./internal/PipelinePlugin";

export {createDeployJobSpec} from "./internal/DeployJobSpecFactory";
export {emitDeployJob} from "./internal/PipelineEmitter";

const fn: IPluginIndex = (registry: IPluginRegistry): void => {
    registry.job[EJobType.pipeline] = createPipelinePlugin;
};

export default fn;
