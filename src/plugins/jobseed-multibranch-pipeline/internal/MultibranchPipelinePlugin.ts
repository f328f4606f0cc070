import {IJobPluginInstance, IJobPluginParams} from "../../../public/plugins/IJobPlugin";
import {ILogger} from "../../../public/api/ILogger";
import {IBuildJobSpec} from "../../../public/model/IBuildJobSpec";
import {DslWriter} from "../../../public/dsl/DslWriter";
import {JobOptionsUtil, IJobCoordinates} from "../../../public/utils/JobOptionsUtil";
import {ErrorUtil} from "../../../public/utils/ErrorUtil";
import {createBuildJobSpec} from "./BuildJobSpecFactory";
import {emitBuildJob} from "./MultibranchEmitter";

export function createMultibranchPipelinePlugin(params: IJobPluginParams, logger: ILogger): IJobPluginInstance {
    return new MultibranchPipelinePlugin(params, logger);
}

class MultibranchPipelinePlugin implements IJobPluginInstance {
    spec: IBuildJobSpec;

    constructor(params: IJobPluginParams, logger: ILogger) {
        const coordinates: IJobCoordinates = JobOptionsUtil.coordinates(params);

        try {
            this.spec = createBuildJobSpec({
                owner: coordinates.owner || "",
                repository: coordinates.repository || "",
                apiCredentialsId: coordinates.apiCredentialsId || "",
                sshCredentialsId: coordinates.sshCredentialsId || "",
                name: params.options.name,
                projectName: coordinates.projectName,
                scriptPath: params.options["script-path"]
            });
        } catch (e) {
            throw ErrorUtil.customize(ErrorUtil.toError(e), "Cannot plan " + JobOptionsUtil.describe(params) + ".");
        }

        logger.verbose("Planned multibranch job " + this.spec.name + " for " + this.spec.source.repositoryUrl);
    }

    emit(writer: DslWriter): void {
        emitBuildJob(this.spec, writer);
    }
}
