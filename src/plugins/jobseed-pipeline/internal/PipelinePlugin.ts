import _ = require("lodash");
import {IJobPluginInstance, IJobPluginParams} from "../../../public/plugins/IJobPlugin";
import {ILogger} from "../../../public/api/ILogger";
import {IDeployJobSpec} from "../../../public/model/IDeployJobSpec";
import {IGitRemote} from "../../../public/model/IGitRemote";
import {DslWriter} from "../../../public/dsl/DslWriter";
import {JobOptionsUtil, IJobCoordinates} from "../../../public/utils/JobOptionsUtil";
import {ErrorUtil} from "../../../public/utils/ErrorUtil";
import {createDeployJobSpec} from "./DeployJobSpecFactory";
import {emitDeployJob} from "./PipelineEmitter";

export function createPipelinePlugin(params: IJobPluginParams, logger: ILogger): IJobPluginInstance {
    return new PipelinePlugin(params, logger);
}

class PipelinePlugin implements IJobPluginInstance {
    spec: IDeployJobSpec;

    constructor(params: IJobPluginParams, logger: ILogger) {
        const coordinates: IJobCoordinates = JobOptionsUtil.coordinates(params);

        try {
            this.spec = createDeployJobSpec({
                owner: coordinates.owner || "",
                repository: coordinates.repository || "",
                infrastructureOwner: params.options["infrastructure-owner"],
                infrastructureRepository: params.options["infrastructure-repository"] || "",
                sshCredentialsId: coordinates.sshCredentialsId || "",
                name: params.options.name,
                projectName: coordinates.projectName,
                scriptPath: params.options["script-path"]
            });
        } catch (e) {
            throw ErrorUtil.customize(ErrorUtil.toError(e), "Cannot plan " + JobOptionsUtil.describe(params) + ".");
        }

        logger.verbose("Planned pipeline job " + this.spec.name + " with remotes " +
            _.map(this.spec.remotes, (remote: IGitRemote) => remote.name).join(", "));
    }

    emit(writer: DslWriter): void {
        emitDeployJob(this.spec, writer);
    }
}
