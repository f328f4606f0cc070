import {IPluginRegistry} from "../../src/public/plugins/PluginType";
import {IJobPluginInstance, IJobPluginParams} from "../../src/public/plugins/IJobPlugin";
import {IDeployJobSpec} from "../../src/public/model/IDeployJobSpec";
import {createDeployJobSpec} from "../../src/plugins/jobseed-pipeline/index";
import {DslWriter} from "../../src/public/dsl/DslWriter";

// deploys from a branch other than remotes/origin/master
export default function (registry: IPluginRegistry): void {
    registry.job["main-branch-deploy"] = (params: IJobPluginParams): IJobPluginInstance => {
        const spec: IDeployJobSpec = {
            ...createDeployJobSpec({
                owner: "example-org",
                repository: "example_app",
                infrastructureRepository: "example-infra",
                sshCredentialsId: "test-ssh"
            }),
            branch: "main"
        };

        return {
            spec: spec,
            emit(writer: DslWriter): void {
                writer.call("pipelineJob", params.key);
            }
        };
    };
}
