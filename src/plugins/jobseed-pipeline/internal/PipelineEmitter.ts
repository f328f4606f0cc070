import _ = require("lodash");
import {IDeployJobSpec} from "../../../public/model/IDeployJobSpec";
import {IGitRemote} from "../../../public/model/IGitRemote";
import {DslWriter} from "../../../public/dsl/DslWriter";

/**
 * Writes a `pipelineJob` whose Jenkinsfile comes from git.
 */
export function emitDeployJob(spec: IDeployJobSpec, writer: DslWriter): void {
    writer.callBlock("pipelineJob", [spec.name], (job: DslWriter) => {
        if (spec.disableConcurrentBuilds) {
            job.block("properties", (properties: DslWriter) => properties.call("disableConcurrentBuilds"));
        }

        job.block("logRotator", (logRotator: DslWriter) => logRotator
            .call("daysToKeep", spec.logRotator.daysToKeep)
            .call("numToKeep", spec.logRotator.numToKeep));

        job.block("definition", (definition: DslWriter) =>
            definition.block("cpsScm", (cpsScm: DslWriter) => {
                cpsScm.block("scm", (scm: DslWriter) =>
                    scm.block("git", (git: DslWriter) => {
                        _.forEach(spec.remotes, (remote: IGitRemote) =>
                            git.block("remote", (remoteWriter: DslWriter) => remoteWriter
                                .call("url", remote.url)
                                .call("credentials", remote.credentialsId)
                                .call("name", remote.name)));
                        git.call("branch", spec.branch);
                    }));
                cpsScm.call("scriptPath", spec.scriptPath);
            }));
    });
}
