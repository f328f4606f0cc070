import {IDeployJobOptions} from "../../../public/options/IDeployJobOptions";
import {IDeployJobSpec} from "../../../public/model/IDeployJobSpec";
import {EJobType} from "../../../public/model/EJobType";
import {GitHubUtil} from "../../../public/utils/GitHubUtil";
import {ObjectUtil} from "../../../public/utils/ObjectUtil";

export const DEFAULT_DEPLOY_SCRIPT_PATH: string = "jenkinsfiles/ckan_deploy.groovy";

/**
 * The application is checked out under this remote name.
 */
export const APPLICATION_REMOTE: string = "engine";

/**
 * The infrastructure repository is the `origin`, which is where the deploy branch is taken from.
 */
export const INFRASTRUCTURE_REMOTE: string = "origin";

export const DEPLOY_BRANCH: string = "remotes/" + INFRASTRUCTURE_REMOTE + "/master";

export const BUILD_LOGS_TO_KEEP: number = 30;
export const BUILD_LOG_DAYS_TO_KEEP: number = 30;

/**
 * Plans the deploy job: one run at a time, checking out the application next to the infrastructure repository.
 */
export function createDeployJobSpec(options: IDeployJobOptions): IDeployJobSpec {
    const what: string = "the deploy job";
    const owner: string = ObjectUtil.required(options.owner, "owner", what);
    const repository: string = ObjectUtil.required(options.repository, "repository", what);
    const infrastructureRepository: string = ObjectUtil.required(
        options.infrastructureRepository, "infrastructureRepository", what);
    const infrastructureOwner: string = options.infrastructureOwner || owner;
    const credentialsId: string = ObjectUtil.required(options.sshCredentialsId, "sshCredentialsId", what);
    const projectName: string = options.projectName || GitHubUtil.projectName(repository);

    const spec: IDeployJobSpec = {
        type: EJobType.pipeline,
        name: options.name || projectName + "-deploy",
        disableConcurrentBuilds: true,
        logRotator: {
            numToKeep: BUILD_LOGS_TO_KEEP,
            daysToKeep: BUILD_LOG_DAYS_TO_KEEP
        },
        remotes: [
            {
                name: APPLICATION_REMOTE,
                url: GitHubUtil.sshUrl(owner, repository),
                credentialsId: credentialsId
            },
            {
                name: INFRASTRUCTURE_REMOTE,
                url: GitHubUtil.sshUrl(infrastructureOwner, infrastructureRepository),
                credentialsId: credentialsId
            }
        ],
        branch: DEPLOY_BRANCH,
        scriptPath: options.scriptPath || DEFAULT_DEPLOY_SCRIPT_PATH
    };

    return ObjectUtil.freezeDeep(spec);
}
