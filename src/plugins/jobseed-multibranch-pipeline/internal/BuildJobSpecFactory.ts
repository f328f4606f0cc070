import {IBuildJobOptions} from "../../../public/options/IBuildJobOptions";
import {IBuildJobSpec} from "../../../public/model/IBuildJobSpec";
import {EJobType} from "../../../public/model/EJobType";
import {GitHubUtil} from "../../../public/utils/GitHubUtil";
import {ObjectUtil} from "../../../public/utils/ObjectUtil";

export const DEFAULT_BUILD_SCRIPT_PATH: string = "jenkins/Jenkinsfile.build.groovy";

export const TAG_MAX_AGE_DAYS: number = 7;
export const ORPHANED_ITEMS_TO_KEEP: number = 30;
export const ORPHANED_ITEM_DAYS_TO_KEEP: number = 14;

/**
 * Merge the pull request with its target branch before building.
 */
export const PR_STRATEGY_MERGE: number = 1;

/**
 * Plans the multibranch build job of a GitHub repository.
 *
 * Only coordinates, credentials, names and the script path come from the options. Discovery, build strategies and
 * retention are the same for every build job.
 *
 * @param {IBuildJobOptions} options
 * @returns {IBuildJobSpec} a deeply frozen spec
 */
export function createBuildJobSpec(options: IBuildJobOptions): IBuildJobSpec {
    const what: string = "the build job";
    const owner: string = ObjectUtil.required(options.owner, "owner", what);
    const repository: string = ObjectUtil.required(options.repository, "repository", what);
    const projectName: string = options.projectName || GitHubUtil.projectName(repository);

    const spec: IBuildJobSpec = {
        type: EJobType.multibranchPipeline,
        name: options.name || projectName + "-build",
        source: {
            id: repository,
            owner: owner,
            repository: repository,
            repositoryUrl: GitHubUtil.httpsUrl(owner, repository),
            credentialsId: ObjectUtil.required(options.apiCredentialsId, "apiCredentialsId", what),
            configuredByUrl: true
        },
        traits: {
            tagDiscovery: true,
            pullRequestDiscovery: {
                originOnly: true,
                strategyId: PR_STRATEGY_MERGE
            },
            ignoreDraftPullRequests: true,
            sshCheckout: {
                credentialsId: ObjectUtil.required(options.sshCredentialsId, "sshCredentialsId", what)
            },
            submodules: {
                disableSubmodules: false,
                recursiveSubmodules: true,
                trackingSubmodules: false,
                reference: null,
                timeout: null,
                parentCredentials: true
            }
        },
        buildStrategies: {
            changeRequests: {
                ignoreTargetOnlyChanges: true,
                ignoreUntrustedChanges: false
            },
            tags: {
                atMostDays: TAG_MAX_AGE_DAYS,
                atLeastDays: null
            }
        },
        orphanedItemStrategy: {
            numToKeep: ORPHANED_ITEMS_TO_KEEP,
            daysToKeep: ORPHANED_ITEM_DAYS_TO_KEEP
        },
        scriptPath: options.scriptPath || DEFAULT_BUILD_SCRIPT_PATH
    };

    return ObjectUtil.freezeDeep(spec);
}
