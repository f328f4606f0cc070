import {EJobType} from "./EJobType";
import {IGitHubSource} from "./IGitHubSource";
import {ISourceTraits} from "./ISourceTraits";
import {IBuildStrategies} from "./IBuildStrategies";
import {IRetentionPolicy} from "./IRetentionPolicy";

/**
 * A multibranch pipeline job: one pipeline per discovered branch, tag or pull request.
 */
export interface IBuildJobSpec {
    readonly type: EJobType.multibranchPipeline;
    readonly name: string;
    readonly source: IGitHubSource;
    readonly traits: ISourceTraits;
    readonly buildStrategies: IBuildStrategies;

    /**
     * Retention of branch jobs whose branch, tag or pull request no longer exists.
     */
    readonly orphanedItemStrategy: IRetentionPolicy;

    /**
     * Path, inside the scanned repository, of the Jenkinsfile each branch job runs.
     */
    readonly scriptPath: string;
}
