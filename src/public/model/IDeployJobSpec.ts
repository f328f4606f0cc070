import {EJobType} from "./EJobType";
import {IGitRemote} from "./IGitRemote";
import {IRetentionPolicy} from "./IRetentionPolicy";

/**
 * A single pipeline job whose Jenkinsfile is read from SCM.
 */
export interface IDeployJobSpec {
    readonly type: EJobType.pipeline;
    readonly name: string;
    readonly disableConcurrentBuilds: boolean;
    readonly logRotator: IRetentionPolicy;

    /**
     * Remotes in checkout order.
     */
    readonly remotes: ReadonlyArray<IGitRemote>;

    readonly branch: string;
    readonly scriptPath: string;
}
