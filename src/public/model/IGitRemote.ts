/**
 * A named git remote checked out by a pipeline job.
 */
export interface IGitRemote {
    readonly name: string;
    readonly url: string;
    readonly credentialsId: string;
}
