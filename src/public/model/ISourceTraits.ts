/**
 * Options of the git submodule extension applied on checkout.
 */
export interface ISubmoduleOptions {
    readonly disableSubmodules: boolean;
    readonly recursiveSubmodules: boolean;
    readonly trackingSubmodules: boolean;
    readonly reference: string | null;
    readonly timeout: number | null;
    readonly parentCredentials: boolean;
}

export interface IPullRequestDiscovery {

    /**
     * Only pull requests raised from the origin repository are discovered; forks are ignored.
     */
    readonly originOnly: boolean;

    /**
     * 1: merge the PR with the target branch. 2: build the PR head. 3: both.
     */
    readonly strategyId: number;
}

/**
 * Discovery and checkout behaviours attached to a GitHub branch source.
 */
export interface ISourceTraits {
    readonly tagDiscovery: boolean;
    readonly pullRequestDiscovery: IPullRequestDiscovery;
    readonly ignoreDraftPullRequests: boolean;
    readonly sshCheckout: {
        readonly credentialsId: string;
    };
    readonly submodules: ISubmoduleOptions;
}
