/**
 * The GitHub branch source a multibranch job scans.
 */
export interface IGitHubSource {

    /**
     * Stable identifier of the branch source within the job. Jenkins uses it to keep branch jobs across reconfigures.
     */
    readonly id: string;

    /**
     * The organisation or user that owns the repository, exactly as configured (case is preserved).
     */
    readonly owner: string;

    readonly repository: string;

    /**
     * HTTPS clone URL of the repository.
     */
    readonly repositoryUrl: string;

    /**
     * Credential used for GitHub API scans.
     */
    readonly credentialsId: string;

    readonly configuredByUrl: boolean;
}
